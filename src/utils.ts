/**
 * Shared utility functions for the Meta Ads gateway MCP server
 */

// =============================================================================
// Logger - Debug logging controlled by DEBUG environment variable
// =============================================================================

/**
 * Check if debug logging is enabled.
 * Set DEBUG=true or DEBUG=1 to enable debug output.
 */
function isDebugEnabled(): boolean {
  const debug = process.env.DEBUG;
  return debug === "true" || debug === "1";
}

/**
 * Logger with level-based output. Everything goes to stderr because stdout
 * carries the MCP protocol.
 * - debug: Only shown when DEBUG=true (use for detailed tracing)
 * - info: Always shown (use for important status messages)
 * - warn: Always shown (use for warnings)
 * - error: Always shown (use for errors)
 */
export const logger = {
  debug: (...args: unknown[]) => {
    if (isDebugEnabled()) {
      console.error("[DEBUG]", ...args);
    }
  },
  info: (...args: unknown[]) => {
    console.error("[INFO]", ...args);
  },
  warn: (...args: unknown[]) => {
    console.error("[WARN]", ...args);
  },
  error: (...args: unknown[]) => {
    console.error("[ERROR]", ...args);
  },
};

/**
 * Create a JSON response for MCP tools.
 */
export function jsonResponse(data: unknown): {
  content: [{ type: "text"; text: string }];
} {
  return { content: [{ type: "text", text: JSON.stringify(data, null, 2) }] };
}

/**
 * Create an error response for MCP tools.
 */
export function errorResponse(
  error: string,
  extra?: Record<string, unknown>,
): { content: [{ type: "text"; text: string }] } {
  return jsonResponse({ success: false, error, ...extra });
}

/**
 * Shorten a token for display: first 6 and last 4 characters.
 */
export function redactToken(token: string): string {
  if (token.length <= 12) return "***";
  return `${token.slice(0, 6)}...${token.slice(-4)}`;
}

/**
 * Remove access tokens from a URL before it is logged.
 */
export function redactUrl(url: string): string {
  return url.replace(/access_token=[^&]+/g, "access_token=REDACTED");
}

/** Freeze a value and everything reachable from it. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const member of Object.values(value)) {
      deepFreeze(member);
    }
  }
  return value;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Promise-based setTimeout that rejects with the signal's reason when aborted.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
