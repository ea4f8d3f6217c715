/**
 * Error taxonomy shared by the gateway and its components
 */

export type ErrorKind =
  | "CredentialExpired"
  | "InsufficientScope"
  | "CredentialInvalid"
  | "RateLimitExceeded"
  | "Transient"
  | "PermanentFailure"
  | "MalformedResponse"
  | "StorageUnavailable"
  | "InvalidRequest"
  | "Cancelled";

export class GatewayError extends Error {
  readonly kind: ErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(
    kind: ErrorKind,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "GatewayError";
    this.kind = kind;
    this.details = details;
  }
}

/** Outcome class of a single failed remote attempt. */
export type AttemptFailureKind = "transient" | "rate_limited" | "auth" | "permanent";

export interface RemoteFailureInfo {
  kind: AttemptFailureKind;
  status: number;
  code?: number;
  subcode?: number;
  retryAfterMs?: number;
  traceId?: string;
}

export class RemoteCallError extends Error {
  readonly kind: AttemptFailureKind;
  readonly status: number;
  readonly code?: number;
  readonly subcode?: number;
  readonly retryAfterMs?: number;
  readonly traceId?: string;

  constructor(message: string, info: RemoteFailureInfo, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RemoteCallError";
    this.kind = info.kind;
    this.status = info.status;
    this.code = info.code;
    this.subcode = info.subcode;
    this.retryAfterMs = info.retryAfterMs;
    this.traceId = info.traceId;
  }

  describe(): Record<string, unknown> {
    return {
      status: this.status,
      ...(this.code !== undefined && { code: this.code }),
      ...(this.subcode !== undefined && { subcode: this.subcode }),
      ...(this.traceId && { fbtrace_id: this.traceId }),
    };
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

/**
 * Coerce anything thrown inside an invocation into a GatewayError.
 * Unknown errors are reported as permanent: retrying a programming error
 * cannot fix it.
 */
export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) return error;
  if (error instanceof RemoteCallError) {
    return new GatewayError("PermanentFailure", error.message, error.describe(), { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new GatewayError("PermanentFailure", `Unexpected error: ${message}`, undefined, {
    cause: error,
  });
}
