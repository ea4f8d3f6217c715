import { createHash } from "crypto";

import type { FingerprintInput } from "./types.js";

/**
 * Canonical JSON: object keys sorted, undefined members dropped, arrays kept in
 * order unless their parameter is listed as unordered.
 */
export function canonicalize(value: unknown, unorderedKeys: ReadonlySet<string> = new Set(), key?: string): string {
  if (value === undefined || value === null) return "null";

  if (Array.isArray(value)) {
    const items = value.map((item) => canonicalize(item, unorderedKeys));
    if (key !== undefined && unorderedKeys.has(key)) {
      items.sort();
    }
    return `[${items.join(",")}]`;
  }

  if (typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, member]) => `${JSON.stringify(name)}:${canonicalize(member, unorderedKeys, name)}`);
    return `{${entries.join(",")}}`;
  }

  return JSON.stringify(value);
}

/**
 * Deterministic key for (endpoint, parameters, credential). Named parameters
 * are order-independent; list parameters are order-dependent except those in
 * `unorderedParams`.
 */
export function fingerprint(input: FingerprintInput, unorderedParams: readonly string[] = []): string {
  const canonical = canonicalize(
    {
      endpoint: input.endpoint,
      object: input.objectId,
      params: input.params,
      credential: input.credentialId,
    },
    new Set(unorderedParams),
  );
  return createHash("sha256").update(canonical).digest("hex");
}
