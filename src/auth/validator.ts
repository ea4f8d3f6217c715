import { createHash } from "crypto";

import { GatewayError } from "../errors.js";
import { redactToken } from "../utils.js";
import type { Credential, ValidatedCredential } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Stable, non-reversible identifier for a token (first 16 hex chars of SHA-256).
 */
export function credentialIdOf(token: string): string {
  return createHash("sha256").update(token).digest("hex").slice(0, 16);
}

export function missingScopes(granted: readonly string[], required: readonly string[]): string[] {
  const grantedSet = new Set(granted);
  return [...new Set(required)].filter((scope) => !grantedSet.has(scope)).sort();
}

export function isExpired(credential: Credential, now: number): boolean {
  return credential.expiresAt !== null && credential.expiresAt <= now;
}

/**
 * Local checks only: presence, expiry, then scope coverage. A credential that
 * passes may still be rejected by the remote service.
 */
export function ensureUsable(
  credential: Credential | null,
  requiredScopes: readonly string[],
  now: number = Date.now(),
): ValidatedCredential {
  if (!credential) {
    throw new GatewayError("CredentialExpired", "No credential is stored for this session", {
      action: "Complete the Facebook login flow, then call connect_credential()",
    });
  }

  if (isExpired(credential, now)) {
    throw new GatewayError("CredentialExpired", "The stored credential has expired", {
      expired_at: new Date(credential.expiresAt ?? now).toISOString(),
      action: "Re-authenticate with Facebook to obtain a new token",
    });
  }

  const missing = missingScopes(credential.scopes, requiredScopes);
  if (missing.length > 0) {
    throw new GatewayError("InsufficientScope", `Credential is missing required scopes: ${missing.join(", ")}`, {
      missing,
      granted: [...credential.scopes],
    });
  }

  return { ...credential, credentialId: credentialIdOf(credential.token) };
}

export interface CredentialStatus {
  present: boolean;
  token?: string;
  expires_at?: string | null;
  is_expired?: boolean;
  expiring_soon?: boolean;
  days_remaining?: number | null;
  scopes?: string[];
  accounts_count?: number;
  user_id?: string | null;
  stored_at?: string;
}

export function describeCredential(
  credential: Credential | null,
  now: number,
  refreshWindowDays: number,
): CredentialStatus {
  if (!credential) return { present: false };

  const expired = isExpired(credential, now);
  const daysRemaining =
    credential.expiresAt === null ? null : Math.max(0, Math.floor((credential.expiresAt - now) / DAY_MS));

  return {
    present: true,
    token: redactToken(credential.token),
    expires_at: credential.expiresAt === null ? null : new Date(credential.expiresAt).toISOString(),
    is_expired: expired,
    expiring_soon: !expired && daysRemaining !== null && daysRemaining < refreshWindowDays,
    days_remaining: daysRemaining,
    scopes: [...credential.scopes],
    accounts_count: credential.accountIds.length,
    user_id: credential.userId,
    stored_at: new Date(credential.createdAt).toISOString(),
  };
}
