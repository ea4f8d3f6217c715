import { z } from "zod";

/**
 * A long-lived Graph API credential as produced by the OAuth web flow.
 * `expiresAt` is null for tokens that stay valid until revoked.
 */
export interface Credential {
  token: string;
  expiresAt: number | null;
  scopes: readonly string[];
  accountIds: readonly string[];
  userId: string | null;
  createdAt: number;
}

/** A credential that passed the local liveness and scope checks. */
export interface ValidatedCredential extends Credential {
  /** Stable identifier used for rate-limit and cache keys; never the raw token. */
  credentialId: string;
}

export const STORE_VERSION = 1;

const storedCredentialSchema = z.object({
  token: z.string().min(1),
  expires_at: z.string().datetime().nullable(),
  scopes: z.array(z.string()),
  account_ids: z.array(z.string()),
  user_id: z.string().nullable(),
  created_at: z.string().datetime(),
});

export const credentialFileSchema = z.object({
  version: z.literal(STORE_VERSION),
  sessions: z.record(storedCredentialSchema),
});

export type StoredCredential = z.infer<typeof storedCredentialSchema>;
export type CredentialFile = z.infer<typeof credentialFileSchema>;

export function toStored(credential: Credential): StoredCredential {
  return {
    token: credential.token,
    expires_at: credential.expiresAt === null ? null : new Date(credential.expiresAt).toISOString(),
    scopes: [...credential.scopes],
    account_ids: [...credential.accountIds],
    user_id: credential.userId,
    created_at: new Date(credential.createdAt).toISOString(),
  };
}

export function fromStored(stored: StoredCredential): Credential {
  return {
    token: stored.token,
    expiresAt: stored.expires_at === null ? null : Date.parse(stored.expires_at),
    scopes: stored.scopes,
    accountIds: stored.account_ids,
    userId: stored.user_id,
    createdAt: Date.parse(stored.created_at),
  };
}
