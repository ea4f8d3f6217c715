import { dirname } from "path";
import { chmodSync, existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";

import { GatewayError } from "../errors.js";
import { logger } from "../utils.js";
import {
  type Credential,
  type CredentialFile,
  STORE_VERSION,
  credentialFileSchema,
  fromStored,
  toStored,
} from "./types.js";

/**
 * Durable holder of one credential per session. `put` replaces whatever the
 * session held before; it never merges scopes or accounts.
 */
export interface CredentialStore {
  get(sessionId: string): Promise<Credential | null>;
  put(sessionId: string, credential: Credential): Promise<void>;
  invalidate(sessionId: string): Promise<void>;
}

function copyCredential(credential: Credential): Credential {
  return { ...credential, scopes: [...credential.scopes], accountIds: [...credential.accountIds] };
}

/**
 * JSON file store (mode 0600 inside a 0700 directory).
 *
 * Each operation reads and writes the file synchronously, so a put or an
 * invalidate is never interleaved with another operation in this process.
 * Writes go to a temporary file that is renamed over the old one; a reader
 * sees either the previous file or the new one.
 */
export class FileCredentialStore implements CredentialStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async get(sessionId: string): Promise<Credential | null> {
    const file = this.readFile();
    const stored = file?.sessions[sessionId];
    return stored ? fromStored(stored) : null;
  }

  async put(sessionId: string, credential: Credential): Promise<void> {
    const file = this.readFile() ?? { version: STORE_VERSION, sessions: {} };
    file.sessions[sessionId] = toStored(credential);
    this.writeFile(file);
    logger.info(`[credentials] stored credential for session ${sessionId}`);
  }

  async invalidate(sessionId: string): Promise<void> {
    const file = this.readFile();
    if (!file || !file.sessions[sessionId]) return;
    delete file.sessions[sessionId];
    this.writeFile(file);
    logger.info(`[credentials] invalidated credential for session ${sessionId}`);
  }

  private readFile(): CredentialFile | null {
    let content: string;
    try {
      if (!existsSync(this.filePath)) return null;
      content = readFileSync(this.filePath, "utf-8");
    } catch (error) {
      throw new GatewayError("StorageUnavailable", `Cannot read credential store at ${this.filePath}`, undefined, {
        cause: error,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new GatewayError("StorageUnavailable", `Credential store at ${this.filePath} is not valid JSON`, undefined, {
        cause: error,
      });
    }

    const parsed = credentialFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new GatewayError("StorageUnavailable", `Credential store at ${this.filePath} has an unexpected shape`, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }
    return parsed.data;
  }

  private writeFile(file: CredentialFile): void {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      const dir = dirname(this.filePath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true, mode: 0o700 });
      }
      writeFileSync(tempPath, JSON.stringify(file, null, 2), { encoding: "utf-8", mode: 0o600 });
      renameSync(tempPath, this.filePath);
      chmodSync(this.filePath, 0o600);
    } catch (error) {
      throw new GatewayError("StorageUnavailable", `Cannot write credential store at ${this.filePath}`, undefined, {
        cause: error,
      });
    }
  }
}

/**
 * Process-local store; used when persistence is handled elsewhere and in tests.
 */
export class MemoryCredentialStore implements CredentialStore {
  private readonly credentials = new Map<string, Credential>();

  async get(sessionId: string): Promise<Credential | null> {
    const credential = this.credentials.get(sessionId);
    return credential ? copyCredential(credential) : null;
  }

  async put(sessionId: string, credential: Credential): Promise<void> {
    this.credentials.set(sessionId, copyCredential(credential));
  }

  async invalidate(sessionId: string): Promise<void> {
    this.credentials.delete(sessionId);
  }
}
