/**
 * Credential storage in an AES-256-GCM encrypted file.
 *
 * The key is derived with PBKDF2 from a machine-specific identifier, so the
 * file is only readable by the same user on the same host. Records are
 * validated on load; a file that fails to decrypt or validate is reported
 * as a read error rather than silently discarded.
 */

import crypto from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { getCredentialsPath } from "../../utils/config.js";
import { CredentialStoreError, ErrorCode } from "../../utils/errors.js";
import type { Credential } from "../types.js";
import {
  isExpired,
  normalizeUrl,
  type CredentialStore,
  type StoredCredential,
} from "./types.js";

// Encryption constants
const ALGORITHM = "aes-256-gcm";
const KEY_LENGTH = 32; // 256 bits
const IV_LENGTH = 16;
const AUTH_TAG_LENGTH = 16;
const SALT_LENGTH = 32;
const PBKDF2_ITERATIONS = 100000;

const expiresAt = z.string().optional();

const CredentialSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("basic"),
    username: z.string(),
    password: z.string(),
    expiresAt,
  }),
  z.object({
    kind: z.literal("token"),
    token: z.string().min(1),
    username: z.string().optional(),
    expiresAt,
  }),
  z.object({
    kind: z.literal("ssh-key"),
    privateKeyPath: z.string().min(1),
    publicKeyPath: z.string().optional(),
    passphrase: z.string().optional(),
    username: z.string().optional(),
    expiresAt,
  }),
  z.object({
    kind: z.literal("ssh-agent"),
    username: z.string().optional(),
    expiresAt,
  }),
]);

const CredentialFileSchema = z.object({
  version: z.literal(1),
  records: z.array(
    z.object({
      url: z.string().min(1),
      credential: CredentialSchema,
      savedAt: z.string(),
    })
  ),
});

export function defaultMachineId(): string {
  return [os.hostname(), os.userInfo().username, os.homedir(), os.platform(), os.arch()].join(":");
}

export interface EncryptedFileStoreOptions {
  /** Defaults to credentials.enc in the config directory */
  filePath?: string;
  /** Key material; defaults to the machine identifier */
  machineId?: string;
}

export class EncryptedFileCredentialStore implements CredentialStore {
  private readonly filePath: string;
  private readonly machineId: string;

  constructor(options: EncryptedFileStoreOptions = {}) {
    this.filePath = options.filePath ?? getCredentialsPath();
    this.machineId = options.machineId ?? defaultMachineId();
  }

  getFilePath(): string {
    return this.filePath;
  }

  async save(url: string, credential: Credential): Promise<void> {
    const records = await this.load();
    const key = normalizeUrl(url);
    records.set(key, { url: key, credential, savedAt: new Date().toISOString() });
    await this.persist(records);
  }

  async get(url: string): Promise<Credential | null> {
    const records = await this.load();
    return records.get(normalizeUrl(url))?.credential ?? null;
  }

  async remove(url: string): Promise<boolean> {
    const records = await this.load();
    if (!records.delete(normalizeUrl(url))) {
      return false;
    }
    await this.persist(records);
    return true;
  }

  async list(): Promise<StoredCredential[]> {
    const records = await this.load();
    return [...records.values()].sort((a, b) => (a.url < b.url ? -1 : a.url > b.url ? 1 : 0));
  }

  async clearExpired(now: Date = new Date()): Promise<number> {
    const records = await this.load();
    let removed = 0;
    for (const [key, record] of records) {
      if (isExpired(record.credential, now)) {
        records.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      await this.persist(records);
    }
    return removed;
  }

  // ==================== File I/O ====================

  private async load(): Promise<Map<string, StoredCredential>> {
    let data: Buffer;
    try {
      data = await fs.readFile(this.filePath);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return new Map();
      }
      throw new CredentialStoreError(ErrorCode.CREDENTIAL_STORE_READ, undefined, {
        cause: error instanceof Error ? error : undefined,
        path: this.filePath,
      });
    }

    let parsed: z.infer<typeof CredentialFileSchema>;
    try {
      parsed = CredentialFileSchema.parse(JSON.parse(this.decrypt(data)));
    } catch (error) {
      throw new CredentialStoreError(ErrorCode.CREDENTIAL_STORE_READ, undefined, {
        cause: error instanceof Error ? error : undefined,
        path: this.filePath,
      });
    }

    return new Map(parsed.records.map((record) => [record.url, record]));
  }

  private async persist(records: Map<string, StoredCredential>): Promise<void> {
    const payload = JSON.stringify({ version: 1, records: [...records.values()] });
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, this.encrypt(payload), { mode: 0o600 });
    } catch (error) {
      throw new CredentialStoreError(ErrorCode.CREDENTIAL_STORE_WRITE, undefined, {
        cause: error instanceof Error ? error : undefined,
        path: this.filePath,
      });
    }
  }

  private deriveKey(salt: Buffer): Buffer {
    return crypto.pbkdf2Sync(this.machineId, salt, PBKDF2_ITERATIONS, KEY_LENGTH, "sha256");
  }

  private encrypt(plaintext: string): Buffer {
    const salt = crypto.randomBytes(SALT_LENGTH);
    const key = this.deriveKey(salt);
    const iv = crypto.randomBytes(IV_LENGTH);

    const cipher = crypto.createCipheriv(ALGORITHM, key, iv);
    const encrypted = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
    const authTag = cipher.getAuthTag();

    // Format: salt (32) + iv (16) + authTag (16) + encrypted data
    return Buffer.concat([salt, iv, authTag, encrypted]);
  }

  private decrypt(data: Buffer): string {
    if (data.length < SALT_LENGTH + IV_LENGTH + AUTH_TAG_LENGTH) {
      throw new Error("Invalid encrypted data format");
    }

    const salt = data.subarray(0, SALT_LENGTH);
    const iv = data.subarray(SALT_LENGTH, SALT_LENGTH + IV_LENGTH);
    const authTag = data.subarray(SALT_LENGTH + IV_LENGTH, SALT_LENGTH + IV_LENGTH + AUTH_TAG_LENGTH);
    const encrypted = data.subarray(SALT_LENGTH + IV_LENGTH + AUTH_TAG_LENGTH);

    const decipher = crypto.createDecipheriv(ALGORITHM, this.deriveKey(salt), iv);
    decipher.setAuthTag(authTag);

    return decipher.update(encrypted, undefined, "utf8") + decipher.final("utf8");
  }
}
