import type { Credential, CredentialKind, Protocol } from "../types.js";

export interface StoredCredential {
  url: string;
  credential: Credential;
  /** ISO timestamp of the last save */
  savedAt: string;
}

/**
 * Persistent credential storage keyed by remote URL.
 */
export interface CredentialStore {
  save(url: string, credential: Credential): Promise<void>;
  get(url: string): Promise<Credential | null>;
  /** Returns false when nothing was stored for the URL */
  remove(url: string): Promise<boolean>;
  list(): Promise<StoredCredential[]>;
  /** Drops expired entries and returns how many were removed */
  clearExpired(now?: Date): Promise<number>;
}

export const CREDENTIAL_KINDS: Readonly<Record<Protocol, readonly CredentialKind[]>> = {
  http: ["basic", "token"],
  ssh: ["ssh-key", "ssh-agent"],
};

export function isCompatible(credential: Credential, protocol: Protocol): boolean {
  return CREDENTIAL_KINDS[protocol].includes(credential.kind);
}

export function isExpired(credential: Credential, now: Date = new Date()): boolean {
  if (!credential.expiresAt) return false;
  const expires = Date.parse(credential.expiresAt);
  return Number.isNaN(expires) || expires <= now.getTime();
}

export function normalizeUrl(url: string): string {
  return url.trim();
}
