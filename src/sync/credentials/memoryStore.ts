import type { Credential } from "../types.js";
import {
  isExpired,
  normalizeUrl,
  type CredentialStore,
  type StoredCredential,
} from "./types.js";

export class MemoryCredentialStore implements CredentialStore {
  private records = new Map<string, StoredCredential>();

  constructor(initial: Record<string, Credential> = {}) {
    const savedAt = new Date().toISOString();
    for (const [url, credential] of Object.entries(initial)) {
      this.records.set(normalizeUrl(url), { url: normalizeUrl(url), credential, savedAt });
    }
  }

  async save(url: string, credential: Credential): Promise<void> {
    const key = normalizeUrl(url);
    this.records.set(key, { url: key, credential, savedAt: new Date().toISOString() });
  }

  async get(url: string): Promise<Credential | null> {
    return this.records.get(normalizeUrl(url))?.credential ?? null;
  }

  async remove(url: string): Promise<boolean> {
    return this.records.delete(normalizeUrl(url));
  }

  async list(): Promise<StoredCredential[]> {
    return [...this.records.values()].sort((a, b) => (a.url < b.url ? -1 : a.url > b.url ? 1 : 0));
  }

  async clearExpired(now: Date = new Date()): Promise<number> {
    let removed = 0;
    for (const [key, record] of this.records) {
      if (isExpired(record.credential, now)) {
        this.records.delete(key);
        removed++;
      }
    }
    return removed;
  }
}
