import type { Credential, RemoteEndpoint } from "../types.js";
import type { CredentialProvider } from "./provider.js";

/**
 * Credential handle scoped to one sync call. Each URL is resolved through the
 * provider at most once; failures are not memoized.
 */
export class CredentialCache {
  private readonly resolved = new Map<string, Credential>();

  constructor(private readonly provider: CredentialProvider) {}

  async get(endpoint: RemoteEndpoint): Promise<Credential> {
    const cached = this.resolved.get(endpoint.url);
    if (cached) {
      return cached;
    }
    const credential = await this.provider.resolve(endpoint);
    this.resolved.set(endpoint.url, credential);
    return credential;
  }

  get size(): number {
    return this.resolved.size;
  }

  clear(): void {
    this.resolved.clear();
  }
}
