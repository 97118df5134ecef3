import { AuthenticationError, ErrorCode } from "../../utils/errors.js";
import { silentLogger, type LogSink } from "../../utils/logger.js";
import { hostOf } from "../endpoint.js";
import type { Credential, RemoteEndpoint } from "../types.js";
import { isCompatible, isExpired, type CredentialStore } from "./types.js";

export interface CredentialProviderOptions {
  store: CredentialStore;
  /** Environment consulted after the store; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  logger?: LogSink;
  now?: () => Date;
}

/**
 * Resolves authentication material for a remote. Performs no network I/O.
 *
 * Lookup order: exact URL in the store, a stored credential for the same
 * host, environment variables, then (SSH only) a running SSH agent.
 * Credentials of the wrong kind for the protocol, and expired ones, are skipped.
 */
export class CredentialProvider {
  private readonly store: CredentialStore;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: LogSink;
  private readonly now: () => Date;

  constructor(options: CredentialProviderOptions) {
    this.store = options.store;
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async resolve(endpoint: RemoteEndpoint): Promise<Credential> {
    if (!endpoint.url.trim()) {
      throw new AuthenticationError(ErrorCode.AUTH_NO_CREDENTIAL, undefined, { url: endpoint.url });
    }

    const usable = (credential: Credential | null): credential is Credential =>
      credential !== null &&
      isCompatible(credential, endpoint.protocol) &&
      !isExpired(credential, this.now());

    const exact = await this.store.get(endpoint.url);
    if (usable(exact)) {
      this.logger.debug("[Credentials] Using stored credential", { url: endpoint.url, kind: exact.kind });
      return exact;
    }

    const host = hostOf(endpoint.url);
    if (host) {
      const sameHost = (await this.store.list()).find(
        (record) => hostOf(record.url) === host && usable(record.credential)
      );
      if (sameHost) {
        this.logger.debug("[Credentials] Using credential stored for host", {
          host,
          kind: sameHost.credential.kind,
        });
        return sameHost.credential;
      }
    }

    const fromEnv = this.fromEnvironment(endpoint);
    if (fromEnv) {
      this.logger.debug("[Credentials] Using credential from environment", { kind: fromEnv.kind });
      return fromEnv;
    }

    this.logger.warn("[Credentials] No credential found", { url: endpoint.url });
    throw new AuthenticationError(ErrorCode.AUTH_NO_CREDENTIAL, undefined, { url: endpoint.url });
  }

  private fromEnvironment(endpoint: RemoteEndpoint): Credential | null {
    const env = this.env;

    if (endpoint.protocol === "http") {
      if (env.REPOSYNC_TOKEN) {
        return { kind: "token", token: env.REPOSYNC_TOKEN, username: env.REPOSYNC_USERNAME };
      }
      if (env.REPOSYNC_USERNAME && env.REPOSYNC_PASSWORD) {
        return { kind: "basic", username: env.REPOSYNC_USERNAME, password: env.REPOSYNC_PASSWORD };
      }
      return null;
    }

    if (env.REPOSYNC_SSH_KEY) {
      return {
        kind: "ssh-key",
        privateKeyPath: env.REPOSYNC_SSH_KEY,
        passphrase: env.REPOSYNC_SSH_PASSPHRASE,
      };
    }
    if (env.SSH_AUTH_SOCK) {
      return { kind: "ssh-agent" };
    }
    return null;
  }
}
