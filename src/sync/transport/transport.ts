import {
  AuthenticationError,
  CancelledError,
  ErrorCode,
  InvalidEndpointError,
} from "../../utils/errors.js";
import type { SyncContext } from "../context.js";
import type {
  EngineFetchResult,
  EnginePullResult,
  RefUpdateResult,
  RemoteTarget,
  TransferEngine,
} from "../engine/types.js";
import type { Protocol, RemoteEndpoint } from "../types.js";
import { POLICIES, type ProtocolPolicy } from "./policy.js";

export interface FetchOutcome extends EngineFetchResult {
  protocol: Protocol;
}

export type PullOutcome = EnginePullResult;

export type PushOutcome = RefUpdateResult;

export interface PushOptions {
  /** Commit to push; defaults to the local branch head */
  source?: string;
  /** Remote head observed by the last fetch, used as a lease */
  expectedRemoteHead?: string | null;
}

/**
 * A transport core parameterized by a protocol policy. The HTTP and SSH
 * variants share every line of transfer logic and differ only in the URL
 * predicate and the credential kinds they accept.
 */
export class Transport {
  constructor(
    readonly policy: ProtocolPolicy,
    private readonly engine: TransferEngine
  ) {}

  get protocol(): Protocol {
    return this.policy.name;
  }

  /**
   * Static check that the URL belongs to this transport. Never touches the network.
   */
  validateConnection(url: string): boolean {
    return url.trim().length > 0 && this.policy.accepts(url);
  }

  async listBranches(endpoint: RemoteEndpoint, ctx: SyncContext): Promise<string[]> {
    const remote = await this.prepare(endpoint, ctx);
    return this.engine.listRemoteBranches(remote, { signal: ctx.signal });
  }

  async fetch(
    endpoint: RemoteEndpoint,
    ctx: SyncContext,
    branch: string = endpoint.defaultBranch
  ): Promise<FetchOutcome> {
    const remote = await this.prepare(endpoint, ctx);
    ctx.logger.debug(`[Transport:${this.protocol}] fetch`, { url: endpoint.url, branch });
    const result = await this.engine.fetch(remote, branch, { signal: ctx.signal });
    return { ...result, protocol: this.protocol };
  }

  async pull(endpoint: RemoteEndpoint, branch: string, ctx: SyncContext): Promise<PullOutcome> {
    const remote = await this.prepare(endpoint, ctx);
    ctx.logger.debug(`[Transport:${this.protocol}] pull`, { url: endpoint.url, branch });
    return this.engine.pull(remote, branch, { signal: ctx.signal });
  }

  /**
   * Push `options.source` (or the local branch) to the remote branch.
   * The abort signal is checked before the push starts but never forwarded:
   * an atomic ref update runs to completion or is rejected in full.
   */
  async push(
    endpoint: RemoteEndpoint,
    branch: string,
    ctx: SyncContext,
    options: PushOptions = {}
  ): Promise<PushOutcome> {
    const remote = await this.prepare(endpoint, ctx);
    const source = options.source ?? `refs/heads/${branch}`;
    ctx.logger.debug(`[Transport:${this.protocol}] push`, { url: endpoint.url, branch, source });
    return this.engine.atomicUpdateRef(remote, branch, source, options.expectedRemoteHead);
  }

  private async prepare(endpoint: RemoteEndpoint, ctx: SyncContext): Promise<RemoteTarget> {
    if (!this.validateConnection(endpoint.url)) {
      throw new InvalidEndpointError(endpoint.url);
    }
    if (ctx.signal?.aborted) {
      throw new CancelledError();
    }

    const credential = await ctx.credentials.get(endpoint);
    if (!this.policy.credentialKinds.includes(credential.kind)) {
      throw new AuthenticationError(ErrorCode.AUTH_INCOMPATIBLE_CREDENTIAL, undefined, {
        url: endpoint.url,
      });
    }
    return { url: endpoint.url, credential };
  }
}

export function createTransports(engine: TransferEngine): Record<Protocol, Transport> {
  return {
    http: new Transport(POLICIES.http, engine),
    ssh: new Transport(POLICIES.ssh, engine),
  };
}
