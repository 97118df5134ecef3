/**
 * Sync Orchestrator
 *
 * Sequences fetch → merge attempts → classify → push for one repository and
 * turns every outcome into a frozen SyncResult. Callers never see raw
 * transport errors.
 *
 * Retry policy: a further merge attempt is made only when something new has
 * arrived. After an attempt ends with conflicts the remote is fetched again and
 * the merge is retried only if the remote head moved. A push rejected as
 * non-fast-forward is followed by a fetch and a new attempt. Transient network
 * failures of the fetch or push step are retried once. A failed re-fetch after
 * conflicts ends the sync with those conflicts rather than an error.
 *
 * The remote is given as a URL or as the name of a configured remote; it
 * defaults to `remoteName` from the configuration.
 */

import { EventEmitter } from "node:events";
import { resolveConfig, type SyncConfig } from "../utils/config.js";
import {
  CancelledError,
  ErrorCode,
  InvalidEndpointError,
  NetworkError,
  NonFastForwardError,
  SyncError,
  errorKindOf,
} from "../utils/errors.js";
import { silentLogger, type LogSink } from "../utils/logger.js";
import { classifyRange, classifyWorkingTree } from "./changes.js";
import { withSyncContext, type SyncContext } from "./context.js";
import type { CredentialProvider } from "./credentials/provider.js";
import { createEndpoint, isRemoteName } from "./endpoint.js";
import type { RepositoryEngine, TransferEngine } from "./engine/types.js";
import { RepositoryLocks, defaultRepositoryLocks } from "./locks.js";
import { MergeConflictResolver } from "./resolver.js";
import { createTransports, type PullOutcome, type Transport } from "./transport/transport.js";
import type {
  ChangeRecord,
  ConflictEntry,
  ManualResolution,
  MergeAttempt,
  Protocol,
  RemoteEndpoint,
  SyncOutcome,
  SyncPhase,
  SyncResult,
} from "./types.js";

export interface SyncOrchestratorOptions {
  repoPath: string;
  repository: RepositoryEngine;
  transfer: TransferEngine;
  provider: CredentialProvider;
  config?: Partial<SyncConfig>;
  logger?: LogSink;
  locks?: RepositoryLocks;
  /** Injected for tests; defaults to a timer */
  sleep?: (ms: number) => Promise<void>;
}

export interface SyncOptions {
  signal?: AbortSignal;
  resolutions?: readonly ManualResolution[];
  autoResolve?: boolean;
  maxRetries?: number;
}

export interface PhaseEvent {
  phase: SyncPhase;
  url: string;
  branch?: string;
  attempt?: number;
}

interface Progress {
  fetched: boolean;
  merged: boolean;
  pushed: boolean;
  branch?: string;
  attempts: MergeAttempt[];
  changes: ChangeRecord[];
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function freezeResult(
  progress: Progress,
  outcome: SyncOutcome,
  extra: { unresolvedConflicts?: ConflictEntry[]; error?: unknown } = {}
): SyncResult {
  const result: SyncResult = {
    fetched: progress.fetched,
    merged: progress.merged,
    pushed: progress.pushed,
    unresolvedConflicts: Object.freeze([...(extra.unresolvedConflicts ?? [])]),
    outcome,
    branch: progress.branch,
    attempts: Object.freeze([...progress.attempts]),
    changes: Object.freeze([...progress.changes]),
    ...(extra.error !== undefined
      ? {
          error: errorKindOf(extra.error),
          errorMessage: extra.error instanceof Error ? extra.error.message : String(extra.error),
        }
      : {}),
  };
  return Object.freeze(result);
}

/**
 * A merge made but never pushed is dropped on cancellation; its attempt is
 * recorded as aborted.
 */
function discardUnpushedMerge(progress: Progress): void {
  const index = progress.attempts.length - 1;
  const last = progress.attempts[index];
  if (progress.pushed || last === undefined || last.outcome !== "clean") {
    return;
  }
  progress.attempts[index] = {
    attemptNumber: last.attemptNumber,
    conflicts: last.conflicts,
    outcome: "aborted",
    states: last.states,
  };
}

export interface SyncOrchestrator {
  on(event: "phase", listener: (event: PhaseEvent) => void): this;
  on(event: "attempt", listener: (attempt: MergeAttempt) => void): this;
  emit(event: "phase", payload: PhaseEvent): boolean;
  emit(event: "attempt", payload: MergeAttempt): boolean;
}

export class SyncOrchestrator extends EventEmitter {
  private readonly repoPath: string;
  private readonly repository: RepositoryEngine;
  private readonly provider: CredentialProvider;
  private readonly config: Readonly<SyncConfig>;
  private readonly logger: LogSink;
  private readonly locks: RepositoryLocks;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly transports: Record<Protocol, Transport>;

  constructor(options: SyncOrchestratorOptions) {
    super();
    this.repoPath = options.repoPath;
    this.repository = options.repository;
    this.provider = options.provider;
    this.config = Object.freeze(resolveConfig(options.config ?? {}));
    this.logger = options.logger ?? silentLogger;
    this.locks = options.locks ?? defaultRepositoryLocks;
    this.sleep = options.sleep ?? defaultSleep;
    this.transports = createTransports(options.transfer);
  }

  getConfig(): Readonly<SyncConfig> {
    return this.config;
  }

  transportFor(endpoint: RemoteEndpoint): Transport {
    return this.transports[endpoint.protocol];
  }

  // ==================== Public API ====================

  async sync(remote?: string, branch?: string, options: SyncOptions = {}): Promise<SyncResult> {
    const progress: Progress = { fetched: false, merged: false, pushed: false, attempts: [], changes: [] };

    let endpoint: RemoteEndpoint;
    try {
      endpoint = await this.resolveEndpoint(remote);
    } catch (error) {
      this.logger.error("[Sync] Invalid endpoint", error);
      return freezeResult(progress, "failed", { error });
    }

    const release = this.locks.tryAcquire(this.repoPath);
    if (!release) {
      const error = new SyncError(ErrorCode.SYNC_IN_PROGRESS);
      this.logger.warn("[Sync] Another sync is running", { repoPath: this.repoPath });
      return freezeResult(progress, "failed", { error });
    }

    try {
      return await withSyncContext(
        { logger: this.logger, provider: this.provider, signal: options.signal },
        (ctx) => this.run(ctx, endpoint, branch, options, progress)
      );
    } catch (error) {
      const cancelled = error instanceof CancelledError;
      if (cancelled) {
        discardUnpushedMerge(progress);
        this.logger.info("[Sync] Cancelled", { url: endpoint.url });
      } else {
        this.logger.error("[Sync] Failed", error);
      }
      return freezeResult(progress, cancelled ? "cancelled" : "failed", { error });
    } finally {
      release();
    }
  }

  /**
   * Fast-forward the local branch to the remote one.
   * @throws {NonFastForwardError} when the histories diverged; use sync() instead
   */
  async pull(remote?: string, branch?: string, signal?: AbortSignal): Promise<PullOutcome> {
    const endpoint = await this.resolveEndpoint(remote);
    const release = this.locks.tryAcquire(this.repoPath);
    if (!release) {
      throw new SyncError(ErrorCode.SYNC_IN_PROGRESS);
    }
    try {
      return await withSyncContext({ logger: this.logger, provider: this.provider, signal }, async (ctx) => {
        const transport = this.transportFor(endpoint);
        const target = branch ?? (await this.resolveBranch(transport, endpoint, ctx));
        return transport.pull(endpoint, target, ctx);
      });
    } finally {
      release();
    }
  }

  classifyWorkingTree(): Promise<ChangeRecord[]> {
    return classifyWorkingTree(this.repository, this.config.renameSimilarityThreshold);
  }

  /**
   * Endpoint for a URL, or for the URL a named remote points at.
   * @throws {InvalidEndpointError} for a malformed URL or an unknown remote name
   */
  async resolveEndpoint(remote: string = this.config.remoteName): Promise<RemoteEndpoint> {
    if (!isRemoteName(remote)) {
      return createEndpoint(remote, this.config.defaultBranch);
    }
    const name = remote.trim();
    const url = await this.repository.getRemoteUrl(name);
    if (url === null) {
      throw new InvalidEndpointError(name, { code: ErrorCode.ENDPOINT_REMOTE_UNKNOWN });
    }
    this.logger.debug("[Sync] Resolved remote", { remote: name, url });
    return createEndpoint(url, this.config.defaultBranch);
  }

  // ==================== Pipeline ====================

  private async run(
    ctx: SyncContext,
    endpoint: RemoteEndpoint,
    requestedBranch: string | undefined,
    options: SyncOptions,
    progress: Progress
  ): Promise<SyncResult> {
    const transport = this.transportFor(endpoint);
    const maxAttempts = options.maxRetries ?? this.config.maxMergeConflictRetries;
    const autoResolve = options.autoResolve ?? this.config.autoResolveNonConflicting;
    const resolver = new MergeConflictResolver(this.repository, { maxAttempts, logger: ctx.logger });

    this.checkCancelled(ctx);
    this.emitPhase("fetching", endpoint, requestedBranch);
    const branch = requestedBranch ?? (await this.resolveBranch(transport, endpoint, ctx));
    progress.branch = branch;

    let fetched = await this.withNetworkRetry(ctx, "fetch", () => transport.fetch(endpoint, ctx, branch));
    progress.fetched = true;

    const ours = await this.repository.resolveHead(`refs/heads/${branch}`);
    let theirs = fetched.remoteHead;

    if (ours === null) {
      if (theirs === null) {
        throw new SyncError(ErrorCode.GIT_COMMAND_FAILED, `Branch "${branch}" exists neither locally nor on the remote`);
      }
      // Nothing local to merge or push: adopt the remote branch.
      this.checkCancelled(ctx);
      await this.repository.updateLocalBranch(branch, theirs);
      progress.merged = true;
      this.emitPhase("done", endpoint, branch);
      return freezeResult(progress, "synced");
    }

    let attemptNumber = 0;
    for (;;) {
      this.checkCancelled(ctx);

      let mergedCommit: string;
      if (theirs === null) {
        // New remote branch; our head is pushed as is.
        mergedCommit = ours;
      } else {
        attemptNumber++;
        this.emitPhase("merging", endpoint, branch, attemptNumber);
        const attempt = await resolver.runAttempt(
          attemptNumber,
          { ours, theirs },
          { autoResolve, resolutions: options.resolutions, signal: ctx.signal }
        );
        progress.attempts.push(attempt);
        this.emit("attempt", attempt);
        if (attempt.outcome === "aborted") {
          throw new CancelledError();
        }
        if (attempt.conflicts.length > 0) {
          this.emitPhase("resolving", endpoint, branch, attemptNumber);
        }

        if (attempt.outcome !== "clean" || attempt.mergedCommit === undefined) {
          const unresolved = attempt.conflicts.filter((c) => !c.resolved);
          if (attemptNumber >= maxAttempts) {
            return freezeResult(progress, "conflicts-remain", { unresolvedConflicts: unresolved });
          }
          this.checkCancelled(ctx);
          try {
            fetched = await this.withNetworkRetry(ctx, "fetch", () => transport.fetch(endpoint, ctx, branch));
          } catch (error) {
            if (error instanceof CancelledError) {
              throw error;
            }
            ctx.logger.warn("[Sync] Could not check the remote for new changes", {
              attemptNumber,
              message: error instanceof Error ? error.message : String(error),
            });
            return freezeResult(progress, "conflicts-remain", { unresolvedConflicts: unresolved });
          }
          if (fetched.remoteHead === theirs) {
            ctx.logger.info("[Sync] Remote unchanged; conflicts need manual resolution", {
              attemptNumber,
              paths: unresolved.map((c) => c.path),
            });
            return freezeResult(progress, "conflicts-remain", { unresolvedConflicts: unresolved });
          }
          theirs = fetched.remoteHead;
          continue;
        }
        mergedCommit = attempt.mergedCommit;
      }
      progress.merged = true;

      this.checkCancelled(ctx);
      this.emitPhase("classifying", endpoint, branch, attemptNumber);
      progress.changes = await classifyRange(
        this.repository,
        { type: "commit", rev: ours },
        { type: "commit", rev: mergedCommit },
        this.config.renameSimilarityThreshold
      );

      // Last point at which cancellation is honoured.
      this.checkCancelled(ctx);
      this.emitPhase("pushing", endpoint, branch, attemptNumber);
      const remoteHead = theirs;
      try {
        await this.withNetworkRetry(ctx, "push", () =>
          transport.push(endpoint, branch, ctx, { source: mergedCommit, expectedRemoteHead: remoteHead })
        );
      } catch (error) {
        if (!(error instanceof NonFastForwardError) || attemptNumber >= maxAttempts) {
          throw error;
        }
        ctx.logger.info("[Sync] Remote moved during sync; fetching again", { branch });
        progress.merged = false;
        progress.changes = [];
        fetched = await this.withNetworkRetry(ctx, "fetch", () => transport.fetch(endpoint, ctx, branch));
        theirs = fetched.remoteHead;
        continue;
      }
      progress.pushed = true;

      await this.repository.updateLocalBranch(branch, mergedCommit);
      this.emitPhase("done", endpoint, branch, attemptNumber);
      ctx.logger.info("[Sync] Synchronized", { branch, commit: mergedCommit });
      return freezeResult(progress, "synced");
    }
  }

  /**
   * Configured default branch, or the fallback when only that exists remotely.
   */
  private async resolveBranch(transport: Transport, endpoint: RemoteEndpoint, ctx: SyncContext): Promise<string> {
    const branches = await this.withNetworkRetry(ctx, "list branches", () =>
      transport.listBranches(endpoint, ctx)
    );
    if (branches.includes(this.config.defaultBranch)) {
      return this.config.defaultBranch;
    }
    if (branches.includes(this.config.fallbackBranch)) {
      ctx.logger.debug("[Sync] Default branch missing; using fallback", {
        fallback: this.config.fallbackBranch,
      });
      return this.config.fallbackBranch;
    }
    return this.config.defaultBranch;
  }

  private async withNetworkRetry<T>(ctx: SyncContext, step: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof NetworkError)) {
        throw error;
      }
      ctx.logger.warn(`[Sync] ${step} failed; retrying once`, { message: error.message });
      await this.sleep(this.config.networkRetryDelayMs);
      return fn();
    }
  }

  private checkCancelled(ctx: SyncContext): void {
    if (ctx.signal?.aborted) {
      throw new CancelledError();
    }
  }

  private emitPhase(phase: SyncPhase, endpoint: RemoteEndpoint, branch?: string, attempt?: number): void {
    this.emit("phase", { phase, url: endpoint.url, branch, attempt });
  }
}
