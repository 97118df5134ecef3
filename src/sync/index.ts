/**
 * Version-control synchronization core.
 *
 * `createSyncService` wires the git engine, the credential provider, and the
 * orchestrator for one repository.
 */

import type { SyncConfig } from "../utils/config.js";
import { silentLogger, type LogSink } from "../utils/logger.js";
import { EncryptedFileCredentialStore } from "./credentials/fileStore.js";
import { CredentialProvider } from "./credentials/provider.js";
import type { CredentialStore } from "./credentials/types.js";
import { GitEngine } from "./engine/gitEngine.js";
import type { RepositoryLocks } from "./locks.js";
import { SyncOrchestrator } from "./orchestrator.js";

export interface SyncServiceOptions {
  repoPath: string;
  config?: Partial<SyncConfig>;
  logger?: LogSink;
  /** Defaults to the encrypted credential file in the config directory */
  store?: CredentialStore;
  locks?: RepositoryLocks;
}

export function createSyncService(options: SyncServiceOptions): SyncOrchestrator {
  const logger = options.logger ?? silentLogger;
  const engine = new GitEngine({
    repoPath: options.repoPath,
    remoteName: options.config?.remoteName,
    logger,
  });
  const provider = new CredentialProvider({
    store: options.store ?? new EncryptedFileCredentialStore(),
    logger,
  });
  return new SyncOrchestrator({
    repoPath: options.repoPath,
    repository: engine,
    transfer: engine,
    provider,
    config: options.config,
    logger,
    locks: options.locks,
  });
}

export { classifyRange, classifyWorkingTree, HEAD_SNAPSHOT, WORKTREE_SNAPSHOT } from "./changes.js";
export { classify, levenshteinDistance, DEFAULT_SIMILARITY_THRESHOLD } from "./classifier.js";
export type { ClassifyOptions } from "./classifier.js";
export { withSyncContext } from "./context.js";
export type { SyncContext } from "./context.js";
export * from "./credentials/index.js";
export { createEndpoint, deriveProtocol, hostOf, isHttpUrl, isSshUrl, sshToHttps } from "./endpoint.js";
export { GitEngine, credentialEnv, gitEnvironment } from "./engine/gitEngine.js";
export { classifyGitError } from "./engine/gitErrors.js";
export { lineSimilarity } from "./engine/similarity.js";
export type * from "./engine/types.js";
export { computeHunks, hunksOverlap, isNonConflicting, synthesizeMerge } from "./hunks.js";
export { RepositoryLocks, defaultRepositoryLocks } from "./locks.js";
export { SyncOrchestrator } from "./orchestrator.js";
export type { PhaseEvent, SyncOptions, SyncOrchestratorOptions } from "./orchestrator.js";
export { MergeConflictResolver, applyManualResolution, autoResolve } from "./resolver.js";
export * from "./transport/index.js";
export type * from "./types.js";
