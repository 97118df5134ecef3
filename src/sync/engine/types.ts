/**
 * Primitives the sync core consumes from the underlying version-control engine.
 */

import type { ConflictEntry, Credential, SnapshotEntry } from "../types.js";

export interface RemoteTarget {
  url: string;
  credential: Credential;
}

export interface TransferOptions {
  signal?: AbortSignal;
}

export interface EngineFetchResult {
  branch: string;
  /** Null when the branch does not exist on the remote */
  remoteHead: string | null;
}

export interface EnginePullResult {
  branch: string;
  previousHead: string | null;
  head: string;
  fastForward: boolean;
}

export type RefUpdateResult =
  | { status: "updated"; branch: string; commit: string }
  | { status: "up-to-date"; branch: string; commit: string };

export interface TransferEngine {
  listRemoteBranches(remote: RemoteTarget, options?: TransferOptions): Promise<string[]>;
  fetch(remote: RemoteTarget, branch: string, options?: TransferOptions): Promise<EngineFetchResult>;
  /**
   * Fetch and fast-forward the local branch.
   * @throws {NonFastForwardError} when local and remote history diverged
   */
  pull(remote: RemoteTarget, branch: string, options?: TransferOptions): Promise<EnginePullResult>;
  /**
   * All-or-nothing update of a remote branch. Never interrupted once started.
   * @throws {NonFastForwardError} when the remote is not at `expectedOld`
   */
  atomicUpdateRef(
    remote: RemoteTarget,
    branch: string,
    newCommit: string,
    expectedOld?: string | null
  ): Promise<RefUpdateResult>;
}

export interface MergeRequest {
  /** Common ancestor; computed by the engine when omitted */
  base?: string;
  ours: string;
  theirs: string;
  /** Merged content per path, applied on top of the automatic merge */
  resolutions?: ReadonlyMap<string, string>;
}

export type MergeResult =
  | { status: "clean"; commit: string }
  | { status: "conflicts"; conflicts: ConflictEntry[] };

export type SnapshotRef = { type: "commit"; rev: string } | { type: "worktree" };

export interface RepositoryEngine {
  /** Commit a ref points at, or null when it does not exist */
  resolveHead(ref?: string): Promise<string | null>;
  /** Remote-tracking ref for a fetched branch */
  remoteTrackingRef(branch: string): string;
  threeWayMerge(request: MergeRequest): Promise<MergeResult>;
  /** Move the local branch to `commit` after a successful push */
  updateLocalBranch(branch: string, commit: string): Promise<void>;
  diffSnapshots(oldRef: SnapshotRef, newRef: SnapshotRef): Promise<SnapshotEntry[]>;
  readContent(ref: SnapshotRef, path: string): Promise<string | null>;
  /**
   * Read many committed blobs at once. Names are object ids or `rev:path`;
   * a name that is missing or not a blob maps to null.
   */
  readBlobs(names: readonly string[]): Promise<Map<string, string | null>>;
  /** URL configured for a named remote, or null when there is no such remote */
  getRemoteUrl(name: string): Promise<string | null>;
  computeSimilarity(contentA: string, contentB: string): number;
}
