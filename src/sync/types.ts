import type { ErrorKind } from "../utils/errors.js";

// ==================== Endpoint ====================

export type Protocol = "http" | "ssh";

export interface RemoteEndpoint {
  readonly url: string;
  readonly protocol: Protocol;
  readonly defaultBranch: string;
}

// ==================== Credentials ====================

interface CredentialBase {
  /** ISO timestamp; expired credentials are never handed out */
  expiresAt?: string;
}

export interface BasicCredential extends CredentialBase {
  kind: "basic";
  username: string;
  password: string;
}

export interface TokenCredential extends CredentialBase {
  kind: "token";
  token: string;
  username?: string;
}

export interface SshKeyCredential extends CredentialBase {
  kind: "ssh-key";
  privateKeyPath: string;
  publicKeyPath?: string;
  passphrase?: string;
  username?: string;
}

export interface SshAgentCredential extends CredentialBase {
  kind: "ssh-agent";
  username?: string;
}

export type Credential =
  | BasicCredential
  | TokenCredential
  | SshKeyCredential
  | SshAgentCredential;

export type CredentialKind = Credential["kind"];

// ==================== Changes ====================

/**
 * One path of a snapshot comparison. A null hash means the path is absent
 * from that side.
 */
export interface SnapshotEntry {
  path: string;
  oldHash: string | null;
  newHash: string | null;
}

export type ChangeKind = "new" | "modified" | "deleted" | "renamed" | "copied";

export interface ChangeRecord {
  path: string;
  kind: ChangeKind;
  /** Set iff kind is "renamed" or "copied" */
  previousPath?: string;
}

// ==================== Merge ====================

/**
 * Replaces `length` base lines starting at 1-based line `start` with `lines`.
 * A zero length is an insertion before `start`. Lines keep their "\n"
 * terminators; only a last line without one lacks it.
 */
export interface Hunk {
  start: number;
  length: number;
  lines: string[];
}

export interface ConflictEntry {
  path: string;
  oursHunks: Hunk[];
  theirsHunks: Hunk[];
  resolved: boolean;
  baseContent?: string;
  oursContent?: string;
  theirsContent?: string;
  /** Content written for the path once resolved */
  mergedContent?: string;
}

export type ResolverState =
  | "idle"
  | "merge-in-progress"
  | "clean"
  | "conflicts-detected"
  | "auto-resolving"
  | "manual-resolution-required";

export type MergeOutcome = "clean" | "conflicts-remain" | "aborted";

export interface MergeAttempt {
  attemptNumber: number;
  conflicts: ConflictEntry[];
  outcome: MergeOutcome;
  /** Merge commit produced by a clean attempt */
  mergedCommit?: string;
  /** States visited during the attempt, in order */
  states: ResolverState[];
}

/**
 * Caller-supplied resolution for one conflicted path.
 */
export type ManualResolution =
  | { path: string; strategy: "ours" }
  | { path: string; strategy: "theirs" }
  | { path: string; strategy: "content"; content: string };

// ==================== Sync ====================

export type SyncOutcome = "synced" | "conflicts-remain" | "failed" | "cancelled";

export type SyncPhase =
  | "fetching"
  | "merging"
  | "resolving"
  | "classifying"
  | "pushing"
  | "done";

export interface SyncResult {
  readonly fetched: boolean;
  readonly merged: boolean;
  readonly pushed: boolean;
  readonly unresolvedConflicts: readonly ConflictEntry[];
  readonly error?: ErrorKind;
  readonly errorMessage?: string;
  readonly outcome: SyncOutcome;
  readonly branch?: string;
  readonly attempts: readonly MergeAttempt[];
  /** Changes brought in by the merge, for display */
  readonly changes: readonly ChangeRecord[];
}
