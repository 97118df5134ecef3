/**
 * Merge Conflict Resolver
 *
 * Drives one merge attempt at a time through
 *   idle → merge-in-progress → clean | conflicts-detected
 *   conflicts-detected → auto-resolving → clean | manual-resolution-required
 *
 * The resolver never retries on its own. Whether a further attempt is
 * worthwhile is decided by the orchestrator. An attempt whose signal is
 * aborted before the resolved re-merge ends with outcome "aborted".
 */

import { ErrorCode, SyncError } from "../utils/errors.js";
import { silentLogger, type LogSink } from "../utils/logger.js";
import type { MergeRequest, RepositoryEngine } from "./engine/types.js";
import { isNonConflicting, synthesizeMerge } from "./hunks.js";
import type {
  ConflictEntry,
  ManualResolution,
  MergeAttempt,
  ResolverState,
} from "./types.js";

export const DEFAULT_MAX_MERGE_ATTEMPTS = 3;

export interface ResolverOptions {
  maxAttempts?: number;
  logger?: LogSink;
}

export interface AttemptOptions {
  autoResolve: boolean;
  resolutions?: readonly ManualResolution[];
  signal?: AbortSignal;
}

/**
 * Auto-resolve one entry when its hunks are disjoint. Returns a new entry;
 * overlapping entries come back unchanged.
 */
export function autoResolve(entry: ConflictEntry): ConflictEntry {
  if (entry.resolved || entry.baseContent === undefined || !isNonConflicting(entry)) {
    return entry;
  }
  return {
    ...entry,
    resolved: true,
    mergedContent: synthesizeMerge(entry.baseContent, entry.oursHunks, entry.theirsHunks),
  };
}

/**
 * Apply a caller-supplied resolution. Returns null when the chosen side has
 * no content to take.
 */
export function applyManualResolution(
  entry: ConflictEntry,
  resolution: ManualResolution
): ConflictEntry | null {
  let content: string | undefined;
  switch (resolution.strategy) {
    case "ours":
      content = entry.oursContent;
      break;
    case "theirs":
      content = entry.theirsContent;
      break;
    case "content":
      content = resolution.content;
      break;
  }
  if (content === undefined) {
    return null;
  }
  return { ...entry, resolved: true, mergedContent: content };
}

export class MergeConflictResolver {
  private state: ResolverState = "idle";
  private lastAttemptNumber = 0;
  private readonly maxAttempts: number;
  private readonly logger: LogSink;

  constructor(
    private readonly engine: RepositoryEngine,
    options: ResolverOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_MERGE_ATTEMPTS;
    this.logger = options.logger ?? silentLogger;
  }

  getState(): ResolverState {
    return this.state;
  }

  getMaxAttempts(): number {
    return this.maxAttempts;
  }

  /**
   * Run one merge attempt.
   *
   * @throws {SyncError} MERGE_ATTEMPT_INVALID when attempt numbers do not start
   *   at 1, do not increase, or exceed the bound
   * @throws {SyncError} MERGE_FAILED when a fully resolved merge still conflicts
   */
  async runAttempt(
    attemptNumber: number,
    request: MergeRequest,
    options: AttemptOptions
  ): Promise<MergeAttempt> {
    this.checkAttemptNumber(attemptNumber);
    this.lastAttemptNumber = attemptNumber;

    const states: ResolverState[] = [];
    const enter = (next: ResolverState): void => {
      this.state = next;
      states.push(next);
    };

    this.state = "idle";
    states.push("idle");
    enter("merge-in-progress");

    const first = await this.engine.threeWayMerge(request);
    if (first.status === "clean") {
      enter("clean");
      this.logger.debug("[Resolver] Merge clean", { attemptNumber, commit: first.commit });
      return { attemptNumber, conflicts: [], outcome: "clean", mergedCommit: first.commit, states };
    }

    enter("conflicts-detected");
    this.logger.info("[Resolver] Conflicts detected", {
      attemptNumber,
      paths: first.conflicts.map((c) => c.path),
    });

    let conflicts = this.applyResolutions(first.conflicts, options.resolutions ?? []);

    if (options.autoResolve) {
      enter("auto-resolving");
      conflicts = conflicts.map(autoResolve);
    }

    if (!conflicts.every((c) => c.resolved)) {
      enter("manual-resolution-required");
      return { attemptNumber, conflicts, outcome: "conflicts-remain", states };
    }

    if (options.signal?.aborted) {
      this.logger.info("[Resolver] Attempt aborted before re-merge", { attemptNumber });
      return { attemptNumber, conflicts, outcome: "aborted", states };
    }

    const merged = new Map<string, string>();
    for (const conflict of conflicts) {
      if (conflict.mergedContent !== undefined) {
        merged.set(conflict.path, conflict.mergedContent);
      }
    }
    const second = await this.engine.threeWayMerge({ ...request, resolutions: merged });
    if (second.status !== "clean") {
      throw new SyncError(
        ErrorCode.MERGE_FAILED,
        `Merge still reports conflicts after resolving: ${second.conflicts.map((c) => c.path).join(", ")}`
      );
    }

    enter("clean");
    this.logger.debug("[Resolver] Conflicts resolved", { attemptNumber, commit: second.commit });
    return { attemptNumber, conflicts, outcome: "clean", mergedCommit: second.commit, states };
  }

  /**
   * Forget the attempt sequence, for reuse in another sync.
   */
  reset(): void {
    this.state = "idle";
    this.lastAttemptNumber = 0;
  }

  private checkAttemptNumber(attemptNumber: number): void {
    const valid =
      Number.isInteger(attemptNumber) &&
      attemptNumber === this.lastAttemptNumber + 1 &&
      attemptNumber <= this.maxAttempts;
    if (!valid) {
      throw new SyncError(
        ErrorCode.MERGE_ATTEMPT_INVALID,
        `Merge attempt ${attemptNumber} is out of sequence (last ${this.lastAttemptNumber}, max ${this.maxAttempts})`
      );
    }
  }

  private applyResolutions(
    conflicts: readonly ConflictEntry[],
    resolutions: readonly ManualResolution[]
  ): ConflictEntry[] {
    const byPath = new Map(resolutions.map((r) => [r.path, r]));
    return conflicts.map((conflict) => {
      const resolution = byPath.get(conflict.path);
      if (!resolution) return conflict;
      const resolved = applyManualResolution(conflict, resolution);
      if (!resolved) {
        this.logger.warn("[Resolver] Resolution has no content to apply", {
          path: conflict.path,
          strategy: resolution.strategy,
        });
        return conflict;
      }
      return resolved;
    });
  }
}
