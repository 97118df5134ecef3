import pLimit from "p-limit";
import { classify } from "./classifier.js";
import type { RepositoryEngine, SnapshotRef } from "./engine/types.js";
import type { ChangeRecord, SnapshotEntry } from "./types.js";

const CONTENT_CONCURRENCY = 8;

export const HEAD_SNAPSHOT: SnapshotRef = { type: "commit", rev: "HEAD" };
export const WORKTREE_SNAPSHOT: SnapshotRef = { type: "worktree" };

/**
 * Classify the differences between two snapshots.
 *
 * Contents are loaded only for rename/copy candidates whose hashes differ;
 * exact-hash matches are decided without reading anything. Only deleted and
 * modified paths are read as similarity sources.
 */
export async function classifyRange(
  engine: RepositoryEngine,
  oldRef: SnapshotRef,
  newRef: SnapshotRef,
  threshold?: number
): Promise<ChangeRecord[]> {
  const entries = await engine.diffSnapshots(oldRef, newRef);
  const contents = await preloadCandidateContents(engine, entries, oldRef, newRef);

  return classify(entries, {
    threshold,
    similarity: (source, target) => {
      const a = contents.old.get(source);
      const b = contents.new.get(target);
      if (a === undefined || b === undefined) return 0;
      return engine.computeSimilarity(a, b);
    },
  });
}

export function classifyWorkingTree(
  engine: RepositoryEngine,
  threshold?: number
): Promise<ChangeRecord[]> {
  return classifyRange(engine, HEAD_SNAPSHOT, WORKTREE_SNAPSHOT, threshold);
}

interface ContentRequest {
  path: string;
  hash: string;
}

async function preloadCandidateContents(
  engine: RepositoryEngine,
  entries: readonly SnapshotEntry[],
  oldRef: SnapshotRef,
  newRef: SnapshotRef
): Promise<{ old: Map<string, string>; new: Map<string, string> }> {
  const added = entries.flatMap((entry) =>
    entry.oldHash === null && entry.newHash !== null ? [{ path: entry.path, hash: entry.newHash }] : []
  );
  // Unchanged paths only ever pair by exact hash, so deleted and modified
  // paths are the only sources worth reading.
  const sources = entries.flatMap((entry) =>
    entry.oldHash !== null && entry.oldHash !== entry.newHash ? [{ path: entry.path, hash: entry.oldHash }] : []
  );
  if (added.length === 0 || sources.length === 0) {
    return { old: new Map(), new: new Map() };
  }

  const addedHashes = new Set(added.map((entry) => entry.hash));
  const sourceHashes = new Set(sources.map((entry) => entry.hash));

  // A side only needs its content when some pairing is not an exact match.
  const targetsToLoad = added.filter((entry) => !(sourceHashes.size === 1 && sourceHashes.has(entry.hash)));
  const sourcesToLoad = sources.filter((entry) => !(addedHashes.size === 1 && addedHashes.has(entry.hash)));

  const [oldContents, newContents] = await Promise.all([
    loadContents(engine, oldRef, sourcesToLoad),
    loadContents(engine, newRef, targetsToLoad),
  ]);
  return { old: oldContents, new: newContents };
}

/**
 * Committed contents come from the object store in one batch, keyed by the
 * hash already known. Working tree files are read one by one.
 */
async function loadContents(
  engine: RepositoryEngine,
  ref: SnapshotRef,
  requests: readonly ContentRequest[]
): Promise<Map<string, string>> {
  const contents = new Map<string, string>();
  if (requests.length === 0) {
    return contents;
  }

  if (ref.type === "commit") {
    const blobs = await engine.readBlobs(requests.map((request) => request.hash));
    for (const request of requests) {
      const content = blobs.get(request.hash);
      if (content !== undefined && content !== null) contents.set(request.path, content);
    }
    return contents;
  }

  const limit = pLimit(CONTENT_CONCURRENCY);
  await Promise.all(
    requests.map((request) =>
      limit(async () => {
        const content = await engine.readContent(ref, request.path);
        if (content !== null) contents.set(request.path, content);
      })
    )
  );
  return contents;
}
