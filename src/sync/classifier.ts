/**
 * Change classification with rename/copy detection.
 *
 * Output is a pure function of the entry set. Candidate pairs are ranked by
 * similarity, then path distance, then source path, then target path, and
 * records are returned sorted by path.
 */

import type { ChangeRecord, SnapshotEntry } from "./types.js";

export const DEFAULT_SIMILARITY_THRESHOLD = 0.5;

export interface ClassifyOptions {
  /** Similarity in [0, 1] between the old content of `source` and the new content of `target` */
  similarity: (source: string, target: string) => number;
  /** Minimum similarity for a rename/copy match */
  threshold?: number;
}

/**
 * Levenshtein distance between two strings
 */
export function levenshteinDistance(a: string, b: string): number {
  const matrix: number[][] = [];

  for (let i = 0; i <= b.length; i++) {
    matrix[i] = [i];
  }
  for (let j = 0; j <= a.length; j++) {
    matrix[0][j] = j;
  }

  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      if (b.charAt(i - 1) === a.charAt(j - 1)) {
        matrix[i][j] = matrix[i - 1][j - 1];
      } else {
        matrix[i][j] = Math.min(
          matrix[i - 1][j - 1] + 1, // substitution
          matrix[i][j - 1] + 1, // insertion
          matrix[i - 1][j] + 1 // deletion
        );
      }
    }
  }

  return matrix[b.length][a.length];
}

export function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

interface Candidate {
  source: SnapshotEntry;
  target: SnapshotEntry;
  score: number;
  distance: number;
}

function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.distance !== b.distance) return a.distance - b.distance;
  return compareCodeUnits(a.source.path, b.source.path) || compareCodeUnits(a.target.path, b.target.path);
}

function scorePairs(
  sources: readonly SnapshotEntry[],
  targets: readonly SnapshotEntry[],
  options: ClassifyOptions,
  threshold: number
): Candidate[] {
  const candidates: Candidate[] = [];
  for (const target of targets) {
    for (const source of sources) {
      const score = source.oldHash === target.newHash ? 1 : options.similarity(source.path, target.path);
      if (score < threshold) continue;
      candidates.push({ source, target, score, distance: levenshteinDistance(source.path, target.path) });
    }
  }
  return candidates.sort(compareCandidates);
}

export function classify(entries: readonly SnapshotEntry[], options: ClassifyOptions): ChangeRecord[] {
  const threshold = options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const sorted = [...entries].sort((a, b) => compareCodeUnits(a.path, b.path));

  const removed = sorted.filter((entry) => entry.oldHash !== null && entry.newHash === null);
  const surviving = sorted.filter((entry) => entry.oldHash !== null && entry.newHash !== null);
  const added = sorted.filter((entry) => entry.oldHash === null && entry.newHash !== null);
  const records: ChangeRecord[] = [];

  // Renames are assigned one-to-one, best pair first, over all targets at once.
  const consumed = new Set<string>();
  const renamed = new Set<string>();
  for (const { source, target } of scorePairs(removed, added, options, threshold)) {
    if (consumed.has(source.path) || renamed.has(target.path)) continue;
    consumed.add(source.path);
    renamed.add(target.path);
    records.push({ path: target.path, kind: "renamed", previousPath: source.path });
  }

  // A copy needs a source that is still present afterwards.
  const leftover = added.filter((entry) => !renamed.has(entry.path));
  const copied = new Set<string>();
  for (const { source, target } of scorePairs(surviving, leftover, options, threshold)) {
    if (copied.has(target.path)) continue;
    copied.add(target.path);
    records.push({ path: target.path, kind: "copied", previousPath: source.path });
  }

  for (const entry of leftover) {
    if (!copied.has(entry.path)) {
      records.push({ path: entry.path, kind: "new" });
    }
  }
  for (const entry of removed) {
    if (!consumed.has(entry.path)) {
      records.push({ path: entry.path, kind: "deleted" });
    }
  }
  for (const entry of surviving) {
    if (entry.newHash !== entry.oldHash) {
      records.push({ path: entry.path, kind: "modified" });
    }
  }

  return records.sort((a, b) => compareCodeUnits(a.path, b.path));
}
