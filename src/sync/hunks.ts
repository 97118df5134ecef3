/**
 * Hunk extraction, overlap test, and synthesis of merged content.
 */

import { diffArrays } from "diff";
import type { ConflictEntry, Hunk } from "./types.js";

/**
 * Lines with their terminators kept, so that adding or dropping the final
 * newline changes the last line.
 *
 * @example
 * splitLines("a\nb"); // ["a\n", "b"]
 */
export function splitLines(content: string): string[] {
  return content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

export function joinLines(lines: readonly string[]): string {
  return lines.join("");
}

/**
 * Hunks that turn `base` into `side`, in base line order.
 *
 * @example
 * computeHunks("a\nb\nc\n", "a\nB\nc\n");
 * // [{ start: 2, length: 1, lines: ["B\n"] }]
 */
export function computeHunks(base: string, side: string): Hunk[] {
  const changes = diffArrays<string, string>(splitLines(base), splitLines(side));
  const hunks: Hunk[] = [];
  let baseLine = 1;
  let current: Hunk | null = null;

  for (const change of changes) {
    const count = change.value.length;
    if (change.added) {
      current ??= { start: baseLine, length: 0, lines: [] };
      current.lines.push(...change.value);
    } else if (change.removed) {
      current ??= { start: baseLine, length: 0, lines: [] };
      current.length += count;
      baseLine += count;
    } else {
      if (current) {
        hunks.push(current);
        current = null;
      }
      baseLine += count;
    }
  }
  if (current) {
    hunks.push(current);
  }
  return hunks;
}

/**
 * Ranges are `[start, start + length)`. Insertions (length 0) overlap another
 * insertion at the same line, or a range they fall strictly inside.
 * Adjacent hunks do not overlap.
 */
export function hunksOverlap(a: Hunk, b: Hunk): boolean {
  const aInsert = a.length === 0;
  const bInsert = b.length === 0;

  if (aInsert && bInsert) {
    return a.start === b.start;
  }
  if (aInsert) {
    return b.start < a.start && a.start < b.start + b.length;
  }
  if (bInsert) {
    return a.start < b.start && b.start < a.start + a.length;
  }
  return a.start < b.start + b.length && b.start < a.start + a.length;
}

/**
 * True when no ours hunk overlaps any theirs hunk.
 */
export function isNonConflicting(entry: Pick<ConflictEntry, "oursHunks" | "theirsHunks">): boolean {
  return entry.oursHunks.every((ours) => entry.theirsHunks.every((theirs) => !hunksOverlap(ours, theirs)));
}

interface SidedHunk {
  hunk: Hunk;
  side: 0 | 1;
}

/**
 * Apply both sides' hunks to `base` in base line order.
 * Hunks at the same line apply insertions first, then ours before theirs.
 * Callers must check {@link isNonConflicting} first.
 */
export function synthesizeMerge(
  base: string,
  oursHunks: readonly Hunk[],
  theirsHunks: readonly Hunk[]
): string {
  const baseLines = splitLines(base);
  const ordered: SidedHunk[] = [
    ...oursHunks.map((hunk): SidedHunk => ({ hunk, side: 0 })),
    ...theirsHunks.map((hunk): SidedHunk => ({ hunk, side: 1 })),
  ].sort((x, y) => {
    if (x.hunk.start !== y.hunk.start) return x.hunk.start - y.hunk.start;
    const xInsert = x.hunk.length === 0 ? 0 : 1;
    const yInsert = y.hunk.length === 0 ? 0 : 1;
    if (xInsert !== yInsert) return xInsert - yInsert;
    return x.side - y.side;
  });

  const out: string[] = [];
  let cursor = 1;
  for (const { hunk } of ordered) {
    out.push(...baseLines.slice(cursor - 1, hunk.start - 1));
    out.push(...hunk.lines);
    cursor = Math.max(cursor, hunk.start + hunk.length);
  }
  out.push(...baseLines.slice(cursor - 1));

  return joinLines(out);
}
