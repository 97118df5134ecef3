import { diffArrays } from "diff";
import { splitLines } from "../hunks.js";

function withoutTerminator(line: string): string {
  return line.endsWith("\n") ? line.slice(0, -1) : line;
}

/**
 * Line-based similarity in [0, 1]: twice the common lines over the total.
 * Two empty inputs are identical.
 *
 * @example
 * lineSimilarity("a\nb\n", "a\nc\n"); // 0.5
 */
export function lineSimilarity(contentA: string, contentB: string): number {
  if (contentA === contentB) return 1;

  const a = splitLines(contentA).map(withoutTerminator);
  const b = splitLines(contentB).map(withoutTerminator);
  if (a.length + b.length === 0) return 1;

  let common = 0;
  for (const change of diffArrays<string, string>(a, b)) {
    if (!change.added && !change.removed) {
      common += change.value.length;
    }
  }
  return (2 * common) / (a.length + b.length);
}
