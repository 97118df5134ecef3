/**
 * Tests for change classification
 */

import { describe, it, expect, jest } from "@jest/globals";
import { classify, compareCodeUnits, levenshteinDistance } from "../../src/sync/classifier.js";
import type { SnapshotEntry } from "../../src/sync/types.js";

const noSimilarity = (): number => 0;

describe("levenshteinDistance", () => {
  it("counts edits between strings", () => {
    expect(levenshteinDistance("kitten", "sitting")).toBe(3);
    expect(levenshteinDistance("a/x.md", "a/y.md")).toBe(1);
    expect(levenshteinDistance("", "abc")).toBe(3);
    expect(levenshteinDistance("same", "same")).toBe(0);
  });
});

describe("compareCodeUnits", () => {
  it("orders by UTF-16 code units, uppercase first", () => {
    expect(["b", "B", "a"].sort(compareCodeUnits)).toEqual(["B", "a", "b"]);
  });
});

describe("classify", () => {
  it("reports modified, new and deleted paths sorted by path", () => {
    const entries: SnapshotEntry[] = [
      { path: "src/z.ts", oldHash: "h1", newHash: "h2" },
      { path: "docs/gone.md", oldHash: "h3", newHash: null },
      { path: "README.md", oldHash: null, newHash: "h4" },
      { path: "unchanged.txt", oldHash: "h5", newHash: "h5" },
    ];

    expect(classify(entries, { similarity: noSimilarity })).toEqual([
      { path: "README.md", kind: "new" },
      { path: "docs/gone.md", kind: "deleted" },
      { path: "src/z.ts", kind: "modified" },
    ]);
  });

  it("pairs identical content as a rename without computing similarity", () => {
    const similarity = jest.fn(noSimilarity);

    const records = classify(
      [
        { path: "old.md", oldHash: "h1", newHash: null },
        { path: "new.md", oldHash: null, newHash: "h1" },
      ],
      { similarity }
    );

    expect(records).toEqual([{ path: "new.md", kind: "renamed", previousPath: "old.md" }]);
    expect(similarity).not.toHaveBeenCalled();
  });

  it("reports a copy when the source still exists", () => {
    expect(
      classify(
        [
          { path: "a.md", oldHash: "h1", newHash: "h1" },
          { path: "b.md", oldHash: null, newHash: "h1" },
        ],
        { similarity: noSimilarity }
      )
    ).toEqual([{ path: "b.md", kind: "copied", previousPath: "a.md" }]);
  });

  it("renames into one new path and leaves the rest new once the source is gone", () => {
    expect(
      classify(
        [
          { path: "notes/guide.md", oldHash: null, newHash: "h1" },
          { path: "docs/guide.md", oldHash: "h1", newHash: null },
          { path: "docs/guide-v2.md", oldHash: null, newHash: "h1" },
        ],
        { similarity: noSimilarity }
      )
    ).toEqual([
      { path: "docs/guide-v2.md", kind: "renamed", previousPath: "docs/guide.md" },
      { path: "notes/guide.md", kind: "new" },
    ]);
  });

  it("gives a deleted source to its exact match over an earlier similar path", () => {
    const similarity = (_source: string, target: string): number => (target === "b.md" ? 0.6 : 0);

    expect(
      classify(
        [
          { path: "a.md", oldHash: "h1", newHash: null },
          { path: "b.md", oldHash: null, newHash: "h2" },
          { path: "z.md", oldHash: null, newHash: "h1" },
        ],
        { similarity }
      )
    ).toEqual([
      { path: "b.md", kind: "new" },
      { path: "z.md", kind: "renamed", previousPath: "a.md" },
    ]);
  });

  it("copies a leftover path from a source that still exists", () => {
    expect(
      classify(
        [
          { path: "a.md", oldHash: "h1", newHash: null },
          { path: "b.md", oldHash: null, newHash: "h1" },
          { path: "c.md", oldHash: null, newHash: "h1" },
          { path: "keep.md", oldHash: "h1", newHash: "h1" },
        ],
        { similarity: noSimilarity }
      )
    ).toEqual([
      { path: "b.md", kind: "renamed", previousPath: "a.md" },
      { path: "c.md", kind: "copied", previousPath: "keep.md" },
    ]);
  });

  it("copies from a modified source by similarity", () => {
    const similarity = (source: string, target: string): number =>
      source === "base.md" && target === "variant.md" ? 0.7 : 0;

    expect(
      classify(
        [
          { path: "base.md", oldHash: "h1", newHash: "h2" },
          { path: "variant.md", oldHash: null, newHash: "h3" },
        ],
        { similarity }
      )
    ).toEqual([
      { path: "base.md", kind: "modified" },
      { path: "variant.md", kind: "copied", previousPath: "base.md" },
    ]);
  });

  it("breaks score ties by path distance", () => {
    expect(
      classify(
        [
          { path: "b/longname/x.md", oldHash: "h1", newHash: null },
          { path: "a/x.md", oldHash: "h1", newHash: null },
          { path: "a/y.md", oldHash: null, newHash: "h1" },
        ],
        { similarity: noSimilarity }
      )
    ).toEqual([
      { path: "a/y.md", kind: "renamed", previousPath: "a/x.md" },
      { path: "b/longname/x.md", kind: "deleted" },
    ]);
  });

  it("breaks distance ties by source path", () => {
    expect(
      classify(
        [
          { path: "c.md", oldHash: "h1", newHash: null },
          { path: "b.md", oldHash: "h1", newHash: null },
          { path: "a.md", oldHash: null, newHash: "h1" },
        ],
        { similarity: noSimilarity }
      )
    ).toEqual([
      { path: "a.md", kind: "renamed", previousPath: "b.md" },
      { path: "c.md", kind: "deleted" },
    ]);
  });

  it("accepts a similar source at the threshold", () => {
    const entries: SnapshotEntry[] = [
      { path: "draft.md", oldHash: "h1", newHash: null },
      { path: "final.md", oldHash: null, newHash: "h2" },
    ];

    expect(classify(entries, { similarity: () => 0.5 })).toEqual([
      { path: "final.md", kind: "renamed", previousPath: "draft.md" },
    ]);
    expect(classify(entries, { similarity: () => 0.49 })).toEqual([
      { path: "draft.md", kind: "deleted" },
      { path: "final.md", kind: "new" },
    ]);
  });

  it("honours a custom threshold", () => {
    const entries: SnapshotEntry[] = [
      { path: "draft.md", oldHash: "h1", newHash: null },
      { path: "final.md", oldHash: null, newHash: "h2" },
    ];

    expect(classify(entries, { similarity: () => 0.8, threshold: 0.9 })).toEqual([
      { path: "draft.md", kind: "deleted" },
      { path: "final.md", kind: "new" },
    ]);
  });

  it("prefers the most similar source", () => {
    const scores: Record<string, number> = { "a.md": 0.6, "b.md": 0.9 };

    expect(
      classify(
        [
          { path: "a.md", oldHash: "h1", newHash: null },
          { path: "b.md", oldHash: "h2", newHash: null },
          { path: "c.md", oldHash: null, newHash: "h3" },
        ],
        { similarity: (source) => scores[source] ?? 0 }
      )
    ).toEqual([
      { path: "a.md", kind: "deleted" },
      { path: "c.md", kind: "renamed", previousPath: "b.md" },
    ]);
  });

  it("does not depend on input order", () => {
    const entries: SnapshotEntry[] = [
      { path: "x/one.md", oldHash: "h1", newHash: null },
      { path: "y/one.md", oldHash: null, newHash: "h1" },
      { path: "z/one.md", oldHash: null, newHash: "h1" },
      { path: "w.md", oldHash: "h2", newHash: "h3" },
    ];
    const expected = classify(entries, { similarity: noSimilarity });

    expect(classify([...entries].reverse(), { similarity: noSimilarity })).toEqual(expected);
    expect(classify([entries[2], entries[0], entries[3], entries[1]], { similarity: noSimilarity })).toEqual(
      expected
    );
  });

  it("returns nothing for an empty comparison", () => {
    expect(classify([], { similarity: noSimilarity })).toEqual([]);
  });
});
