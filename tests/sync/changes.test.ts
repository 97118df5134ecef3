import { describe, it, expect, beforeEach } from "@jest/globals";
import { classifyRange, classifyWorkingTree } from "../../src/sync/changes.js";
import { FakeEngine } from "../helpers/fakeEngine.js";

describe("classifyWorkingTree", () => {
  let engine: FakeEngine;

  beforeEach(() => {
    engine = new FakeEngine();
  });

  it("compares HEAD with the working tree", async () => {
    await classifyWorkingTree(engine);

    expect(engine.diffSnapshots).toHaveBeenCalledWith({ type: "commit", rev: "HEAD" }, { type: "worktree" });
  });

  it("detects a rename of edited content through line similarity", async () => {
    engine.snapshot = [
      { path: "draft.md", oldHash: "h1", newHash: null },
      { path: "final.md", oldHash: null, newHash: "h2" },
    ];
    engine.blobs.set("h1", "a\nb\nc\nd\n");
    engine.contents.set("worktree:final.md", "a\nb\nc\nx\n");

    const changes = await classifyWorkingTree(engine);

    expect(changes).toEqual([{ path: "final.md", kind: "renamed", previousPath: "draft.md" }]);
    expect(engine.readBlobs).toHaveBeenCalledWith(["h1"]);
    expect(engine.readContent).toHaveBeenCalledTimes(1);
    expect(engine.readContent).toHaveBeenCalledWith({ type: "worktree" }, "final.md");
  });

  it("reads only deleted and modified paths as similarity sources", async () => {
    engine.snapshot = [
      { path: "draft.md", oldHash: "h1", newHash: null },
      { path: "final.md", oldHash: null, newHash: "h2" },
      { path: "keep.md", oldHash: "h5", newHash: "h5" },
      { path: "notes.md", oldHash: "h6", newHash: "h7" },
    ];
    engine.blobs.set("h1", "a\nb\nc\nd\n");
    engine.blobs.set("h6", "n\no\n");
    engine.contents.set("worktree:final.md", "a\nb\nc\nx\n");

    const changes = await classifyWorkingTree(engine);

    expect(changes).toEqual([
      { path: "final.md", kind: "renamed", previousPath: "draft.md" },
      { path: "notes.md", kind: "modified" },
    ]);
    expect(engine.readBlobs).toHaveBeenCalledTimes(1);
    expect(engine.readBlobs).toHaveBeenCalledWith(["h1", "h6"]);
  });

  it("reports dissimilar content as a delete and an add", async () => {
    engine.snapshot = [
      { path: "draft.md", oldHash: "h1", newHash: null },
      { path: "final.md", oldHash: null, newHash: "h2" },
    ];
    engine.blobs.set("h1", "a\nb\nc\nd\n");
    engine.contents.set("worktree:final.md", "w\nx\ny\nz\n");

    expect(await classifyWorkingTree(engine)).toEqual([
      { path: "draft.md", kind: "deleted" },
      { path: "final.md", kind: "new" },
    ]);
  });

  it("uses the configured threshold", async () => {
    engine.snapshot = [
      { path: "draft.md", oldHash: "h1", newHash: null },
      { path: "final.md", oldHash: null, newHash: "h2" },
    ];
    engine.blobs.set("h1", "a\nb\nc\nd\n");
    engine.contents.set("worktree:final.md", "a\nb\nc\nx\n");

    expect(await classifyWorkingTree(engine, 0.8)).toEqual([
      { path: "draft.md", kind: "deleted" },
      { path: "final.md", kind: "new" },
    ]);
  });
});

describe("classifyRange", () => {
  it("reads no content when every candidate is an exact match", async () => {
    const engine = new FakeEngine();
    engine.snapshot = [
      { path: "old.md", oldHash: "h1", newHash: null },
      { path: "new.md", oldHash: null, newHash: "h1" },
    ];

    const changes = await classifyRange(engine, { type: "commit", rev: "c1" }, { type: "commit", rev: "c2" });

    expect(changes).toEqual([{ path: "new.md", kind: "renamed", previousPath: "old.md" }]);
    expect(engine.readContent).not.toHaveBeenCalled();
    expect(engine.readBlobs).not.toHaveBeenCalled();
  });

  it("reads both sides of a commit range from the object store", async () => {
    const engine = new FakeEngine();
    engine.snapshot = [
      { path: "old.md", oldHash: "h1", newHash: null },
      { path: "new.md", oldHash: null, newHash: "h2" },
    ];
    engine.blobs.set("h1", "a\nb\nc\nd\n");
    engine.blobs.set("h2", "a\nb\nc\nx\n");

    const changes = await classifyRange(engine, { type: "commit", rev: "c1" }, { type: "commit", rev: "c2" });

    expect(changes).toEqual([{ path: "new.md", kind: "renamed", previousPath: "old.md" }]);
    expect(engine.readBlobs.mock.calls).toEqual([[["h1"]], [["h2"]]]);
    expect(engine.readContent).not.toHaveBeenCalled();
  });

  it("reads no content when nothing was added", async () => {
    const engine = new FakeEngine();
    engine.snapshot = [
      { path: "a.md", oldHash: "h1", newHash: "h2" },
      { path: "b.md", oldHash: "h3", newHash: null },
    ];

    const changes = await classifyRange(engine, { type: "commit", rev: "c1" }, { type: "commit", rev: "c2" });

    expect(changes).toEqual([
      { path: "a.md", kind: "modified" },
      { path: "b.md", kind: "deleted" },
    ]);
    expect(engine.readContent).not.toHaveBeenCalled();
  });
});
