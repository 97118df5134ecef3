/**
 * Git engine backed by simple-git.
 *
 * Merges run in memory with `merge-tree --write-tree`; nothing touches the
 * working tree or any ref until a push has succeeded. Remote refs change only
 * through `push --atomic`, so a rejected or failed push leaves both sides as
 * they were.
 */

import { spawn } from "node:child_process";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pLimit from "p-limit";
import simpleGit, { type SimpleGit, type SimpleGitOptions } from "simple-git";
import { NonFastForwardError } from "../../utils/errors.js";
import { silentLogger, type LogSink } from "../../utils/logger.js";
import { computeHunks } from "../hunks.js";
import type { ConflictEntry, Credential, SnapshotEntry } from "../types.js";
import { classifyGitError } from "./gitErrors.js";
import {
  chunk,
  parseCatFileBatch,
  parseLsRemoteHeads,
  parseLsTree,
  parseMergeTree,
  parseNulList,
  type CatFileObject,
} from "./gitOutput.js";
import { lineSimilarity } from "./similarity.js";
import type {
  EngineFetchResult,
  EnginePullResult,
  MergeRequest,
  MergeResult,
  RefUpdateResult,
  RemoteTarget,
  RepositoryEngine,
  SnapshotRef,
  TransferEngine,
  TransferOptions,
} from "./types.js";

const HASH_BATCH_SIZE = 100;
const DEFAULT_TIMEOUT_MS = 120_000;

export interface GitEngineOptions {
  repoPath: string;
  remoteName?: string;
  logger?: LogSink;
  /** Parallel git processes for snapshot hashing */
  concurrency?: number;
  /** Kill a transfer that produces no output for this long */
  timeoutMs?: number;
}

/** Variables a git or ssh child needs from our own environment. */
const INHERITED_ENV = [
  "PATH",
  "HOME",
  "USER",
  "USERPROFILE",
  "SystemRoot",
  "TMPDIR",
  "TEMP",
  "TMP",
  "LANG",
  "LC_ALL",
  "SSH_AUTH_SOCK",
  "XDG_CONFIG_HOME",
] as const;

type UnsafeFlags = NonNullable<Partial<SimpleGitOptions>["unsafe"]>;

/**
 * Environment for a git child process: the inherited variables listed above
 * plus `extra`. Editors, pagers and askpass helpers from the user's shell are
 * never passed on.
 */
export function gitEnvironment(
  extra: Record<string, string> = {},
  source: NodeJS.ProcessEnv = process.env
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const name of INHERITED_ENV) {
    const value = source[name];
    if (value !== undefined) env[name] = value;
  }
  return { ...env, ...extra };
}

function authorizationHeader(credential: Credential): string | null {
  switch (credential.kind) {
    case "basic":
      return `Authorization: Basic ${Buffer.from(`${credential.username}:${credential.password}`).toString("base64")}`;
    case "token":
      return credential.username
        ? `Authorization: Basic ${Buffer.from(`${credential.username}:${credential.token}`).toString("base64")}`
        : `Authorization: Bearer ${credential.token}`;
    default:
      return null;
  }
}

/**
 * Environment carrying a credential to git. HTTP secrets travel as
 * environment-borne configuration so they never appear on a command line.
 * Terminal prompts are always disabled.
 */
export function credentialEnv(credential: Credential): Record<string, string> {
  const env: Record<string, string> = { GIT_TERMINAL_PROMPT: "0" };

  const header = authorizationHeader(credential);
  if (header !== null) {
    env.GIT_CONFIG_COUNT = "1";
    env.GIT_CONFIG_KEY_0 = "http.extraHeader";
    env.GIT_CONFIG_VALUE_0 = header;
  }
  if (credential.kind === "ssh-key") {
    env.GIT_SSH_COMMAND = `ssh -i "${credential.privateKeyPath}" -o IdentitiesOnly=yes -o BatchMode=yes`;
  } else if (credential.kind === "ssh-agent") {
    env.GIT_SSH_COMMAND = "ssh -o BatchMode=yes";
  }
  return env;
}

/**
 * simple-git refuses some variables unless told otherwise; allow exactly the
 * ones `env` sets.
 */
export function unsafeFlagsFor(env: Record<string, string>): UnsafeFlags {
  const flags: UnsafeFlags = {};
  if ("GIT_SSH_COMMAND" in env) flags.allowUnsafeSshCommand = true;
  if ("GIT_CONFIG_COUNT" in env) flags.allowUnsafeConfigEnvCount = true;
  return flags;
}

export class GitEngine implements TransferEngine, RepositoryEngine {
  private readonly repoPath: string;
  private readonly remoteName: string;
  private readonly logger: LogSink;
  private readonly concurrency: number;
  private readonly timeoutMs: number;
  private readonly git: SimpleGit;

  constructor(options: GitEngineOptions) {
    this.repoPath = path.resolve(options.repoPath);
    this.remoteName = options.remoteName ?? "origin";
    this.logger = options.logger ?? silentLogger;
    this.concurrency = options.concurrency ?? 4;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.git = simpleGit({ baseDir: this.repoPath }).env(gitEnvironment());
  }

  // ==================== Transfer ====================

  async listRemoteBranches(remote: RemoteTarget, options: TransferOptions = {}): Promise<string[]> {
    try {
      const output = await this.remoteGit(remote, options.signal).raw(["ls-remote", "--heads", remote.url]);
      return parseLsRemoteHeads(output);
    } catch (error) {
      throw classifyGitError(error, { url: remote.url });
    }
  }

  async fetch(remote: RemoteTarget, branch: string, options: TransferOptions = {}): Promise<EngineFetchResult> {
    const trackingRef = this.remoteTrackingRef(branch);
    try {
      await this.remoteGit(remote, options.signal).raw([
        "fetch",
        "--no-tags",
        remote.url,
        `+refs/heads/${branch}:${trackingRef}`,
      ]);
    } catch (error) {
      if (error instanceof Error && /couldn't find remote ref/i.test(error.message)) {
        this.logger.debug("[GitEngine] Remote branch does not exist", { branch });
        return { branch, remoteHead: null };
      }
      throw classifyGitError(error, { url: remote.url, branch });
    }
    return { branch, remoteHead: await this.resolveHead(trackingRef) };
  }

  async pull(remote: RemoteTarget, branch: string, options: TransferOptions = {}): Promise<EnginePullResult> {
    const { remoteHead } = await this.fetch(remote, branch, options);
    const previousHead = await this.resolveHead(`refs/heads/${branch}`);

    if (remoteHead === null) {
      if (previousHead === null) {
        throw classifyGitError(new Error(`couldn't find remote ref ${branch}`), { url: remote.url, branch });
      }
      return { branch, previousHead, head: previousHead, fastForward: false };
    }

    if (previousHead !== null) {
      const base = await this.mergeBase(previousHead, remoteHead);
      if (base === remoteHead) {
        return { branch, previousHead, head: previousHead, fastForward: false };
      }
      if (base !== previousHead) {
        throw new NonFastForwardError(undefined, { branch });
      }
    }

    await this.updateLocalBranch(branch, remoteHead);
    return { branch, previousHead, head: remoteHead, fastForward: previousHead !== null };
  }

  /**
   * `push --atomic` with a lease on the remote head. Takes no abort signal.
   */
  async atomicUpdateRef(
    remote: RemoteTarget,
    branch: string,
    newCommit: string,
    expectedOld?: string | null
  ): Promise<RefUpdateResult> {
    const commit = await this.resolveHead(newCommit);
    if (commit === null) {
      throw classifyGitError(new Error(`unknown revision ${newCommit}`), { branch });
    }
    if (expectedOld === commit) {
      return { status: "up-to-date", branch, commit };
    }

    const args = ["push", "--atomic"];
    if (expectedOld !== undefined) {
      args.push(`--force-with-lease=refs/heads/${branch}:${expectedOld ?? ""}`);
    }
    args.push(remote.url, `${commit}:refs/heads/${branch}`);

    try {
      await this.remoteGit(remote).raw(args);
    } catch (error) {
      throw classifyGitError(error, { url: remote.url, branch });
    }
    this.logger.debug("[GitEngine] Pushed", { branch, commit });
    return { status: "updated", branch, commit };
  }

  // ==================== Repository ====================

  async getRemoteUrl(name: string): Promise<string | null> {
    try {
      const url = (await this.git.raw(["remote", "get-url", name])).trim();
      return url.length > 0 ? url : null;
    } catch (error) {
      if (error instanceof Error && /no such remote/i.test(error.message)) {
        return null;
      }
      throw classifyGitError(error);
    }
  }

  async resolveHead(ref: string = "HEAD"): Promise<string | null> {
    try {
      const output = await this.git.raw(["rev-parse", "--verify", "--quiet", `${ref}^{commit}`]);
      const oid = output.trim();
      return oid.length > 0 ? oid : null;
    } catch (error) {
      throw classifyGitError(error);
    }
  }

  remoteTrackingRef(branch: string): string {
    return `refs/remotes/${this.remoteName}/${branch}`;
  }

  async threeWayMerge(request: MergeRequest): Promise<MergeResult> {
    try {
      return await this.merge(request);
    } catch (error) {
      throw classifyGitError(error);
    }
  }

  async updateLocalBranch(branch: string, commit: string): Promise<void> {
    try {
      const current = (await this.git.raw(["symbolic-ref", "--quiet", "--short", "HEAD"])).trim();
      if (current === branch) {
        await this.git.raw(["merge", "--ff-only", commit]);
      } else {
        await this.git.raw(["update-ref", `refs/heads/${branch}`, commit]);
      }
    } catch (error) {
      throw classifyGitError(error, { branch });
    }
  }

  async diffSnapshots(oldRef: SnapshotRef, newRef: SnapshotRef): Promise<SnapshotEntry[]> {
    const [before, after] = await Promise.all([this.listSnapshot(oldRef), this.listSnapshot(newRef)]);
    const paths = new Set([...before.keys(), ...after.keys()]);

    return [...paths].sort().map((p) => ({
      path: p,
      oldHash: before.get(p) ?? null,
      newHash: after.get(p) ?? null,
    }));
  }

  async readContent(ref: SnapshotRef, filePath: string): Promise<string | null> {
    if (ref.type === "worktree") {
      try {
        return await fs.readFile(path.join(this.repoPath, filePath), "utf-8");
      } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
          return null;
        }
        throw error;
      }
    }
    return this.readBlob(ref.rev, filePath);
  }

  async readBlobs(names: readonly string[]): Promise<Map<string, string | null>> {
    const unique = [...new Set(names)];
    const blobs = new Map<string, string | null>();
    if (unique.length === 0) {
      return blobs;
    }

    let objects: Map<string, CatFileObject | null>;
    try {
      objects = parseCatFileBatch(await this.catFileBatch(unique), unique);
    } catch (error) {
      throw classifyGitError(error);
    }
    for (const name of unique) {
      const object = objects.get(name);
      blobs.set(name, object && object.type === "blob" ? object.content.toString("utf-8") : null);
    }
    return blobs;
  }

  computeSimilarity(contentA: string, contentB: string): number {
    return lineSimilarity(contentA, contentB);
  }

  // ==================== Internals ====================

  private remoteGit(remote: RemoteTarget, signal?: AbortSignal): SimpleGit {
    const env = credentialEnv(remote.credential);
    const options: Partial<SimpleGitOptions> = {
      baseDir: this.repoPath,
      timeout: { block: this.timeoutMs },
      unsafe: unsafeFlagsFor(env),
    };
    if (signal) {
      options.abort = signal;
    }
    return simpleGit(options).env(gitEnvironment(env));
  }

  private async mergeBase(a: string, b: string): Promise<string | null> {
    const output = await this.git.raw(["merge-base", a, b]);
    const oid = output.trim();
    return oid.length > 0 ? oid : null;
  }

  private async readBlob(rev: string, filePath: string): Promise<string | null> {
    const name = `${rev}:${filePath}`;
    return (await this.readBlobs([name])).get(name) ?? null;
  }

  /**
   * Feed `names` to one `git cat-file --batch` and collect its raw output.
   * simple-git cannot write to a child's stdin, so this spawns git directly.
   */
  private catFileBatch(names: readonly string[]): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const child = spawn("git", ["cat-file", "--batch"], { cwd: this.repoPath, env: gitEnvironment() });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on("data", (data: Buffer) => stdout.push(data));
      child.stderr.on("data", (data: Buffer) => stderr.push(data));
      child.on("error", reject);
      child.on("close", (code) => {
        if (code === 0) {
          resolve(Buffer.concat(stdout));
        } else {
          const message = Buffer.concat(stderr).toString("utf-8").trim();
          reject(new Error(message || `git cat-file exited with code ${code}`));
        }
      });
      child.stdin.end(names.map((name) => `${name}\n`).join(""));
    });
  }

  private async merge(request: MergeRequest): Promise<MergeResult> {
    const ours = await this.resolveHead(request.ours);
    const theirs = await this.resolveHead(request.theirs);
    if (ours === null || theirs === null) {
      throw new Error(`unknown revision ${ours === null ? request.ours : request.theirs}`);
    }

    const resolutions = request.resolutions ?? new Map<string, string>();
    const base = request.base ?? (await this.mergeBase(ours, theirs));

    if (resolutions.size === 0) {
      if (ours === theirs || base === theirs) {
        return { status: "clean", commit: ours };
      }
      if (base === ours) {
        return { status: "clean", commit: theirs };
      }
    }

    const args = ["merge-tree", "--write-tree", "--name-only", "--no-messages", "-z"];
    if (request.base) {
      args.push(`--merge-base=${request.base}`);
    }
    args.push(ours, theirs);
    // Exit status 1 with conflicts on stdout and nothing on stderr is not an error here.
    const { tree, conflictedPaths } = parseMergeTree(await this.git.raw(args));

    const unresolved = conflictedPaths.filter((p) => !resolutions.has(p));
    if (unresolved.length > 0) {
      this.logger.debug("[GitEngine] merge-tree reported conflicts", { paths: unresolved });
      const conflicts = await Promise.all(
        unresolved.map((p) => this.describeConflict(p, base, ours, theirs))
      );
      return { status: "conflicts", conflicts };
    }

    const finalTree = resolutions.size > 0 ? await this.applyResolutions(tree, resolutions) : tree;
    const message = `Merge ${theirs.slice(0, 7)} into ${ours.slice(0, 7)}`;
    const commit = (
      await this.git.raw(["commit-tree", finalTree, "-p", ours, "-p", theirs, "-m", message])
    ).trim();
    return { status: "clean", commit };
  }

  private async describeConflict(
    filePath: string,
    base: string | null,
    ours: string,
    theirs: string
  ): Promise<ConflictEntry> {
    const names = {
      base: base ? `${base}:${filePath}` : null,
      ours: `${ours}:${filePath}`,
      theirs: `${theirs}:${filePath}`,
    };
    const blobs = await this.readBlobs(
      [names.base, names.ours, names.theirs].filter((name): name is string => name !== null)
    );
    const baseText = (names.base !== null ? blobs.get(names.base) : null) ?? "";
    const oursContent = blobs.get(names.ours) ?? null;
    const theirsContent = blobs.get(names.theirs) ?? null;

    return {
      path: filePath,
      oursHunks: computeHunks(baseText, oursContent ?? ""),
      theirsHunks: computeHunks(baseText, theirsContent ?? ""),
      resolved: false,
      baseContent: baseText,
      oursContent: oursContent ?? undefined,
      theirsContent: theirsContent ?? undefined,
    };
  }

  /**
   * Write resolved contents as blobs and build a tree from `tree` with them
   * substituted, using a throwaway index.
   */
  private async applyResolutions(tree: string, resolutions: ReadonlyMap<string, string>): Promise<string> {
    const scratch = await fs.mkdtemp(path.join(os.tmpdir(), "reposync-merge-"));
    const indexGit = simpleGit({ baseDir: this.repoPath }).env(
      gitEnvironment({ GIT_INDEX_FILE: path.join(scratch, "index") })
    );

    try {
      await indexGit.raw(["read-tree", tree]);
      const modes = new Map(parseLsTree(await this.git.raw(["ls-tree", "-r", "-z", tree])).map((e) => [e.path, e.mode]));

      let n = 0;
      for (const [filePath, content] of resolutions) {
        const blobFile = path.join(scratch, `blob-${n++}`);
        await fs.writeFile(blobFile, content, "utf-8");
        const blob = (await this.git.raw(["hash-object", "-w", blobFile])).trim();
        const mode = modes.get(filePath) ?? "100644";
        await indexGit.raw(["update-index", "--add", "--cacheinfo", `${mode},${blob},${filePath}`]);
      }

      return (await indexGit.raw(["write-tree"])).trim();
    } finally {
      await fs.rm(scratch, { recursive: true, force: true });
    }
  }

  private async listSnapshot(ref: SnapshotRef): Promise<Map<string, string>> {
    if (ref.type === "commit") {
      const rev = await this.resolveHead(ref.rev);
      if (rev === null) {
        return new Map();
      }
      const entries = parseLsTree(await this.git.raw(["ls-tree", "-r", "-z", "--full-tree", rev]));
      return new Map(entries.filter((e) => e.type === "blob").map((e) => [e.path, e.oid]));
    }

    const listed = parseNulList(
      await this.git.raw(["ls-files", "-z", "--cached", "--others", "--exclude-standard"])
    );
    const present: string[] = [];
    for (const p of [...new Set(listed)]) {
      try {
        const stat = await fs.lstat(path.join(this.repoPath, p));
        if (stat.isFile() || stat.isSymbolicLink()) present.push(p);
      } catch (error) {
        if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
          throw error;
        }
      }
    }

    const limit = pLimit(this.concurrency);
    const hashed = await Promise.all(
      chunk(present, HASH_BATCH_SIZE).map((batch) =>
        limit(async () => {
          const output = await this.git.raw(["hash-object", "--", ...batch]);
          const oids = output.split("\n").filter((line) => line.length > 0);
          return batch.map((p, i): [string, string] => [p, oids[i] ?? ""]);
        })
      )
    );
    return new Map(hashed.flat());
  }
}
