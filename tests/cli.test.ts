/**
 * Tests for the reposync CLI
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import {
  EXIT_AUTH_FAILED,
  EXIT_CONFLICTS,
  EXIT_FAILED,
  EXIT_SUCCESS,
  EXIT_USAGE,
  credentialFromOptions,
  formatChange,
  parseArgs,
  runCli,
  type CliDeps,
} from "../src/cli.js";
import { changeLanguage, t } from "../src/i18n/index.js";
import { CredentialProvider } from "../src/sync/credentials/provider.js";
import { MemoryCredentialStore } from "../src/sync/credentials/memoryStore.js";
import type { SyncServiceOptions } from "../src/sync/index.js";
import { RepositoryLocks } from "../src/sync/locks.js";
import { SyncOrchestrator } from "../src/sync/orchestrator.js";
import { DEFAULT_CONFIG, type SyncConfig } from "../src/utils/config.js";
import { ConfigError, ErrorCode, NonFastForwardError } from "../src/utils/errors.js";
import { silentLogger } from "../src/utils/logger.js";
import { FakeEngine, disjointConflict } from "./helpers/fakeEngine.js";

const URL = "https://example.com/team/repo.git";

describe("parseArgs", () => {
  it("reads the command, positionals and options", () => {
    const parsed = parseArgs([
      "sync",
      URL,
      "develop",
      "--no-auto-resolve",
      "--max-retries",
      "2",
      "--repo",
      "/tmp/repo",
    ]);

    expect(parsed).toEqual({
      ok: true,
      command: "sync",
      positionals: [URL, "develop"],
      options: { repo: "/tmp/repo", autoResolve: false, maxRetries: 2, debug: false, help: false },
    });
  });

  it("rejects an unknown command", () => {
    expect(parseArgs(["frobnicate"])).toEqual({ ok: false, error: 'Unknown command "frobnicate".' });
  });

  it("rejects an unknown option", () => {
    expect(parseArgs(["sync", URL, "--force"])).toEqual({ ok: false, error: 'Unknown option "--force".' });
  });

  it("rejects a retry count below one", () => {
    expect(parseArgs(["sync", URL, "--max-retries", "0"])).toEqual({
      ok: false,
      error: '"0" is not a valid number for --max-retries.',
    });
  });
});

describe("credentialFromOptions", () => {
  const base = { repo: "/tmp/repo", autoResolve: true, debug: false, help: false };

  it("prefers a token", () => {
    expect(credentialFromOptions({ ...base, token: "test-token", username: "dev", password: "test-secret" })).toEqual({
      kind: "token",
      token: "test-token",
      username: "dev",
    });
  });

  it("builds basic and SSH key credentials", () => {
    expect(credentialFromOptions({ ...base, username: "dev", password: "test-secret" })).toEqual({
      kind: "basic",
      username: "dev",
      password: "test-secret",
    });
    expect(credentialFromOptions({ ...base, sshKey: "/keys/id_ed25519" })).toEqual({
      kind: "ssh-key",
      privateKeyPath: "/keys/id_ed25519",
    });
  });

  it("returns null without a secret", () => {
    expect(credentialFromOptions({ ...base, username: "dev" })).toBeNull();
  });
});

describe("formatChange", () => {
  it("aligns kinds and shows the previous path", () => {
    expect(formatChange({ path: "a.md", kind: "new" })).toBe("  new      a.md");
    expect(formatChange({ path: "b.md", kind: "renamed", previousPath: "a.md" })).toBe("  renamed  a.md -> b.md");
  });
});

describe("runCli", () => {
  let engine: FakeEngine;
  let store: MemoryCredentialStore;
  let stdout: string[];
  let stderr: string[];
  let config: SyncConfig;

  function deps(overrides: Partial<CliDeps> = {}): CliDeps {
    return {
      createService: (options: SyncServiceOptions) =>
        new SyncOrchestrator({
          repoPath: options.repoPath,
          repository: engine,
          transfer: engine,
          provider: new CredentialProvider({ store: options.store ?? store, env: {} }),
          config: options.config,
          logger: options.logger,
          locks: new RepositoryLocks(),
        }),
      store,
      loadConfig: async () => config,
      logger: silentLogger,
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
      ...overrides,
    };
  }

  beforeEach(() => {
    engine = new FakeEngine();
    store = new MemoryCredentialStore({ [URL]: { kind: "token", token: "test-token" } });
    stdout = [];
    stderr = [];
    config = { ...DEFAULT_CONFIG };
  });

  afterEach(async () => {
    await changeLanguage("en");
  });

  it("prints usage without arguments", async () => {
    expect(await runCli([], deps())).toBe(EXIT_SUCCESS);
    expect(stdout).toEqual([t("cli:usage")]);
  });

  it("prints usage for --help after a command", async () => {
    expect(await runCli(["sync", "--help"], deps())).toBe(EXIT_SUCCESS);
    expect(stdout).toEqual([t("cli:usage")]);
  });

  it("reports a parse error with usage", async () => {
    expect(await runCli(["frobnicate"], deps())).toBe(EXIT_USAGE);
    expect(stderr).toEqual(['Unknown command "frobnicate".']);
    expect(stdout).toEqual([t("cli:usage")]);
  });

  it("reports an unreadable config", async () => {
    const code = await runCli(
      ["status"],
      deps({
        loadConfig: async () => {
          throw new ConfigError(ErrorCode.CONFIG_PARSE_ERROR);
        },
      })
    );

    expect(code).toBe(EXIT_USAGE);
    expect(stderr).toEqual(["The configuration file could not be parsed."]);
  });

  describe("sync", () => {
    it("prints phases and the merged changes", async () => {
      engine.snapshot = [{ path: "README.md", oldHash: "h1", newHash: "h2" }];

      expect(await runCli(["sync", URL], deps())).toBe(EXIT_SUCCESS);
      expect(stdout).toEqual([
        `Fetching from ${URL}...`,
        "Merging (attempt 1)...",
        "Collecting changes...",
        "Pushing main...",
        "Done.",
        "Synchronized main (1 changes merged).",
        "  modified README.md",
      ]);
      expect(stderr).toEqual([]);
    });

    it("passes the retry and auto-resolve flags through", async () => {
      engine.mergeQueue = [{ status: "conflicts", conflicts: [disjointConflict()] }];

      const code = await runCli(["sync", URL, "--no-auto-resolve", "--max-retries", "1"], deps());

      expect(code).toBe(EXIT_CONFLICTS);
      expect(stderr).toEqual(["1 conflict(s) need manual resolution:", "  notes.txt", "Merge attempts: 1"]);
      expect(stdout).toContain("Resolving conflicts...");
      expect(engine.fetch).toHaveBeenCalledTimes(1);
      expect(engine.threeWayMerge).toHaveBeenCalledTimes(1);
    });

    it("exits with the authentication code when no credential resolves", async () => {
      store = new MemoryCredentialStore();

      expect(await runCli(["sync", URL], deps())).toBe(EXIT_AUTH_FAILED);
      expect(stderr).toEqual(["Sync failed.", "No credentials are available for this remote."]);
    });

    it("treats an invalid remote URL as a usage error", async () => {
      expect(await runCli(["sync", "ftp://example.com/repo.git"], deps())).toBe(EXIT_USAGE);
      expect(stderr).toEqual(["Sync failed.", "The remote URL is neither an HTTP(S) nor an SSH URL."]);
    });

    it("syncs the configured remote when none is given", async () => {
      engine.remotes.set("origin", URL);

      expect(await runCli(["sync"], deps())).toBe(EXIT_SUCCESS);
      expect(engine.getRemoteUrl).toHaveBeenCalledWith("origin");
      expect(stdout[0]).toBe(`Fetching from ${URL}...`);
    });

    it("treats an unknown remote name as a usage error", async () => {
      expect(await runCli(["sync", "upstream"], deps())).toBe(EXIT_USAGE);
      expect(stderr).toEqual(["Sync failed.", "No remote with that name is configured in this repository."]);
      expect(engine.fetch).not.toHaveBeenCalled();
    });
  });

  describe("pull", () => {
    it("reports a fast-forward with the short head", async () => {
      engine.fetchQueue = ["abcdef1234567"];

      expect(await runCli(["pull", URL], deps())).toBe(EXIT_SUCCESS);
      expect(stdout).toEqual(["Fast-forwarded main to abcdef1."]);
    });

    it("reports an up-to-date branch", async () => {
      engine.localRefs.set("refs/heads/main", "remote-1");

      expect(await runCli(["pull", URL, "main"], deps())).toBe(EXIT_SUCCESS);
      expect(stdout).toEqual(["main is already up to date."]);
    });

    it("points at sync when histories diverged", async () => {
      engine.pull.mockRejectedValueOnce(new NonFastForwardError());

      expect(await runCli(["pull", URL, "main"], deps())).toBe(EXIT_FAILED);
      expect(stderr).toEqual([t("cli:pull.diverged")]);
    });
  });

  describe("status", () => {
    it("reports a clean working tree", async () => {
      expect(await runCli(["status"], deps())).toBe(EXIT_SUCCESS);
      expect(stdout).toEqual(["Working tree clean."]);
    });

    it("lists classified changes", async () => {
      engine.snapshot = [
        { path: "old.md", oldHash: "h1", newHash: null },
        { path: "new.md", oldHash: null, newHash: "h1" },
      ];

      expect(await runCli(["status"], deps())).toBe(EXIT_SUCCESS);
      expect(stdout).toEqual(["Changes:", "  renamed  old.md -> new.md"]);
    });

    it("follows the configured language", async () => {
      config = { ...DEFAULT_CONFIG, language: "ko" };

      await runCli(["status"], deps());

      expect(stdout).toEqual(["작업 트리가 깨끗합니다."]);
    });
  });

  describe("credentials", () => {
    it("adds a token credential", async () => {
      const other = "https://example.org/repo.git";

      expect(await runCli(["credentials", "add", other, "--token", "test-token"], deps())).toBe(EXIT_SUCCESS);
      expect(stdout).toEqual([`Credential saved for ${other}.`]);
      expect(await store.get(other)).toEqual({ kind: "token", token: "test-token" });
    });

    it("refuses to add without a secret", async () => {
      expect(await runCli(["credentials", "add", URL], deps())).toBe(EXIT_USAGE);
      expect(stderr).toEqual([t("cli:credentials.missing_secret")]);
    });

    it("lists stored credentials with their expiry", async () => {
      await store.save("https://example.org/repo.git", {
        kind: "basic",
        username: "dev",
        password: "test-secret",
        expiresAt: "2030-01-01T00:00:00.000Z",
      });

      expect(await runCli(["credentials", "list"], deps())).toBe(EXIT_SUCCESS);
      expect(stdout).toEqual([`${URL}\ttoken`, "https://example.org/repo.git\tbasic (expires 2030-01-01T00:00:00.000Z)"]);
    });

    it("removes a credential", async () => {
      expect(await runCli(["credentials", "remove", URL], deps())).toBe(EXIT_SUCCESS);
      expect(stdout).toEqual([`Credential removed for ${URL}.`]);
      expect(await store.get(URL)).toBeNull();
    });

    it("reports removing an unknown credential", async () => {
      expect(await runCli(["credentials", "remove", "https://example.org/none.git"], deps())).toBe(EXIT_FAILED);
      expect(stderr).toEqual(["No credential stored for https://example.org/none.git."]);
    });

    it("rejects an unknown action", async () => {
      expect(await runCli(["credentials", "rotate"], deps())).toBe(EXIT_USAGE);
      expect(stderr).toEqual(['Unknown command "credentials rotate".']);
    });
  });
});
