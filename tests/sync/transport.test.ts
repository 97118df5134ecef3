/**
 * Tests for the HTTP and SSH transports
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { CredentialCache } from "../../src/sync/credentials/cache.js";
import { CredentialProvider } from "../../src/sync/credentials/provider.js";
import { MemoryCredentialStore } from "../../src/sync/credentials/memoryStore.js";
import type { SyncContext } from "../../src/sync/context.js";
import { createEndpoint } from "../../src/sync/endpoint.js";
import { HTTP_POLICY, SSH_POLICY } from "../../src/sync/transport/policy.js";
import { Transport, createTransports } from "../../src/sync/transport/transport.js";
import type { Credential, Protocol } from "../../src/sync/types.js";
import { AuthenticationError, CancelledError, ErrorCode, InvalidEndpointError } from "../../src/utils/errors.js";
import { silentLogger } from "../../src/utils/logger.js";
import { FakeEngine } from "../helpers/fakeEngine.js";

const HTTP_URL = "https://example.com/team/repo.git";
const SSH_URL = "git@example.com:team/repo.git";

function contextFor(credentials: Record<string, Credential>, signal?: AbortSignal): SyncContext {
  const provider = new CredentialProvider({ store: new MemoryCredentialStore(credentials), env: {} });
  return { logger: silentLogger, credentials: new CredentialCache(provider), signal };
}

describe("Transport", () => {
  let engine: FakeEngine;
  let transports: Record<Protocol, Transport>;

  beforeEach(() => {
    engine = new FakeEngine();
    transports = createTransports(engine);
  });

  describe("validateConnection", () => {
    it.each([
      [HTTP_URL, true, false],
      ["http://example.com/repo.git", true, false],
      [SSH_URL, false, true],
      ["ssh://git@example.com/team/repo.git", false, true],
      ["", false, false],
      ["   ", false, false],
      ["ftp://example.com/repo.git", false, false],
    ])("%s", (url, http, ssh) => {
      expect(transports.http.validateConnection(url)).toBe(http);
      expect(transports.ssh.validateConnection(url)).toBe(ssh);
    });

    it("never touches the engine", () => {
      transports.http.validateConnection(HTTP_URL);
      expect(engine.listRemoteBranches).not.toHaveBeenCalled();
      expect(engine.fetch).not.toHaveBeenCalled();
    });
  });

  it("exposes its protocol and policy", () => {
    expect(transports.http.protocol).toBe("http");
    expect(transports.http.policy).toBe(HTTP_POLICY);
    expect(transports.ssh.protocol).toBe("ssh");
    expect(transports.ssh.policy).toBe(SSH_POLICY);
  });

  it("fetches with the resolved credential and reports the protocol", async () => {
    const ctx = contextFor({ [HTTP_URL]: { kind: "token", token: "test-token" } });

    const outcome = await transports.http.fetch(createEndpoint(HTTP_URL), ctx);

    expect(outcome).toEqual({ branch: "main", remoteHead: "remote-1", protocol: "http" });
    expect(engine.fetch).toHaveBeenCalledWith(
      { url: HTTP_URL, credential: { kind: "token", token: "test-token" } },
      "main",
      { signal: undefined }
    );
  });

  it("fetches over SSH with an agent credential", async () => {
    const ctx = contextFor({ [SSH_URL]: { kind: "ssh-agent" } });

    const outcome = await transports.ssh.fetch(createEndpoint(SSH_URL), ctx, "develop");

    expect(outcome).toEqual({ branch: "develop", remoteHead: "remote-1", protocol: "ssh" });
  });

  it("lists remote branches", async () => {
    engine.remoteBranches = ["main", "release"];
    const ctx = contextFor({ [HTTP_URL]: { kind: "basic", username: "dev", password: "test-secret" } });

    expect(await transports.http.listBranches(createEndpoint(HTTP_URL), ctx)).toEqual(["main", "release"]);
  });

  it("refuses URLs of the other protocol", async () => {
    const ctx = contextFor({ [SSH_URL]: { kind: "ssh-agent" } });

    await expect(transports.http.fetch(createEndpoint(SSH_URL), ctx)).rejects.toBeInstanceOf(InvalidEndpointError);
    expect(engine.fetch).not.toHaveBeenCalled();
  });

  it("skips a stored credential of the wrong kind", async () => {
    const ctx = contextFor({ [SSH_URL]: { kind: "token", token: "test-token" } });

    await expect(transports.ssh.fetch(createEndpoint(SSH_URL), ctx)).rejects.toMatchObject({
      code: ErrorCode.AUTH_NO_CREDENTIAL,
    });
    expect(engine.fetch).not.toHaveBeenCalled();
  });

  it("rejects a resolved credential the policy does not accept", async () => {
    // An endpoint labelled SSH resolves an agent credential, which HTTP refuses.
    const provider = new CredentialProvider({
      store: new MemoryCredentialStore(),
      env: { SSH_AUTH_SOCK: "/tmp/agent.sock" },
    });
    const ctx: SyncContext = { logger: silentLogger, credentials: new CredentialCache(provider) };
    const mislabelled = { ...createEndpoint(HTTP_URL), protocol: "ssh" as const };

    await expect(transports.http.fetch(mislabelled, ctx)).rejects.toMatchObject({
      code: ErrorCode.AUTH_INCOMPATIBLE_CREDENTIAL,
    });
    expect(engine.fetch).not.toHaveBeenCalled();
  });

  it("fails authentication when no credential resolves", async () => {
    const ctx = contextFor({});

    await expect(transports.http.fetch(createEndpoint(HTTP_URL), ctx)).rejects.toBeInstanceOf(AuthenticationError);
    expect(engine.fetch).not.toHaveBeenCalled();
  });

  it("refuses to start a transfer once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const ctx = contextFor({ [HTTP_URL]: { kind: "token", token: "test-token" } }, controller.signal);

    await expect(transports.http.fetch(createEndpoint(HTTP_URL), ctx)).rejects.toBeInstanceOf(CancelledError);
    expect(engine.fetch).not.toHaveBeenCalled();
  });

  it("forwards the signal to fetch and pull", async () => {
    const controller = new AbortController();
    const ctx = contextFor({ [HTTP_URL]: { kind: "token", token: "test-token" } }, controller.signal);
    const endpoint = createEndpoint(HTTP_URL);

    await transports.http.fetch(endpoint, ctx);
    await transports.http.pull(endpoint, "main", ctx);

    expect(engine.fetch.mock.calls[0][2]).toEqual({ signal: controller.signal });
    expect(engine.pull.mock.calls[0][2]).toEqual({ signal: controller.signal });
  });

  describe("push", () => {
    it("pushes the given commit with the observed remote head as lease", async () => {
      const ctx = contextFor({ [HTTP_URL]: { kind: "token", token: "test-token" } });

      const outcome = await transports.http.push(createEndpoint(HTTP_URL), "main", ctx, {
        source: "merged-1",
        expectedRemoteHead: "remote-1",
      });

      expect(outcome).toEqual({ status: "updated", branch: "main", commit: "merged-1" });
      expect(engine.atomicUpdateRef).toHaveBeenCalledWith(
        { url: HTTP_URL, credential: { kind: "token", token: "test-token" } },
        "main",
        "merged-1",
        "remote-1"
      );
    });

    it("defaults the source to the local branch", async () => {
      const ctx = contextFor({ [HTTP_URL]: { kind: "token", token: "test-token" } });

      await transports.http.push(createEndpoint(HTTP_URL), "main", ctx);

      expect(engine.atomicUpdateRef).toHaveBeenCalledWith(expect.anything(), "main", "refs/heads/main", undefined);
    });

    it("never hands the abort signal to the ref update", async () => {
      const controller = new AbortController();
      const ctx = contextFor({ [HTTP_URL]: { kind: "token", token: "test-token" } }, controller.signal);

      await transports.http.push(createEndpoint(HTTP_URL), "main", ctx, { source: "merged-1" });

      expect(engine.atomicUpdateRef.mock.calls[0]).toHaveLength(4);
      expect(engine.atomicUpdateRef.mock.calls[0]).not.toContain(controller.signal);
    });
  });
});
