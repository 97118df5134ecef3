import { InvalidEndpointError } from "../utils/errors.js";
import type { Protocol, RemoteEndpoint } from "./types.js";

const SCP_LIKE = /^git@([^:/]+):(.+)$/i;
const REMOTE_NAME = /^[A-Za-z0-9_][A-Za-z0-9._/-]*$/;

export function isHttpUrl(url: string): boolean {
  const lower = url.trim().toLowerCase();
  return lower.startsWith("http://") || lower.startsWith("https://");
}

export function isSshUrl(url: string): boolean {
  const lower = url.trim().toLowerCase();
  return lower.startsWith("ssh://") || lower.startsWith("git@");
}

/**
 * True for something shaped like a configured remote ("origin", "upstream")
 * rather than a URL. URLs always carry a ":".
 */
export function isRemoteName(value: string): boolean {
  return REMOTE_NAME.test(value.trim());
}

/**
 * `ssh://` or `git@` (any case) means SSH; everything else is HTTP.
 */
export function deriveProtocol(url: string): Protocol {
  return isSshUrl(url) ? "ssh" : "http";
}

/**
 * Build an immutable endpoint for one sync call.
 *
 * @throws {InvalidEndpointError} when the URL is empty or matches neither protocol
 */
export function createEndpoint(url: string, defaultBranch: string = "main"): RemoteEndpoint {
  const trimmed = url.trim();
  if (!trimmed || (!isHttpUrl(trimmed) && !isSshUrl(trimmed))) {
    throw new InvalidEndpointError(url);
  }
  return Object.freeze({
    url: trimmed,
    protocol: deriveProtocol(trimmed),
    defaultBranch,
  });
}

/**
 * Lower-cased host name of a remote URL, or null when it cannot be parsed.
 *
 * @example
 * hostOf("git@example.com:team/repo.git"); // "example.com"
 * hostOf("https://user@example.com:8443/repo.git"); // "example.com"
 */
export function hostOf(url: string): string | null {
  const trimmed = url.trim();
  const scp = SCP_LIKE.exec(trimmed);
  if (scp) {
    return scp[1].toLowerCase();
  }
  try {
    const host = new URL(trimmed).hostname;
    return host ? host.toLowerCase() : null;
  } catch {
    return null;
  }
}

/**
 * Rewrite an SSH remote as its HTTPS equivalent.
 *
 * @example
 * sshToHttps("git@example.com:team/repo.git"); // "https://example.com/team/repo.git"
 * sshToHttps("ssh://git@example.com/team/repo.git"); // "https://example.com/team/repo.git"
 */
export function sshToHttps(url: string): string {
  const trimmed = url.trim();
  const scp = SCP_LIKE.exec(trimmed);
  if (scp) {
    return `https://${scp[1]}/${scp[2]}`;
  }
  if (trimmed.toLowerCase().startsWith("ssh://")) {
    const rest = trimmed.slice("ssh://".length);
    const slash = rest.indexOf("/");
    const authority = slash >= 0 ? rest.slice(0, slash) : rest;
    const pathPart = slash >= 0 ? rest.slice(slash) : "";
    const hostPort = authority.slice(authority.lastIndexOf("@") + 1);
    // Drop an explicit SSH port; HTTPS uses its own.
    const host = hostPort.replace(/:\d+$/, "");
    return `https://${host}${pathPart}`;
  }
  return trimmed;
}
