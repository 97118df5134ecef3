/**
 * reposync CLI
 *
 * Commands:
 *   sync [remote] [branch]       - fetch, merge, resolve and push
 *   pull [remote] [branch]       - fast-forward only
 *   status                       - classify working tree changes
 *   credentials add|remove|list  - manage stored credentials
 *
 * Exit codes:
 *   0 - Success
 *   1 - Usage or validation error
 *   2 - Authentication failed
 *   3 - Sync failed
 *   4 - Conflicts need manual resolution
 */

import { changeLanguage, getCurrentLanguage, t } from "./i18n/index.js";
import { expandPath, getLogDir, loadConfig, type SyncConfig } from "./utils/config.js";
import {
  AuthenticationError,
  InvalidEndpointError,
  NonFastForwardError,
  formatErrorForUser,
} from "./utils/errors.js";
import { createLogger, type LogSink } from "./utils/logger.js";
import { EncryptedFileCredentialStore } from "./sync/credentials/fileStore.js";
import type { CredentialStore } from "./sync/credentials/types.js";
import { createSyncService, type SyncServiceOptions } from "./sync/index.js";
import type { SyncOrchestrator } from "./sync/orchestrator.js";
import type { ChangeRecord, Credential, SyncResult } from "./sync/types.js";

export const EXIT_SUCCESS = 0;
export const EXIT_USAGE = 1;
export const EXIT_AUTH_FAILED = 2;
export const EXIT_FAILED = 3;
export const EXIT_CONFLICTS = 4;

export type Command = "sync" | "pull" | "status" | "credentials";

const COMMANDS: readonly Command[] = ["sync", "pull", "status", "credentials"];

export interface CliOptions {
  repo: string;
  autoResolve: boolean;
  maxRetries?: number;
  debug: boolean;
  help: boolean;
  token?: string;
  username?: string;
  password?: string;
  sshKey?: string;
  passphrase?: string;
}

export type ParsedArgs =
  | { ok: true; command: Command; positionals: string[]; options: CliOptions }
  | { ok: false; error: string };

function isCommand(value: string | undefined): value is Command {
  return value !== undefined && COMMANDS.some((command) => command === value);
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  const command = args[0];
  if (!isCommand(command)) {
    return { ok: false, error: t("cli:errors.unknown_command", { command: command ?? "" }) };
  }

  const options: CliOptions = {
    repo: process.cwd(),
    autoResolve: true,
    debug: false,
    help: false,
  };
  const positionals: string[] = [];

  let i = 1;
  while (i < args.length) {
    const arg = args[i];
    const next = args[i + 1];

    if (arg === "--repo" && next) {
      options.repo = expandPath(next);
      i++;
    } else if (arg === "--no-auto-resolve") {
      options.autoResolve = false;
    } else if (arg === "--max-retries" && next) {
      const value = Number(next);
      if (!Number.isInteger(value) || value < 1) {
        return { ok: false, error: t("cli:errors.invalid_number", { value: next, option: arg }) };
      }
      options.maxRetries = value;
      i++;
    } else if (arg === "--token" && next) {
      options.token = next;
      i++;
    } else if (arg === "--username" && next) {
      options.username = next;
      i++;
    } else if (arg === "--password" && next) {
      options.password = next;
      i++;
    } else if (arg === "--ssh-key" && next) {
      options.sshKey = expandPath(next);
      i++;
    } else if (arg === "--passphrase" && next) {
      options.passphrase = next;
      i++;
    } else if (arg === "--debug") {
      options.debug = true;
    } else if (arg === "-h" || arg === "--help") {
      options.help = true;
    } else if (arg.startsWith("-")) {
      return { ok: false, error: t("cli:errors.unknown_option", { option: arg }) };
    } else {
      positionals.push(arg);
    }
    i++;
  }

  return { ok: true, command, positionals, options };
}

/**
 * Credential described by the add-credential flags, or null when incomplete.
 */
export function credentialFromOptions(options: CliOptions): Credential | null {
  if (options.token) {
    return { kind: "token", token: options.token, username: options.username };
  }
  if (options.username && options.password) {
    return { kind: "basic", username: options.username, password: options.password };
  }
  if (options.sshKey) {
    return { kind: "ssh-key", privateKeyPath: options.sshKey, passphrase: options.passphrase };
  }
  return null;
}

export function formatChange(change: ChangeRecord): string {
  const kind = change.kind.padEnd(8);
  return change.previousPath
    ? `  ${kind} ${change.previousPath} -> ${change.path}`
    : `  ${kind} ${change.path}`;
}

export function exitCodeFor(result: SyncResult): number {
  switch (result.outcome) {
    case "synced":
      return EXIT_SUCCESS;
    case "conflicts-remain":
      return EXIT_CONFLICTS;
    case "cancelled":
      return EXIT_FAILED;
    case "failed":
      if (result.error === "AuthenticationError") return EXIT_AUTH_FAILED;
      if (result.error === "InvalidEndpointError") return EXIT_USAGE;
      return EXIT_FAILED;
  }
}

export interface CliDeps {
  createService?: (options: SyncServiceOptions) => SyncOrchestrator;
  store?: CredentialStore;
  loadConfig?: () => Promise<SyncConfig>;
  logger?: LogSink;
  signal?: AbortSignal;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

/**
 * Main entry point for the CLI
 */
export async function runCli(args: string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.stdout ?? ((line: string) => console.log(line));
  const err = deps.stderr ?? ((line: string) => console.error(line));

  if (args.length === 0 || args[0] === "-h" || args[0] === "--help") {
    out(t("cli:usage"));
    return EXIT_SUCCESS;
  }

  const parsed = parseArgs(args);
  if (!parsed.ok) {
    err(parsed.error);
    out(t("cli:usage"));
    return EXIT_USAGE;
  }
  const { command, positionals, options } = parsed;
  if (options.help) {
    out(t("cli:usage"));
    return EXIT_SUCCESS;
  }

  let config: SyncConfig;
  try {
    config = await (deps.loadConfig ?? loadConfig)();
  } catch (error) {
    err(formatErrorForUser(error));
    return EXIT_USAGE;
  }
  if (!process.env.REPOSYNC_LANG && config.language !== getCurrentLanguage()) {
    await changeLanguage(config.language);
  }

  let logger: LogSink;
  if (deps.logger) {
    logger = deps.logger;
  } else {
    const fileLogger = createLogger({
      debug: options.debug || config.debug,
      logToFile: config.logToFile,
      logDir: getLogDir(),
    });
    await fileLogger.init();
    logger = fileLogger;
  }
  const store = deps.store ?? new EncryptedFileCredentialStore();
  const service = (): SyncOrchestrator =>
    (deps.createService ?? createSyncService)({ repoPath: options.repo, config, logger, store });

  try {
    switch (command) {
      case "sync":
        return await runSync(service(), positionals, options, { out, err, signal: deps.signal });
      case "pull":
        return await runPull(service(), positionals, { out, err, signal: deps.signal });
      case "status":
        return await runStatus(service(), out);
      case "credentials":
        return await runCredentials(store, positionals, options, { out, err });
    }
  } catch (error) {
    err(formatErrorForUser(error, options.debug ? "detailed" : "medium"));
    return error instanceof AuthenticationError ? EXIT_AUTH_FAILED : EXIT_FAILED;
  } finally {
    await logger.flush();
  }
}

interface Output {
  out: (line: string) => void;
  err: (line: string) => void;
  signal?: AbortSignal;
}

async function runSync(
  orchestrator: SyncOrchestrator,
  positionals: string[],
  options: CliOptions,
  io: Output
): Promise<number> {
  const [remote, branch] = positionals;

  orchestrator.on("phase", (event) => {
    io.out(t(`cli:phase.${event.phase}`, { url: event.url, branch: event.branch, attempt: event.attempt }));
  });

  const result = await orchestrator.sync(remote, branch, {
    signal: io.signal,
    autoResolve: options.autoResolve,
    maxRetries: options.maxRetries,
  });

  switch (result.outcome) {
    case "synced":
      io.out(t("cli:sync.synced", { branch: result.branch, count: result.changes.length }));
      result.changes.forEach((change) => io.out(formatChange(change)));
      break;
    case "conflicts-remain":
      io.err(t("cli:sync.conflicts_remain", { count: result.unresolvedConflicts.length }));
      result.unresolvedConflicts.forEach((conflict) => io.err(`  ${conflict.path}`));
      io.err(t("cli:sync.attempts", { count: result.attempts.length }));
      break;
    case "cancelled":
      io.err(t("cli:sync.cancelled"));
      break;
    case "failed":
      io.err(t("cli:sync.failed"));
      if (result.errorMessage) io.err(result.errorMessage);
      break;
  }
  return exitCodeFor(result);
}

async function runPull(orchestrator: SyncOrchestrator, positionals: string[], io: Output): Promise<number> {
  const [remote, branch] = positionals;
  try {
    const outcome = await orchestrator.pull(remote, branch, io.signal);
    io.out(
      outcome.head === outcome.previousHead
        ? t("cli:pull.up_to_date", { branch: outcome.branch })
        : t("cli:pull.fast_forward", { branch: outcome.branch, head: outcome.head.slice(0, 7) })
    );
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof NonFastForwardError) {
      io.err(t("cli:pull.diverged"));
      return EXIT_FAILED;
    }
    if (error instanceof InvalidEndpointError) {
      io.err(formatErrorForUser(error));
      return EXIT_USAGE;
    }
    throw error;
  }
}

async function runStatus(orchestrator: SyncOrchestrator, out: (line: string) => void): Promise<number> {
  const changes = await orchestrator.classifyWorkingTree();
  if (changes.length === 0) {
    out(t("cli:status.clean"));
    return EXIT_SUCCESS;
  }
  out(t("cli:status.header"));
  changes.forEach((change) => out(formatChange(change)));
  return EXIT_SUCCESS;
}

async function runCredentials(
  store: CredentialStore,
  positionals: string[],
  options: CliOptions,
  io: Output
): Promise<number> {
  const [action, url] = positionals;

  switch (action) {
    case "add": {
      if (!url) {
        io.err(t("cli:errors.missing_url"));
        return EXIT_USAGE;
      }
      const credential = credentialFromOptions(options);
      if (!credential) {
        io.err(t("cli:credentials.missing_secret"));
        return EXIT_USAGE;
      }
      await store.save(url, credential);
      io.out(t("cli:credentials.saved", { url }));
      return EXIT_SUCCESS;
    }
    case "remove": {
      if (!url) {
        io.err(t("cli:errors.missing_url"));
        return EXIT_USAGE;
      }
      const removed = await store.remove(url);
      if (!removed) {
        io.err(t("cli:credentials.not_found", { url }));
        return EXIT_FAILED;
      }
      io.out(t("cli:credentials.removed", { url }));
      return EXIT_SUCCESS;
    }
    case "list": {
      const records = await store.list();
      if (records.length === 0) {
        io.out(t("cli:credentials.none"));
        return EXIT_SUCCESS;
      }
      for (const record of records) {
        const expiry = record.credential.expiresAt ? ` (expires ${record.credential.expiresAt})` : "";
        io.out(`${record.url}\t${record.credential.kind}${expiry}`);
      }
      return EXIT_SUCCESS;
    }
    default:
      io.err(t("cli:errors.unknown_command", { command: `credentials ${action ?? ""}`.trim() }));
      return EXIT_USAGE;
  }
}
