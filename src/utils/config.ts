import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import yaml from "yaml";
import { z } from "zod";
import { ConfigError, ErrorCode } from "./errors.js";

/**
 * Expand tilde (~) to home directory in a path.
 * Also handles Windows %USERPROFILE% environment variable.
 *
 * @example
 * expandPath("~/src/project"); // "/Users/username/src/project" on macOS
 */
export function expandPath(inputPath: string): string {
  if (!inputPath) return inputPath;

  if (inputPath.startsWith("~/")) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === "~") {
    return os.homedir();
  }

  if (process.platform === "win32" && inputPath.includes("%USERPROFILE%")) {
    return inputPath.replace(/%USERPROFILE%/gi, os.homedir());
  }

  return path.resolve(inputPath);
}

// ============================================================================
// Schema
// ============================================================================

export const SyncConfigSchema = z.object({
  /** Remote name used for remote-tracking refs */
  remoteName: z.string().min(1).default("origin"),
  /** Branch synced when the caller names none */
  defaultBranch: z.string().min(1).default("main"),
  /** Used when defaultBranch does not exist on the remote */
  fallbackBranch: z.string().min(1).default("master"),
  /** Upper bound on merge attempts per sync */
  maxMergeConflictRetries: z.number().int().min(1).max(10).default(3),
  /** Auto-resolve conflicts whose hunks do not overlap */
  autoResolveNonConflicting: z.boolean().default(true),
  /** Minimum similarity (0-1) for rename/copy detection */
  renameSimilarityThreshold: z.number().min(0).max(1).default(0.5),
  /** Delay before the single retry of a transient network failure */
  networkRetryDelayMs: z.number().int().nonnegative().default(1000),
  language: z.enum(["en", "ko"]).default("en"),
  debug: z.boolean().default(false),
  logToFile: z.boolean().default(false),
});

export type SyncConfig = z.infer<typeof SyncConfigSchema>;
export type SyncConfigInput = z.input<typeof SyncConfigSchema>;

export const DEFAULT_CONFIG: Readonly<SyncConfig> = Object.freeze(SyncConfigSchema.parse({}));

/**
 * Validate a partial configuration, filling defaults.
 *
 * @throws {ConfigError} CONFIG_INVALID_VALUE naming the first offending key
 */
export function resolveConfig(input: unknown = {}): SyncConfig {
  const result = SyncConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue?.path.join(".") || undefined;
    throw new ConfigError(
      ErrorCode.CONFIG_INVALID_VALUE,
      key ? `Invalid value for "${key}": ${issue.message}` : undefined,
      { configKey: key }
    );
  }
  return result.data;
}

// ============================================================================
// Paths
// ============================================================================

/**
 * Get the configuration directory path.
 * In test mode (REPOSYNC_TEST_CONFIG_DIR env var set), uses the test directory.
 * Otherwise uses ~/.reposync
 */
export function getConfigDir(): string {
  if (process.env.REPOSYNC_TEST_CONFIG_DIR) {
    return process.env.REPOSYNC_TEST_CONFIG_DIR;
  }
  return path.join(os.homedir(), ".reposync");
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.yaml");
}

/**
 * Path to the encrypted credential store.
 */
export function getCredentialsPath(): string {
  return path.join(getConfigDir(), "credentials.enc");
}

export function getLogDir(): string {
  return path.join(getConfigDir(), "logs");
}

export async function ensureConfigDir(): Promise<void> {
  await fs.mkdir(getConfigDir(), { recursive: true });
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

// ============================================================================
// Load / save
// ============================================================================

/**
 * Load the configuration from disk.
 *
 * A missing file yields the defaults. Partial files are merged with defaults.
 *
 * @throws {ConfigError} CONFIG_PARSE_ERROR for malformed YAML,
 *   CONFIG_INVALID_VALUE for values the schema rejects
 */
export async function loadConfig(): Promise<SyncConfig> {
  const configPath = getConfigPath();

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return { ...DEFAULT_CONFIG };
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (error) {
    throw new ConfigError(ErrorCode.CONFIG_PARSE_ERROR, undefined, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  return resolveConfig(parsed ?? {});
}

export async function saveConfig(config: SyncConfig): Promise<void> {
  await ensureConfigDir();
  const validated = resolveConfig(config);
  await fs.writeFile(getConfigPath(), yaml.stringify(validated), "utf-8");
}

/**
 * Update the configuration with partial changes.
 */
export async function updateConfig(updates: Partial<SyncConfig>): Promise<SyncConfig> {
  const current = await loadConfig();
  const updated = resolveConfig({ ...current, ...updates });
  await saveConfig(updated);
  return updated;
}

export async function configExists(): Promise<boolean> {
  try {
    await fs.access(getConfigPath());
    return true;
  } catch {
    return false;
  }
}
