/**
 * reposync error classes
 *
 * Provides hierarchical error classes with:
 * - Error codes (enum)
 * - User-friendly messages (i18n supported)
 * - Original cause tracking
 * - Recovery hints
 * - Recoverability indicators
 */

import { t } from "../i18n/index.js";

// ============================================================================
// Error Codes
// ============================================================================

export enum ErrorCode {
  // Base errors (1000-1099)
  UNKNOWN = 1000,

  // Authentication errors (2000-2099)
  AUTH_NO_CREDENTIAL = 2000,
  AUTH_REJECTED = 2001,
  AUTH_INCOMPATIBLE_CREDENTIAL = 2002,

  // Transport errors (3000-3099)
  NETWORK_ERROR = 3000,
  NETWORK_TIMEOUT = 3001,
  NON_FAST_FORWARD = 3002,

  // Endpoint errors (4000-4099)
  ENDPOINT_INVALID = 4000,
  ENDPOINT_EMPTY = 4001,
  ENDPOINT_REMOTE_UNKNOWN = 4002,

  // Merge errors (5000-5099)
  MERGE_ATTEMPT_INVALID = 5000,
  MERGE_FAILED = 5001,

  // Sync lifecycle (6000-6099)
  SYNC_CANCELLED = 6000,
  SYNC_IN_PROGRESS = 6001,

  // Config errors (7000-7099)
  CONFIG_PARSE_ERROR = 7000,
  CONFIG_INVALID_VALUE = 7001,

  // Credential store errors (8000-8099)
  CREDENTIAL_STORE_READ = 8000,
  CREDENTIAL_STORE_WRITE = 8001,

  // Repository engine errors (9000-9099)
  GIT_COMMAND_FAILED = 9000,
  GIT_NOT_A_REPOSITORY = 9001,
}

// ============================================================================
// Error Code to i18n Key Mapping
// ============================================================================

const ERROR_CODE_KEYS: Record<ErrorCode, string> = {
  [ErrorCode.UNKNOWN]: "unknown",
  [ErrorCode.AUTH_NO_CREDENTIAL]: "auth_no_credential",
  [ErrorCode.AUTH_REJECTED]: "auth_rejected",
  [ErrorCode.AUTH_INCOMPATIBLE_CREDENTIAL]: "auth_incompatible_credential",
  [ErrorCode.NETWORK_ERROR]: "network_error",
  [ErrorCode.NETWORK_TIMEOUT]: "network_timeout",
  [ErrorCode.NON_FAST_FORWARD]: "non_fast_forward",
  [ErrorCode.ENDPOINT_INVALID]: "endpoint_invalid",
  [ErrorCode.ENDPOINT_EMPTY]: "endpoint_empty",
  [ErrorCode.ENDPOINT_REMOTE_UNKNOWN]: "endpoint_remote_unknown",
  [ErrorCode.MERGE_ATTEMPT_INVALID]: "merge_attempt_invalid",
  [ErrorCode.MERGE_FAILED]: "merge_failed",
  [ErrorCode.SYNC_CANCELLED]: "sync_cancelled",
  [ErrorCode.SYNC_IN_PROGRESS]: "sync_in_progress",
  [ErrorCode.CONFIG_PARSE_ERROR]: "config_parse_error",
  [ErrorCode.CONFIG_INVALID_VALUE]: "config_invalid_value",
  [ErrorCode.CREDENTIAL_STORE_READ]: "credential_store_read",
  [ErrorCode.CREDENTIAL_STORE_WRITE]: "credential_store_write",
  [ErrorCode.GIT_COMMAND_FAILED]: "git_command_failed",
  [ErrorCode.GIT_NOT_A_REPOSITORY]: "git_not_a_repository",
};

// ============================================================================
// User-friendly error messages (i18n)
// ============================================================================

interface ErrorMessages {
  minimal: string;
  medium: string;
  detailed: string;
}

function getErrorMessages(code: ErrorCode): ErrorMessages {
  const key = ERROR_CODE_KEYS[code];
  return {
    minimal: t(`errors:codes.${key}.minimal`),
    medium: t(`errors:codes.${key}.medium`),
    detailed: t(`errors:codes.${key}.detailed`),
  };
}

function getRecoveryHintForCode(code: ErrorCode): string | undefined {
  const key = ERROR_CODE_KEYS[code];
  const hint = t(`errors:recovery_hints.${key}`, { defaultValue: "" });
  return hint || undefined;
}

// Recovery hint codes that have translations
const RECOVERY_HINT_CODES = new Set<ErrorCode>([
  ErrorCode.AUTH_NO_CREDENTIAL,
  ErrorCode.AUTH_REJECTED,
  ErrorCode.AUTH_INCOMPATIBLE_CREDENTIAL,
  ErrorCode.NETWORK_ERROR,
  ErrorCode.NETWORK_TIMEOUT,
  ErrorCode.ENDPOINT_INVALID,
  ErrorCode.ENDPOINT_REMOTE_UNKNOWN,
  ErrorCode.SYNC_IN_PROGRESS,
  ErrorCode.CONFIG_INVALID_VALUE,
]);

// Transient failures: the orchestrator may retry the step once
const RECOVERABLE_ERRORS = new Set<ErrorCode>([
  ErrorCode.NETWORK_ERROR,
  ErrorCode.NETWORK_TIMEOUT,
]);

// ============================================================================
// Base Error Class
// ============================================================================

export interface SyncErrorOptions {
  cause?: Error;
  recoverable?: boolean;
  recoveryHint?: string;
}

export class SyncError extends Error {
  public readonly code: ErrorCode;
  public readonly recoverable: boolean;
  public readonly recoveryHint?: string;
  public readonly cause?: Error;
  public readonly timestamp: Date;

  constructor(code: ErrorCode, message?: string, options?: SyncErrorOptions) {
    const messages = getErrorMessages(code);
    const baseMessage = message || messages.medium || t("errors:format.fallback_error");
    super(baseMessage);

    this.name = "SyncError";
    this.code = code;
    this.cause = options?.cause;
    this.recoverable = options?.recoverable ?? RECOVERABLE_ERRORS.has(code);
    this.recoveryHint =
      options?.recoveryHint ??
      (RECOVERY_HINT_CODES.has(code) ? getRecoveryHintForCode(code) : undefined);
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get user-friendly message at specified detail level
   */
  getUserMessage(level: ErrorLevel = "medium"): string {
    const messages = getErrorMessages(this.code);
    return messages[level] || this.message;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      recoveryHint: this.recoveryHint,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Specialized Error Classes
// ============================================================================

interface RemoteErrorOptions extends SyncErrorOptions {
  url?: string;
}

/**
 * No usable credential, or the remote rejected it. Fatal for the current sync.
 */
export class AuthenticationError extends SyncError {
  public readonly url?: string;

  constructor(
    code: ErrorCode = ErrorCode.AUTH_REJECTED,
    message?: string,
    options?: RemoteErrorOptions
  ) {
    super(code, message, { ...options, recoverable: false });
    this.name = "AuthenticationError";
    this.url = options?.url;
  }
}

/**
 * Transient transfer failure.
 */
export class NetworkError extends SyncError {
  public readonly url?: string;

  constructor(
    code: ErrorCode = ErrorCode.NETWORK_ERROR,
    message?: string,
    options?: RemoteErrorOptions
  ) {
    super(code, message, options);
    this.name = "NetworkError";
    this.url = options?.url;
  }
}

/**
 * The remote moved ahead with diverging history. Routes into the merge path.
 */
export class NonFastForwardError extends SyncError {
  public readonly branch?: string;

  constructor(message?: string, options?: SyncErrorOptions & { branch?: string }) {
    super(ErrorCode.NON_FAST_FORWARD, message, { ...options, recoverable: false });
    this.name = "NonFastForwardError";
    this.branch = options?.branch;
  }
}

/**
 * The URL fails every protocol predicate, or names a remote the repository
 * does not have. Reported before any transfer.
 */
export class InvalidEndpointError extends SyncError {
  public readonly url: string;

  constructor(url: string, options?: SyncErrorOptions & { code?: ErrorCode }) {
    super(options?.code ?? (url.trim() ? ErrorCode.ENDPOINT_INVALID : ErrorCode.ENDPOINT_EMPTY), undefined, {
      ...options,
      recoverable: false,
    });
    this.name = "InvalidEndpointError";
    this.url = url;
  }
}

export class CancelledError extends SyncError {
  constructor(message?: string, options?: SyncErrorOptions) {
    super(ErrorCode.SYNC_CANCELLED, message, { ...options, recoverable: false });
    this.name = "CancelledError";
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends SyncError {
  public readonly configKey?: string;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: SyncErrorOptions & { configKey?: string }
  ) {
    super(code, message, options);
    this.name = "ConfigError";
    this.configKey = options?.configKey;
  }
}

export class CredentialStoreError extends SyncError {
  public readonly path?: string;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: SyncErrorOptions & { path?: string }
  ) {
    super(code, message, options);
    this.name = "CredentialStoreError";
    this.path = options?.path;
  }
}

// ============================================================================
// Error kinds surfaced in SyncResult
// ============================================================================

export type ErrorKind =
  | "AuthenticationError"
  | "NetworkError"
  | "NonFastForwardError"
  | "InvalidEndpointError"
  | "Cancelled"
  | "SyncInProgress"
  | "Unknown";

export function errorKindOf(error: unknown): ErrorKind {
  if (error instanceof AuthenticationError) return "AuthenticationError";
  if (error instanceof NetworkError) return "NetworkError";
  if (error instanceof NonFastForwardError) return "NonFastForwardError";
  if (error instanceof InvalidEndpointError) return "InvalidEndpointError";
  if (error instanceof CancelledError) return "Cancelled";
  if (error instanceof SyncError && error.code === ErrorCode.SYNC_IN_PROGRESS) {
    return "SyncInProgress";
  }
  return "Unknown";
}

// ============================================================================
// Error Formatter Utilities
// ============================================================================

export type ErrorLevel = "minimal" | "medium" | "detailed";

/**
 * Format error for user display based on detail level
 */
export function formatErrorForUser(error: unknown, level: ErrorLevel = "medium"): string {
  if (error instanceof SyncError) {
    let message = error.getUserMessage(level);

    if (level !== "minimal" && error.recoveryHint) {
      message += `\n\n${t("errors:format.hint")} ${error.recoveryHint}`;
    }

    if (level === "detailed") {
      message += `\n\n[${t("errors:format.error_code")} ${error.code}]`;
      if (error.cause) {
        message += `\n[${t("errors:format.cause")} ${error.cause.message}]`;
      }
      if ((error instanceof AuthenticationError || error instanceof NetworkError) && error.url) {
        message += `\n[${t("errors:format.url")} ${error.url}]`;
      }
    }

    return message;
  }

  if (error instanceof Error) {
    switch (level) {
      case "minimal":
        return t("errors:format.standard_error_minimal");
      case "medium":
        return t("errors:format.standard_error_medium", { message: error.message });
      case "detailed":
        return t("errors:format.standard_error_detailed", {
          message: error.message,
          stack: error.stack || "",
        });
    }
  }

  return level === "minimal"
    ? t("errors:format.standard_error_minimal")
    : t("errors:format.standard_error_medium", { message: String(error) });
}

/**
 * Check if an error is recoverable
 */
export function isRecoverableError(error: unknown): boolean {
  if (error instanceof SyncError) {
    return error.recoverable;
  }
  return false;
}

/**
 * Convert any error to a SyncError
 */
export function toSyncError(error: unknown): SyncError {
  if (error instanceof SyncError) {
    return error;
  }

  return new SyncError(ErrorCode.UNKNOWN, error instanceof Error ? error.message : String(error), {
    cause: error instanceof Error ? error : undefined,
  });
}
