import { GitError, GitPluginError } from "simple-git";
import {
  AuthenticationError,
  CancelledError,
  ErrorCode,
  NetworkError,
  NonFastForwardError,
  SyncError,
} from "../../utils/errors.js";

const AUTH_PATTERNS = [
  /authentication failed/i,
  /could not read (username|password)/i,
  /permission denied \(publickey/i,
  /\b(401|403)\b/,
  /terminal prompts disabled/i,
  /invalid credentials/i,
];

const NON_FAST_FORWARD_PATTERNS = [
  /non-fast-forward/i,
  /\[rejected\]/i,
  /stale info/i,
  /fetch first/i,
  /not possible to fast-forward/i,
];

const NETWORK_PATTERNS = [
  /could not resolve host/i,
  /unable to access/i,
  /connection (refused|reset)/i,
  /early eof/i,
  /the remote end hung up/i,
  /could not read from remote repository/i,
  /network is unreachable/i,
];

export interface GitErrorContext {
  url?: string;
  branch?: string;
}

/**
 * Map a failure of a git invocation onto the sync error taxonomy.
 */
export function classifyGitError(error: unknown, context: GitErrorContext = {}): SyncError {
  if (error instanceof SyncError) {
    return error;
  }

  if (error instanceof GitPluginError) {
    if (error.plugin === "abort") {
      return new CancelledError(undefined, { cause: error });
    }
    if (error.plugin === "timeout") {
      return new NetworkError(ErrorCode.NETWORK_TIMEOUT, undefined, { cause: error, url: context.url });
    }
  }

  const cause = error instanceof Error ? error : undefined;
  const message = error instanceof Error ? error.message : String(error);

  if (AUTH_PATTERNS.some((pattern) => pattern.test(message))) {
    return new AuthenticationError(ErrorCode.AUTH_REJECTED, undefined, { cause, url: context.url });
  }
  if (NON_FAST_FORWARD_PATTERNS.some((pattern) => pattern.test(message))) {
    return new NonFastForwardError(undefined, { cause, branch: context.branch });
  }
  if (/timed out|timeout/i.test(message)) {
    return new NetworkError(ErrorCode.NETWORK_TIMEOUT, undefined, { cause, url: context.url });
  }
  if (NETWORK_PATTERNS.some((pattern) => pattern.test(message))) {
    return new NetworkError(ErrorCode.NETWORK_ERROR, undefined, { cause, url: context.url });
  }
  if (/not a git repository/i.test(message)) {
    return new SyncError(ErrorCode.GIT_NOT_A_REPOSITORY, undefined, { cause });
  }

  return new SyncError(
    ErrorCode.GIT_COMMAND_FAILED,
    error instanceof GitError ? message.trim() : undefined,
    { cause }
  );
}
