import type { LogSink } from "../utils/logger.js";
import { CredentialCache } from "./credentials/cache.js";
import type { CredentialProvider } from "./credentials/provider.js";

/**
 * Per-sync collaborators passed explicitly through the pipeline.
 */
export interface SyncContext {
  readonly logger: LogSink;
  readonly credentials: CredentialCache;
  readonly signal?: AbortSignal;
}

export interface SyncContextOptions {
  logger: LogSink;
  provider: CredentialProvider;
  signal?: AbortSignal;
}

/**
 * Run `fn` with a fresh context; the credential cache is cleared and the
 * log sink flushed when it settles.
 */
export async function withSyncContext<T>(
  options: SyncContextOptions,
  fn: (ctx: SyncContext) => Promise<T>
): Promise<T> {
  const ctx: SyncContext = {
    logger: options.logger,
    credentials: new CredentialCache(options.provider),
    signal: options.signal,
  };
  try {
    return await fn(ctx);
  } finally {
    ctx.credentials.clear();
    await ctx.logger.flush();
  }
}
