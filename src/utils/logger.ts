import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
  stack?: string;
}

export interface LoggerOptions {
  debug?: boolean;
  /** Queue entries for a daily JSON-lines file, written on flush() */
  logToFile?: boolean;
  logDir?: string;
}

/**
 * Minimal logging surface threaded through the sync pipeline.
 */
export interface LogSink {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
  flush(): Promise<void>;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[36m", // cyan
  info: "\x1b[32m", // green
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};
const RESET = "\x1b[0m";

const CONSOLE: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function toEntry(level: LogLevel, message: string, data?: unknown): LogEntry {
  const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
  if (data instanceof Error) {
    entry.data = { name: data.name, message: data.message };
    entry.stack = data.stack;
  } else if (data !== undefined) {
    entry.data = data;
  }
  return entry;
}

function formatForConsole(entry: LogEntry): string {
  const label = `[${entry.level.toUpperCase()}]`.padEnd(7);
  const head = `${LEVEL_COLORS[entry.level]}${label}${RESET} ${entry.message}`;
  if (entry.stack) {
    return `${head}\n${entry.stack}`;
  }
  return entry.data !== undefined ? `${head} ${JSON.stringify(entry.data)}` : head;
}

class Logger implements LogSink {
  private readonly debugMode: boolean;
  private readonly logToFile: boolean;
  private readonly logDir: string;
  private pending: LogEntry[] = [];

  constructor(options: LoggerOptions = {}) {
    this.debugMode = options.debug ?? process.env.REPOSYNC_DEBUG === "true";
    this.logToFile = options.logToFile ?? false;
    this.logDir = options.logDir ?? path.join(os.homedir(), ".reposync", "logs");
  }

  async init(): Promise<void> {
    if (this.logToFile) {
      await fs.mkdir(this.logDir, { recursive: true });
    }
  }

  debug(message: string, data?: unknown): void {
    if (this.debugMode) this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown): void {
    this.log("error", message, error);
  }

  async flush(): Promise<void> {
    if (this.pending.length === 0) {
      return;
    }
    const entries = this.pending;
    this.pending = [];

    const date = new Date().toISOString().split("T")[0];
    const file = path.join(this.logDir, `reposync-${date}.log`);
    try {
      await fs.appendFile(file, entries.map((entry) => JSON.stringify(entry)).join("\n") + "\n", "utf-8");
    } catch (err) {
      console.error("Failed to write to log file:", err);
    }
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const entry = toEntry(level, message, data);
    CONSOLE[level](formatForConsole(entry));
    if (this.logToFile) {
      this.pending.push(entry);
    }
  }
}

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * A sink that drops everything. Used where a caller passes no logger.
 */
export const silentLogger: LogSink = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  flush: async () => {},
};

export { Logger };
