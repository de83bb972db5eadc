import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/** Sink receiving each serialised line; defaults to `process.stderr`. */
export type LogSink = (line: string) => void;

export interface LoggerOptions {
  /** Entries below this level are dropped (default: `"warn"`). */
  readonly level?: LogLevel;
  /** Optional JSONL file receiving a copy of every emitted entry. */
  readonly logFile?: string | null;
  readonly sink?: LogSink;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger emitting one JSON object per line. Entries go to stderr
 * so that reports printed on stdout can be piped without log noise. File
 * writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly threshold: number;
  private readonly logFile: string | undefined;
  private readonly sink: LogSink;
  private readonly entryListener: ((entry: LogEntry) => void) | undefined;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.threshold = LEVEL_RANK[options.level ?? "warn"];
    this.logFile = options.logFile ?? undefined;
    this.sink = options.sink ?? ((line) => process.stderr.write(line));
    this.entryListener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.threshold;
  }

  /** Waits until every queued file write has settled. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.sink(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const target = this.logFile;
    if (!target) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDirectory(target);
        await appendFile(target, line, "utf8");
      } catch (err) {
        const failure: LogEntry = {
          timestamp: new Date().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: err instanceof Error ? { message: err.message } : { error: String(err) },
        };
        process.stderr.write(`${JSON.stringify(failure)}\n`);
        // Allow the next write to retry directory creation.
        this.logDirectoryReady = false;
      }
    });
  }

  private async ensureLogDirectory(target: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(target), { recursive: true });
    this.logDirectoryReady = true;
  }
}
