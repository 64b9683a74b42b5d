import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/** Minimal writable sink, satisfied by `process.stderr`. */
export interface LogStream {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /** File mirroring every emitted line. `null` disables mirroring. */
  readonly logFile?: string | null;
  /** Entries below this level are discarded. Defaults to `info`. */
  readonly level?: LogLevel;
  /**
   * Stream receiving the JSON lines. Defaults to stderr because stdout carries
   * the status line read by the bar; `null` silences console output.
   */
  readonly stream?: LogStream | null;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger emitting JSON lines and optionally mirroring them to a
 * file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly threshold: number;
  private readonly stream: LogStream | null;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Set once the directory of {@link logFile} exists. */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.threshold = LEVEL_RANK[options.level ?? "info"];
    this.stream = options.stream === undefined ? process.stderr : options.stream;
    this.entryListener = options.onEntry;
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

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_RANK[level] < this.threshold) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.stream?.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }

    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(logFile);
          await appendFile(logFile, line, "utf8");
        } catch (err) {
          const errorEntry: LogEntry = {
            timestamp: new Date().toISOString(),
            level: "error",
            message: "log_file_write_failed",
            payload: err instanceof Error ? { message: err.message } : { error: String(err) },
          };
          process.stderr.write(`${JSON.stringify(errorEntry)}\n`);
          // Allow future attempts to retry directory creation after a failure.
          this.logDirectoryReady = false;
        }
      })
      .catch((error: unknown) => {
        process.stderr.write(`log queue failure: ${String(error)}\n`);
        this.writeQueue = Promise.resolve();
      });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /** Waits for pending file writes. The CLI calls it before exiting. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }
}
