import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogMeta = Record<string, unknown>;

export interface Logger {
  readonly scope: string;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  scope?: string;
  level?: LogLevel;
  /** JSONL sink, one record per line. */
  filePath?: string;
  console?: boolean;
}

interface LogSink {
  level: LogLevel;
  filePath?: string;
  console: boolean;
  fileFailed: boolean;
}

const COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

class ScopedLogger implements Logger {
  constructor(
    readonly scope: string,
    private readonly sink: LogSink,
  ) {}

  debug(message: string, meta?: LogMeta): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write("error", message, meta);
  }

  child(scope: string): Logger {
    return new ScopedLogger(this.scope ? `${this.scope}:${scope}` : scope, this.sink);
  }

  private write(level: LogLevel, message: string, meta?: LogMeta): void {
    if (rank(level) < rank(this.sink.level)) return;

    if (this.sink.console) {
      const prefix = COLORS[level](`[${level.toUpperCase()}]`);
      const scope = this.scope ? chalk.gray(` ${this.scope}`) : "";
      const details = meta && Object.keys(meta).length > 0 ? chalk.gray(` ${formatMeta(meta)}`) : "";
      const line = `${prefix}${scope} ${message}${details}`;
      if (level === "error") {
        console.error(line);
      } else if (level === "warn") {
        console.warn(line);
      } else {
        console.log(line);
      }
    }

    if (this.sink.filePath && !this.sink.fileFailed) {
      const record = {
        timestamp: new Date().toISOString(),
        level,
        scope: this.scope,
        message,
        ...(meta ? { meta } : {}),
      };
      try {
        appendFileSync(this.sink.filePath, `${JSON.stringify(record)}\n`, "utf-8");
      } catch (error) {
        this.sink.fileFailed = true;
        const reason = error instanceof Error ? error.message : String(error);
        console.warn(`log file write disabled: ${reason}`);
      }
    }
  }
}

function formatMeta(meta: LogMeta): string {
  return Object.entries(meta)
    .map(([key, value]) => {
      if (value instanceof Error) return `${key}=${value.message}`;
      if (typeof value === "string") return `${key}=${value}`;
      return `${key}=${JSON.stringify(value)}`;
    })
    .join(" ");
}

export function createLogger(options: LoggerOptions = {}): Logger {
  if (options.filePath) {
    mkdirSync(dirname(options.filePath), { recursive: true });
  }
  return new ScopedLogger(options.scope ?? "", {
    level: options.level ?? "info",
    filePath: options.filePath,
    console: options.console ?? true,
    fileFailed: false,
  });
}

export const silentLogger: Logger = createLogger({ level: "error", console: false });
