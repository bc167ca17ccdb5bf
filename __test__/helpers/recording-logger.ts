import type { LogLevel, LogMeta, Logger } from "../../runtime/src/logger.js";

export interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  meta?: LogMeta;
}

export class RecordingLogger implements Logger {
  constructor(
    readonly scope = "",
    readonly entries: LogEntry[] = [],
  ) {}

  debug(message: string, meta?: LogMeta): void {
    this.entries.push({ level: "debug", scope: this.scope, message, meta });
  }

  info(message: string, meta?: LogMeta): void {
    this.entries.push({ level: "info", scope: this.scope, message, meta });
  }

  warn(message: string, meta?: LogMeta): void {
    this.entries.push({ level: "warn", scope: this.scope, message, meta });
  }

  error(message: string, meta?: LogMeta): void {
    this.entries.push({ level: "error", scope: this.scope, message, meta });
  }

  child(scope: string): Logger {
    return new RecordingLogger(this.scope ? `${this.scope}:${scope}` : scope, this.entries);
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}
