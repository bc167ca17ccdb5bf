import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { silentLogger, type Logger } from "../../../runtime/src/logger.js";

export interface AuditRecord {
  timestamp: string;
  kind: string;
  description: string;
  approved: boolean;
  severity?: string;
  target?: string;
}

/**
 * Append-only record of confirmation outcomes: one console line per action
 * and one JSONL record when a file path is configured. Never throws.
 */
export class AuditLog {
  private readonly logger: Logger;

  constructor(
    private readonly filePath?: string,
    logger: Logger = silentLogger,
  ) {
    this.logger = logger.child("security");
  }

  record(entry: Omit<AuditRecord, "timestamp">): AuditRecord {
    const record: AuditRecord = { timestamp: new Date().toISOString(), ...entry };
    const status = record.approved ? "APPROVED" : "DENIED";
    this.logger.info(
      `[SECURITY LOG] ${status} - Type: ${record.kind}, Description: ${record.description}`,
    );

    if (!this.filePath) return record;
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf-8");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`security audit write skipped: ${reason}`);
    }
    return record;
  }
}
