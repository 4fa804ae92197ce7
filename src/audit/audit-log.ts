import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { IssueEvent, ProcessEvent } from "../media/types.js";
import * as logger from "../logging/logger.js";
import { formatError, SetupError } from "../errors.js";

export const ErrorCodes = {
  UNPROCESSABLE_FILE: 100,
  MISSING_DATE: 200,
  MOVE_ERROR: 300,
  DATABASE_ERROR: 400,
} as const;

export const WarningCodes = {
  NO_DATE_METADATA: 10,
  UNSUPPORTED_FILE: 20,
  FILENAME_DATE_EXTRACTION: 30,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
export type WarningCode = (typeof WarningCodes)[keyof typeof WarningCodes];

/**
 * Append-only record of moves and anomalies. Writes never throw: a lost log entry
 * must not stop files from being processed.
 */
export interface AuditSink {
  recordProcess(filename: string, targetFolder: string): void;
  recordIssue(
    filename: string,
    warningCode: WarningCode | null,
    errorCode: ErrorCode | null,
    description: string,
  ): void;
  close(): void;
}

export type AuditLogOptions = {
  now?: () => Date;
};

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS process_log (
    filename TEXT,
    target_folder TEXT,
    processing_timestamp_utc TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS issues (
    filename TEXT,
    warning_code INTEGER,
    error_code INTEGER,
    issue_description TEXT,
    processing_timestamp_utc TEXT
  )`,
];

export class SqliteAuditLog implements AuditSink {
  private readonly db: Database.Database;
  private readonly now: () => Date;
  private closed = false;

  constructor(dbPath: string, options: AuditLogOptions = {}) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.now = options.now ?? (() => new Date());
    try {
      // Safe to run against an existing store
      for (const statement of SCHEMA) {
        this.db.prepare(statement).run();
      }
    } catch (err) {
      this.db.close();
      throw err;
    }
  }

  recordProcess(filename: string, targetFolder: string): void {
    try {
      this.db
        .prepare(
          "INSERT INTO process_log (filename, target_folder, processing_timestamp_utc) VALUES (?, ?, ?)",
        )
        .run(filename, targetFolder, this.now().toISOString());
    } catch (err) {
      logger.error(`Audit write failed for ${filename}: ${formatError(err)}`);
      this.recordIssue(
        filename,
        null,
        ErrorCodes.DATABASE_ERROR,
        `Failed to log process: ${formatError(err)}`,
      );
    }
  }

  recordIssue(
    filename: string,
    warningCode: WarningCode | null,
    errorCode: ErrorCode | null,
    description: string,
  ): void {
    if (warningCode !== null) {
      logger.warn(`Warning ${warningCode}: ${description} - File: ${filename}`);
    }
    if (errorCode !== null) {
      logger.error(`Error ${errorCode}: ${description} - File: ${filename}`);
    }
    try {
      this.db
        .prepare(
          "INSERT INTO issues (filename, warning_code, error_code, issue_description, processing_timestamp_utc) VALUES (?, ?, ?, ?, ?)",
        )
        .run(filename, warningCode, errorCode, description, this.now().toISOString());
    } catch (err) {
      logger.error(`Audit write failed while logging issue for ${filename}: ${formatError(err)}`);
    }
  }

  listProcessEvents(): ProcessEvent[] {
    return this.db
      .prepare<[], ProcessEvent>(
        `SELECT filename, target_folder, processing_timestamp_utc AS timestamp_utc
         FROM process_log ORDER BY rowid`,
      )
      .all();
  }

  listIssues(): IssueEvent[] {
    return this.db
      .prepare<[], IssueEvent>(
        `SELECT filename, warning_code, error_code, issue_description AS description,
                processing_timestamp_utc AS timestamp_utc
         FROM issues ORDER BY rowid`,
      )
      .all();
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.db.close();
  }
}

/**
 * Open the audit store, hand it to `fn`, and close it whether `fn` succeeds or not.
 * A store that cannot be opened is a SetupError.
 */
export async function withAuditLog<T>(
  dbPath: string,
  fn: (audit: SqliteAuditLog) => Promise<T>,
  options?: AuditLogOptions,
): Promise<T> {
  let audit: SqliteAuditLog;
  try {
    audit = new SqliteAuditLog(dbPath, options);
  } catch (err) {
    throw new SetupError("AUDIT_UNAVAILABLE", `Database error: ${formatError(err)}`, {
      cause: err,
    });
  }
  try {
    return await fn(audit);
  } finally {
    audit.close();
  }
}
