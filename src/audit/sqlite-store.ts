/**
 * Audit Log — SQLite Storage
 *
 * WAL-mode SQLite database with indexed columns for the query filters. The
 * full record is kept as JSON beside them. Rows are only ever inserted.
 */

import Database from "better-sqlite3";
import { Check } from "@sinclair/typebox/value";
import {
  AuditRecordSchema,
  DEFAULT_QUERY_LIMIT,
  type AuditQuery,
  type AuditRecord,
  type AuditStore,
} from "./types.js";

const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS audit_records (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  timestamp TEXT NOT NULL,
  target_key TEXT NOT NULL,
  status TEXT NOT NULL,
  record TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_audit_records_timestamp ON audit_records(timestamp);
CREATE INDEX IF NOT EXISTS idx_audit_records_target_key ON audit_records(target_key);
CREATE INDEX IF NOT EXISTS idx_audit_records_status ON audit_records(status);
`;

type RecordRow = { record: string };

type InsertRow = {
  id: string;
  timestamp: string;
  target_key: string;
  status: string;
  record: string;
};

export class SQLiteAuditStore implements AuditStore {
  private readonly db: Database.Database;
  private readonly insertStmt: Database.Statement<[InsertRow]>;

  constructor(readonly dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.db.exec(SCHEMA_DDL);

    this.insertStmt = this.db.prepare<InsertRow>(`
      INSERT INTO audit_records (id, timestamp, target_key, status, record)
      VALUES (@id, @timestamp, @target_key, @status, @record)
    `);
  }

  async append(record: AuditRecord): Promise<void> {
    this.insertStmt.run({
      id: record.id,
      timestamp: record.timestamp,
      target_key: record.targetKey,
      status: record.status,
      record: JSON.stringify(record),
    });
  }

  async query(filter: AuditQuery = {}): Promise<AuditRecord[]> {
    const conditions: string[] = [];
    const params: Record<string, string | number> = {};

    if (filter.targetKey) {
      conditions.push("target_key = @targetKey");
      params.targetKey = filter.targetKey;
    }
    if (filter.status) {
      conditions.push("status = @status");
      params.status = filter.status;
    }
    if (filter.since) {
      conditions.push("timestamp >= @since");
      params.since = filter.since;
    }
    params.limit = filter.limit ?? DEFAULT_QUERY_LIMIT;

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const rows = this.db
      .prepare<Record<string, string | number>, RecordRow>(
        `SELECT record FROM audit_records ${where} ORDER BY timestamp DESC, seq DESC LIMIT @limit`,
      )
      .all(params);

    return rows.map((row) => {
      const value: unknown = JSON.parse(row.record);
      if (!Check(AuditRecordSchema, value)) {
        throw new Error(`${this.dbPath}: stored audit record is malformed`);
      }
      return value;
    });
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
