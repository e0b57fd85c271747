/**
 * Audit Log — In-Memory Storage
 *
 * Lightweight in-memory implementation for testing and dry runs.
 */

import { selectRecords } from "./query.js";
import type { AuditQuery, AuditRecord, AuditStore } from "./types.js";

export class InMemoryAuditStore implements AuditStore {
  private records: AuditRecord[] = [];

  async append(record: AuditRecord): Promise<void> {
    this.records.push(structuredClone(record));
  }

  async query(filter?: AuditQuery): Promise<AuditRecord[]> {
    return selectRecords(this.records, filter).map((r) => structuredClone(r));
  }

  get size(): number {
    return this.records.length;
  }

  async close(): Promise<void> {
    this.records = [];
  }
}
