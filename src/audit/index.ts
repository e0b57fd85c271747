/**
 * Audit Log Module
 */

export {
  AuditRecordSchema,
  ReconcileStatusSchema,
  DEFAULT_QUERY_LIMIT,
  type AuditRecord,
  type AuditEntry,
  type AuditQuery,
  type AuditStore,
  type ReconcileStatus,
} from "./types.js";

export { AuditLog, type AuditLogOptions } from "./audit-log.js";
export { selectRecords } from "./query.js";
export { InMemoryAuditStore } from "./memory-store.js";
export { JsonlAuditStore, parseAuditLines } from "./jsonl-store.js";
export { SQLiteAuditStore } from "./sqlite-store.js";
