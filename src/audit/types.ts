/**
 * Audit Log — Core Types
 *
 * One record per reconcile call. Records are append-only: stores insert and
 * read, never update or delete.
 */

import { Type, type Static } from "@sinclair/typebox";

// ─── Record Schema ─────────────────────────────────────────────────────────────

export const ReconcileStatusSchema = Type.Union([
  Type.Literal("completed"),
  Type.Literal("planned"),
  Type.Literal("invalid"),
  Type.Literal("busy"),
  Type.Literal("fetch-failed"),
  Type.Literal("cancelled"),
]);

export type ReconcileStatus = Static<typeof ReconcileStatusSchema>;

const OutcomeErrorSchema = Type.Object({
  kind: Type.Union([
    Type.Literal("NotFound"),
    Type.Literal("Transient"),
    Type.Literal("PermissionDenied"),
    Type.Literal("Terminal"),
    Type.Literal("Rejected"),
    Type.Literal("Timeout"),
  ]),
  message: Type.String(),
  code: Type.Optional(Type.String()),
});

const OutcomeSchema = Type.Object({
  ruleId: Type.String(),
  action: Type.Union([
    Type.Literal("Created"),
    Type.Literal("Updated"),
    Type.Literal("Deleted"),
    Type.Literal("Skipped"),
    Type.Literal("Failed"),
  ]),
  attempts: Type.Integer({ minimum: 0 }),
  error: Type.Optional(OutcomeErrorSchema),
  detail: Type.Optional(Type.String()),
});

const IdList = Type.Array(Type.String());

export const AuditRecordSchema = Type.Object({
  id: Type.String(),
  timestamp: Type.String({ description: "ISO-8601" }),
  targetKey: Type.String(),
  target: Type.Object({ bucket: Type.String(), region: Type.Optional(Type.String()) }),
  status: ReconcileStatusSchema,
  dryRun: Type.Boolean(),
  prune: Type.Boolean(),
  diff: Type.Optional(
    Type.Object({ toCreate: IdList, toUpdate: IdList, toDelete: IdList, unchanged: IdList }),
  ),
  outcomes: Type.Array(OutcomeSchema),
  finalStateHash: Type.Optional(Type.String()),
  durationMs: Type.Number({ minimum: 0 }),
  error: Type.Optional(Type.String()),
});

export type AuditRecord = Static<typeof AuditRecordSchema>;

/** What callers hand to the log; the id is assigned on record */
export type AuditEntry = Omit<AuditRecord, "id">;

// ─── Query / Storage ───────────────────────────────────────────────────────────

export type AuditQuery = {
  targetKey?: string;
  status?: ReconcileStatus;
  /** ISO-8601 lower bound, inclusive */
  since?: string;
  limit?: number;
};

export const DEFAULT_QUERY_LIMIT = 50;

export interface AuditStore {
  append(record: AuditRecord): Promise<void>;
  /** Matching records, newest first */
  query(filter?: AuditQuery): Promise<AuditRecord[]>;
  close(): Promise<void>;
}
