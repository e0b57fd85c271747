/**
 * Text and JSON rendering of command results.
 */

import type { AuditRecord } from "../audit/types.js";
import { formatDiffSummary } from "../diff/engine.js";
import type { ReconcileResult } from "../reconciliation/engine.js";
import { targetKey, type ApplyOutcome, type ConflictWarning, type DiffResult, type ValidationError } from "../types.js";

function diffJson(diff: DiffResult<unknown>) {
  return {
    toCreate: diff.toCreate,
    toUpdate: diff.toUpdate,
    toDelete: diff.toDelete,
    unchanged: diff.unchanged,
    changes: diff.changes,
  };
}

/** Plain-object view of a result; drops the fetched state and rule map */
export function resultToJson(result: ReconcileResult<unknown>): Record<string, unknown> {
  const base = {
    target: targetKey(result.target),
    status: result.status,
    durationMs: result.durationMs,
    warnings: result.warnings,
    ...(result.auditWarning ? { auditWarning: result.auditWarning } : {}),
  };
  switch (result.status) {
    case "invalid":
      return { ...base, errors: result.errors };
    case "busy":
      return base;
    case "fetch-failed":
      return { ...base, error: result.error, attempts: result.attempts };
    case "cancelled":
      return { ...base, stage: result.stage, outcomes: result.outcomes };
    case "planned":
      return { ...base, diff: diffJson(result.diff) };
    case "completed":
      return { ...base, diff: diffJson(result.diff), outcomes: result.outcomes, finalState: result.finalState };
  }
}

export function formatValidationErrors(errors: readonly ValidationError[]): string[] {
  return errors.map((e) => `error: ${e.path}: ${e.message} [${e.code}]`);
}

export function formatWarnings(warnings: readonly ConflictWarning[]): string[] {
  return warnings.map((w) => `warning: ${w.message}`);
}

function outcomeDetail(outcome: ApplyOutcome): string {
  if (outcome.error) return ` (attempts ${outcome.attempts}): ${outcome.error.kind}: ${outcome.error.message}`;
  if (outcome.action === "Skipped") return outcome.detail ? ` (${outcome.detail})` : "";
  return ` (attempts ${outcome.attempts})`;
}

export function formatResult(result: ReconcileResult<unknown>): string[] {
  const lines = [`Target: ${targetKey(result.target)}`, `Status: ${result.status}`];

  switch (result.status) {
    case "invalid":
      lines.push(...formatValidationErrors(result.errors));
      break;
    case "busy":
      lines.push("Another reconciliation of this target is in progress");
      break;
    case "fetch-failed":
      lines.push(`error: ${result.error.kind}: ${result.error.message} (attempts ${result.attempts})`);
      break;
    case "cancelled":
      lines.push(`Cancelled before ${result.stage}`);
      break;
    case "planned": {
      lines.push(`Changes: ${formatDiffSummary(result.diff)}`);
      const planned: Array<[string, readonly string[]]> = [
        ["create", result.diff.toCreate],
        ["update", result.diff.toUpdate],
        ["delete", result.diff.toDelete],
      ];
      for (const [verb, ids] of planned) {
        for (const id of ids) lines.push(`  ${verb.padEnd(8)} ${id}`);
      }
      break;
    }
    case "completed":
      lines.push(`Changes: ${formatDiffSummary(result.diff)}`);
      break;
  }

  if (result.status === "completed" || result.status === "cancelled") {
    for (const o of result.outcomes) lines.push(`  ${o.action.padEnd(8)} ${o.ruleId}${outcomeDetail(o)}`);
  }
  if (result.status === "completed") lines.push(`Final state: ${result.finalState.hash}`);

  lines.push(...formatWarnings(result.warnings));
  if (result.auditWarning) lines.push(`warning: audit record not written: ${result.auditWarning.message}`);
  return lines;
}

export function formatAuditRecord(record: AuditRecord): string {
  const counts = record.diff
    ? ` | +${record.diff.toCreate.length} ~${record.diff.toUpdate.length} -${record.diff.toDelete.length}`
    : "";
  const failed = record.outcomes.filter((o) => o.action === "Failed").length;
  const failures = failed > 0 ? ` | ${failed} failed` : "";
  const mode = record.dryRun ? " (dry run)" : "";
  return `${record.timestamp} | ${record.targetKey} | ${record.status}${mode}${counts}${failures}`;
}
