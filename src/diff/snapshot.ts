import { createHash } from "node:crypto";
import type { FinalState, RuleShape } from "../types.js";

function canonical(rule: RuleShape): Record<string, unknown> {
  return {
    id: rule.id,
    prefixFilter: rule.prefixFilter,
    status: rule.status,
    transitions: rule.transitions.map((t) => ({ afterDays: t.afterDays, storageClass: t.storageClass })),
    expiration: rule.expiration ? { afterDays: rule.expiration.afterDays } : null,
  };
}

/**
 * Hash of the declared fields of a configuration, independent of rule order,
 * so two audit records can be compared for "same policy in force".
 */
export function snapshotState(rules: readonly RuleShape[]): FinalState {
  const sorted = [...rules].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  const hash = createHash("sha256")
    .update(JSON.stringify(sorted.map(canonical)))
    .digest("hex");
  return { hash, ruleIds: sorted.map((r) => r.id) };
}
