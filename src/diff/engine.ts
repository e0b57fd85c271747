/**
 * Diff Engine
 *
 * Computes the change set between a declared rule set and the provider's
 * current configuration. Pure and deterministic: the same inputs always give
 * the same lists in the same order, which is what makes a second
 * reconciliation a no-op.
 */

import type {
  DiffResult,
  Expiration,
  LifecycleRule,
  ProviderRule,
  ProviderState,
  RuleFieldChange,
  RuleSet,
  Transition,
} from "../types.js";

function sameTransitions(a: readonly Transition[], b: readonly Transition[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((t, i) => t.afterDays === b[i]?.afterDays && t.storageClass === b[i]?.storageClass);
}

function sameExpiration(a: Expiration | undefined, b: Expiration | undefined): boolean {
  return a?.afterDays === b?.afterDays;
}

/**
 * Field-by-field comparison of the declared fields. Provider metadata kept in
 * `raw` and the local-only `requiresHook` flag never take part.
 */
export function compareRule<TRaw>(expected: LifecycleRule, actual: ProviderRule<TRaw>): RuleFieldChange[] {
  const changes: RuleFieldChange[] = [];

  if (expected.prefixFilter !== actual.prefixFilter) {
    changes.push({ field: "prefixFilter", expected: expected.prefixFilter, actual: actual.prefixFilter });
  }
  if (expected.status !== actual.status) {
    changes.push({ field: "status", expected: expected.status, actual: actual.status });
  }
  if (!sameTransitions(expected.transitions, actual.transitions)) {
    changes.push({ field: "transitions", expected: expected.transitions, actual: actual.transitions });
  }
  if (!sameExpiration(expected.expiration, actual.expiration)) {
    changes.push({ field: "expiration", expected: expected.expiration ?? null, actual: actual.expiration ?? null });
  }
  if (actual.opaque) {
    changes.push({ field: "representation", expected: "declared clauses only", actual: "provider-only clauses" });
  }

  return changes;
}

export function diffRuleSet<TRaw>(ruleSet: RuleSet, current: ProviderState<TRaw>): DiffResult<TRaw> {
  const desired = new Map<string, LifecycleRule>();
  for (const rule of ruleSet) desired.set(rule.id, rule);

  const actual = new Map<string, ProviderRule<TRaw>>();
  for (const rule of current.rules) actual.set(rule.id, rule);

  const result: DiffResult<TRaw> = {
    toCreate: [],
    toUpdate: [],
    toDelete: [],
    unchanged: [],
    changes: {},
    desired,
    current,
  };

  for (const [id, rule] of desired) {
    const existing = actual.get(id);
    if (!existing) {
      result.toCreate.push(id);
      continue;
    }
    const changes = compareRule(rule, existing);
    if (changes.length > 0) {
      result.toUpdate.push(id);
      result.changes[id] = changes;
    } else {
      result.unchanged.push(id);
    }
  }

  for (const id of actual.keys()) {
    if (!desired.has(id)) result.toDelete.push(id);
  }

  return result;
}

export function hasActionableChanges(diff: DiffResult<unknown>, prune: boolean): boolean {
  return diff.toCreate.length > 0 || diff.toUpdate.length > 0 || (prune && diff.toDelete.length > 0);
}

/**
 * One-line summary for logs and CLI output
 */
export function formatDiffSummary(diff: DiffResult<unknown>): string {
  return `create ${diff.toCreate.length}, update ${diff.toUpdate.length}, delete ${diff.toDelete.length}, unchanged ${diff.unchanged.length}`;
}
