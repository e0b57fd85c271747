/**
 * RuleSet validation
 *
 * Pure structural checks on a declared rule set. Errors reject the whole set
 * before any provider call; prefix conflicts between enabled rules are only
 * reported, since the store resolves overlapping prefixes on its own.
 */

import {
  STORAGE_CLASS_RANK,
  isStorageClass,
  err,
  ok,
  type ConflictWarning,
  type LifecycleRule,
  type Result,
  type RuleSet,
  type ValidationError,
} from "../types.js";

export const MAX_RULES = 1000;
export const MAX_RULE_ID_LENGTH = 255;
export const MAX_PREFIX_LENGTH = 1024;

export type ValidationWarnings = {
  warnings: ConflictWarning[];
};

export type ValidationFailure = {
  errors: ValidationError[];
  warnings: ConflictWarning[];
};

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function validateRule(rule: LifecycleRule, index: number): ValidationError[] {
  const errors: ValidationError[] = [];
  const base = `/rules/${index}`;
  const ruleId = rule.id;

  if (rule.id.trim().length === 0) {
    errors.push({ code: "INVALID_ID", path: `${base}/id`, message: "Rule id must not be empty" });
  } else if (rule.id.length > MAX_RULE_ID_LENGTH) {
    errors.push({
      code: "INVALID_ID",
      ruleId,
      path: `${base}/id`,
      message: `Rule id exceeds ${MAX_RULE_ID_LENGTH} characters`,
    });
  }

  if (rule.prefixFilter.length > MAX_PREFIX_LENGTH) {
    errors.push({
      code: "INVALID_PREFIX",
      ruleId,
      path: `${base}/prefixFilter`,
      message: `Prefix exceeds ${MAX_PREFIX_LENGTH} characters`,
    });
  }

  if (rule.transitions.length === 0 && !rule.expiration) {
    errors.push({
      code: "EMPTY_RULE",
      ruleId,
      path: base,
      message: `Rule '${ruleId}' has neither transitions nor an expiration`,
    });
  }

  let previousDays: number | undefined;
  let previousRank: number | undefined;
  let latestDays = 0;

  rule.transitions.forEach((transition, i) => {
    const path = `${base}/transitions/${i}`;

    if (!isPositiveInteger(transition.afterDays)) {
      errors.push({
        code: "INVALID_DAYS",
        ruleId,
        path: `${path}/afterDays`,
        message: `Transition afterDays must be a positive integer, got ${transition.afterDays}`,
      });
    } else {
      if (previousDays !== undefined && transition.afterDays <= previousDays) {
        errors.push({
          code: "TRANSITION_ORDER",
          ruleId,
          path: `${path}/afterDays`,
          message: `Transition at ${transition.afterDays} days must come after the previous one at ${previousDays} days`,
        });
      }
      previousDays = transition.afterDays;
      latestDays = Math.max(latestDays, transition.afterDays);
    }

    if (!isStorageClass(transition.storageClass)) {
      errors.push({
        code: "INVALID_STORAGE_CLASS",
        ruleId,
        path: `${path}/storageClass`,
        message: `Unknown storage class '${String(transition.storageClass)}'`,
      });
      return;
    }

    const rank = STORAGE_CLASS_RANK[transition.storageClass];
    if (previousRank !== undefined && rank < previousRank) {
      errors.push({
        code: "STORAGE_CLASS_ORDER",
        ruleId,
        path: `${path}/storageClass`,
        message: `Transition to ${transition.storageClass} moves data to a warmer class than an earlier transition`,
      });
    }
    previousRank = rank;
  });

  if (rule.expiration) {
    const path = `${base}/expiration/afterDays`;
    if (!isPositiveInteger(rule.expiration.afterDays)) {
      errors.push({
        code: "INVALID_DAYS",
        ruleId,
        path,
        message: `Expiration afterDays must be a positive integer, got ${rule.expiration.afterDays}`,
      });
    } else if (rule.expiration.afterDays <= latestDays) {
      errors.push({
        code: "EXPIRATION_ORDER",
        ruleId,
        path,
        message: `Expiration at ${rule.expiration.afterDays} days must come after the last transition at ${latestDays} days`,
      });
    }
  }

  return errors;
}

function prefixesOverlap(a: string, b: string): boolean {
  return a.startsWith(b) || b.startsWith(a);
}

function actionsDiffer(a: LifecycleRule, b: LifecycleRule): boolean {
  if (a.expiration?.afterDays !== b.expiration?.afterDays) return true;
  if (a.transitions.length !== b.transitions.length) return true;
  return a.transitions.some(
    (t, i) => t.afterDays !== b.transitions[i]?.afterDays || t.storageClass !== b.transitions[i]?.storageClass,
  );
}

/**
 * Enabled rules whose prefixes overlap and whose actions disagree. The most
 * specific prefix wins at the provider; we only point the overlap out.
 */
export function findPrefixConflicts(ruleSet: RuleSet): ConflictWarning[] {
  const enabled = ruleSet.filter((r) => r.status === "ENABLED");
  const warnings: ConflictWarning[] = [];

  for (let i = 0; i < enabled.length; i++) {
    for (let j = i + 1; j < enabled.length; j++) {
      const a = enabled[i];
      const b = enabled[j];
      if (!a || !b || a.id === b.id) continue;
      if (!prefixesOverlap(a.prefixFilter, b.prefixFilter) || !actionsDiffer(a, b)) continue;
      warnings.push({
        code: "PREFIX_CONFLICT",
        ruleIds: [a.id, b.id],
        message: `Rules '${a.id}' (prefix '${a.prefixFilter}') and '${b.id}' (prefix '${b.prefixFilter}') overlap with different actions`,
      });
    }
  }

  return warnings;
}

/**
 * Validate a declared rule set. Never mutates its input.
 */
export function validateRuleSet(ruleSet: RuleSet): Result<ValidationWarnings, ValidationFailure> {
  const errors: ValidationError[] = [];

  if (ruleSet.length > MAX_RULES) {
    errors.push({
      code: "TOO_MANY_RULES",
      path: "/rules",
      message: `A rule set may hold at most ${MAX_RULES} rules, got ${ruleSet.length}`,
    });
  }

  const seen = new Map<string, number>();
  ruleSet.forEach((rule, index) => {
    const first = seen.get(rule.id);
    if (first !== undefined) {
      errors.push({
        code: "DUPLICATE_ID",
        ruleId: rule.id,
        path: `/rules/${index}/id`,
        message: `Rule id '${rule.id}' is already used by rule ${first}`,
      });
    } else {
      seen.set(rule.id, index);
    }
    errors.push(...validateRule(rule, index));
  });

  const warnings = findPrefixConflicts(ruleSet);
  return errors.length > 0 ? err({ errors, warnings }) : ok({ warnings });
}
