/**
 * Configuration Merge
 *
 * Read the full provider state, change only the targeted ids, write the full
 * state back. Everything the change set does not name is carried over as the
 * provider reported it.
 */

import type { LifecycleRule, ProviderState } from "../types.js";
import type { ConfigurationEntry, DesiredConfiguration } from "../provider/types.js";

export type MergePlan = {
  /** Declared rules to create or update, in RuleSet order */
  upsert: ReadonlyMap<string, LifecycleRule>;
  /** Provider rule ids to drop */
  remove: ReadonlySet<string>;
};

export function mergeConfiguration<TRaw>(current: ProviderState<TRaw>, plan: MergePlan): DesiredConfiguration<TRaw> {
  const entries: ConfigurationEntry<TRaw>[] = [];
  const present = new Set<string>();

  for (const existing of current.rules) {
    present.add(existing.id);
    if (plan.remove.has(existing.id)) continue;
    const declared = plan.upsert.get(existing.id);
    entries.push(declared ? { source: "declared", rule: declared, base: existing } : { source: "provider", rule: existing });
  }

  for (const [id, rule] of plan.upsert) {
    if (!present.has(id)) entries.push({ source: "declared", rule });
  }

  return {
    entries,
    anonymous: [...current.anonymous],
    attributes: { ...current.attributes },
  };
}

/**
 * Fetched rule ids that a configuration would lose without having been
 * scheduled for deletion.
 */
export function findDroppedRules<TRaw>(
  current: ProviderState<TRaw>,
  configuration: DesiredConfiguration<TRaw>,
  removed: ReadonlySet<string>,
): string[] {
  const kept = new Set(configuration.entries.map((entry) => entry.rule.id));
  return current.rules.map((r) => r.id).filter((id) => !kept.has(id) && !removed.has(id));
}
