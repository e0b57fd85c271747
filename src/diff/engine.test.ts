import { describe, it, expect } from "vitest";
import { compareRule, diffRuleSet, formatDiffSummary, hasActionableChanges } from "./engine.js";
import { snapshotState } from "./snapshot.js";
import { emptyProviderState, type LifecycleRule, type ProviderRule, type ProviderState } from "../types.js";

type Raw = { etag: string };

function rule(id: string, overrides: Partial<LifecycleRule> = {}): LifecycleRule {
  return {
    id,
    prefixFilter: `${id}/`,
    status: "ENABLED",
    transitions: [{ afterDays: 30, storageClass: "ARCHIVE" }],
    requiresHook: false,
    ...overrides,
  };
}

function live(declared: LifecycleRule, extra: Partial<ProviderRule<Raw>> = {}): ProviderRule<Raw> {
  const { requiresHook: _local, ...shape } = declared;
  return { ...shape, raw: { etag: `etag-${declared.id}` }, ...extra };
}

function state(rules: ProviderRule<Raw>[]): ProviderState<Raw> {
  return { rules, anonymous: [], attributes: {} };
}

describe("compareRule", () => {
  it("ignores provider metadata and the hook flag", () => {
    const declared = rule("r1", { requiresHook: true });

    expect(compareRule(declared, live(rule("r1"), { raw: { etag: "other" } }))).toEqual([]);
  });

  it("lists every differing field", () => {
    const declared = rule("r1", { expiration: { afterDays: 365 } });
    const actual = live(rule("r1", { prefixFilter: "old/", status: "DISABLED" }));

    expect(compareRule(declared, actual)).toEqual([
      { field: "prefixFilter", expected: "r1/", actual: "old/" },
      { field: "status", expected: "ENABLED", actual: "DISABLED" },
      { field: "expiration", expected: { afterDays: 365 }, actual: null },
    ]);
  });

  it("treats transition order as significant", () => {
    const two = [
      { afterDays: 30, storageClass: "INFREQUENT_ACCESS" as const },
      { afterDays: 90, storageClass: "ARCHIVE" as const },
    ];
    const declared = rule("r1", { transitions: two });
    const actual = live(rule("r1", { transitions: [...two].reverse() }));

    expect(compareRule(declared, actual).map((c) => c.field)).toEqual(["transitions"]);
  });

  it("always updates a rule carrying provider-only clauses", () => {
    expect(compareRule(rule("r1"), live(rule("r1"), { opaque: true })).map((c) => c.field)).toEqual(["representation"]);
  });
});

describe("diffRuleSet", () => {
  it("creates everything against an empty configuration", () => {
    const diff = diffRuleSet([rule("a"), rule("b")], emptyProviderState<Raw>());

    expect(diff.toCreate).toEqual(["a", "b"]);
    expect(diff.toUpdate).toEqual([]);
    expect(diff.toDelete).toEqual([]);
    expect(diff.unchanged).toEqual([]);
  });

  it("splits rules into create, update, delete and unchanged", () => {
    const current = state([live(rule("keep")), live(rule("change", { status: "DISABLED" })), live(rule("extra"))]);

    const diff = diffRuleSet([rule("new"), rule("change"), rule("keep")], current);

    expect(diff.toCreate).toEqual(["new"]);
    expect(diff.toUpdate).toEqual(["change"]);
    expect(diff.toDelete).toEqual(["extra"]);
    expect(diff.unchanged).toEqual(["keep"]);
    expect(diff.changes).toEqual({ change: [{ field: "status", expected: "ENABLED", actual: "DISABLED" }] });
    expect([...diff.desired.keys()]).toEqual(["new", "change", "keep"]);
    expect(diff.current).toBe(current);
  });

  it("is deterministic", () => {
    const current = state([live(rule("x")), live(rule("y"))]);
    const ruleSet = [rule("y", { expiration: { afterDays: 99 } }), rule("z")];

    const first = diffRuleSet(ruleSet, current);
    const second = diffRuleSet(ruleSet, current);

    expect(second.toCreate).toEqual(first.toCreate);
    expect(second.toUpdate).toEqual(first.toUpdate);
    expect(second.toDelete).toEqual(first.toDelete);
    expect(second.changes).toEqual(first.changes);
  });

  it("leaves both inputs untouched", () => {
    const ruleSet = [rule("a")];
    const current = state([live(rule("a", { prefixFilter: "" }))]);
    const before = structuredClone({ ruleSet, current });

    diffRuleSet(ruleSet, current);

    expect({ ruleSet, current }).toEqual(before);
  });
});

describe("hasActionableChanges", () => {
  it("counts deletions only when pruning", () => {
    const diff = diffRuleSet([], state([live(rule("old"))]));

    expect(hasActionableChanges(diff, false)).toBe(false);
    expect(hasActionableChanges(diff, true)).toBe(true);
  });
});

describe("formatDiffSummary", () => {
  it("counts each list", () => {
    const diff = diffRuleSet([rule("a"), rule("b")], state([live(rule("b")), live(rule("c"))]));

    expect(formatDiffSummary(diff)).toBe("create 1, update 0, delete 1, unchanged 1");
  });
});

describe("snapshotState", () => {
  it("does not depend on rule order or metadata", () => {
    const a = live(rule("a"));
    const b = live(rule("b", { expiration: { afterDays: 400 } }));

    const forward = snapshotState([a, b]);
    const backward = snapshotState([{ ...b, raw: { etag: "changed" } }, a]);

    expect(backward).toEqual(forward);
    expect(forward.ruleIds).toEqual(["a", "b"]);
    expect(forward.hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("changes when a declared field changes", () => {
    const before = snapshotState([rule("a")]);
    const after = snapshotState([rule("a", { status: "DISABLED" })]);

    expect(after.hash).not.toBe(before.hash);
  });
});
