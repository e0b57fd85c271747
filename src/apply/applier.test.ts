import { describe, it, expect, beforeEach } from "vitest";
import { LifecycleApplier, type ApplyOptions } from "./applier.js";
import { diffRuleSet } from "../diff/engine.js";
import { snapshotState } from "../diff/snapshot.js";
import type { PreTransitionHook } from "../hook/types.js";
import type { DesiredConfiguration, ProviderCallOptions } from "../provider/types.js";
import { silentLogger } from "../logger.js";
import { InMemoryLifecycleProvider, type MemoryRuleMetadata } from "../provider/memory-provider.js";
import {
  createTarget,
  err,
  ok,
  type HookError,
  type LifecycleRule,
  type ProviderRule,
  type Result,
  type RuleSet,
  type Target,
  type ApplyError,
} from "../types.js";

const target = createTarget("archive-bucket");

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

function stored(declared: LifecycleRule, raw: MemoryRuleMetadata = {}): ProviderRule<MemoryRuleMetadata> {
  const { requiresHook: _local, ...shape } = declared;
  return { ...shape, raw };
}

class ScriptedHook implements PreTransitionHook {
  readonly name: string;
  readonly seen: Array<{ ruleId: string; keys: string[] }> = [];

  constructor(
    name: string,
    private readonly answer: (rule: LifecycleRule) => Promise<Result<void, HookError>>,
  ) {
    this.name = name;
  }

  async invoke(_target: typeof target, rule: LifecycleRule, candidates: AsyncIterable<string>) {
    const keys: string[] = [];
    for await (const key of candidates) keys.push(key);
    this.seen.push({ ruleId: rule.id, keys });
    return this.answer(rule);
  }
}

/** Stores the configuration, then answers late and fails if its signal fired meanwhile */
class SlowAbortableProvider extends InMemoryLifecycleProvider {
  async putConfiguration(
    target: Target,
    configuration: DesiredConfiguration<MemoryRuleMetadata>,
    options?: ProviderCallOptions,
  ): Promise<Result<void, ApplyError>> {
    const stored = await super.putConfiguration(target, configuration, options);
    await new Promise<void>((resolve) => setTimeout(resolve, 40));
    if (options?.signal?.aborted) {
      return err({ kind: "Transient", message: "The operation was aborted", code: "AbortError" });
    }
    return stored;
  }
}

const options: ApplyOptions = {
  pruneEnabled: false,
  maxAttempts: 3,
  retry: { minDelayMs: 0, maxDelayMs: 0, jitter: 0 },
  writeTimeoutMs: 1_000,
  hookTimeoutMs: 1_000,
};

describe("LifecycleApplier", () => {
  let provider: InMemoryLifecycleProvider;
  let applier: LifecycleApplier<MemoryRuleMetadata>;

  beforeEach(() => {
    provider = new InMemoryLifecycleProvider();
    applier = new LifecycleApplier(provider, silentLogger);
  });

  async function diffAgainstProvider(ruleSet: RuleSet) {
    const state = await provider.fetch(target);
    if (!state.ok) throw new Error(state.error.message);
    return diffRuleSet(ruleSet, state.value);
  }

  it("writes creates and updates together and skips unchanged rules", async () => {
    const keep = rule("keep");
    provider.createBucket(target, { rules: [stored(keep), stored(rule("old"), { owner: "ops" })] });
    const ruleSet = [keep, rule("old", { expiration: { afterDays: 400 } }), rule("new")];

    const report = await applier.apply(target, await diffAgainstProvider(ruleSet), options);

    expect(report.outcomes).toEqual([
      { ruleId: "keep", action: "Skipped", attempts: 0, detail: "unchanged" },
      { ruleId: "old", action: "Updated", attempts: 1 },
      { ruleId: "new", action: "Created", attempts: 1 },
    ]);
    expect(report.written).toBe(true);
    expect(report.cancelled).toBe(false);
    expect(report.finalState).toEqual(snapshotState(ruleSet));
    expect(provider.putCalls).toBe(1);

    const state = provider.getState(target);
    expect(state?.rules.map((r) => r.id)).toEqual(["keep", "old", "new"]);
    expect(state?.rules[1]?.raw).toEqual({ owner: "ops", revision: 1 });
  });

  it("never drops provider rules the diff did not delete", async () => {
    provider.createBucket(target, { rules: [stored(rule("A")), stored(rule("B"))] });
    const ruleSet = [rule("A", { status: "DISABLED" })];

    const report = await applier.apply(target, await diffAgainstProvider(ruleSet), options);

    expect(report.outcomes).toEqual([
      { ruleId: "A", action: "Updated", attempts: 1 },
      { ruleId: "B", action: "Skipped", attempts: 0, detail: "drift reported" },
    ]);
    expect(provider.getState(target)?.rules.map((r) => r.id)).toEqual(["A", "B"]);
  });

  it("deletes drift when pruning is enabled", async () => {
    provider.createBucket(target, { rules: [stored(rule("A")), stored(rule("B"))] });

    const report = await applier.apply(target, await diffAgainstProvider([rule("A")]), {
      ...options,
      pruneEnabled: true,
    });

    expect(report.outcomes).toEqual([
      { ruleId: "A", action: "Skipped", attempts: 0, detail: "unchanged" },
      { ruleId: "B", action: "Deleted", attempts: 1 },
    ]);
    expect(provider.getState(target)?.rules.map((r) => r.id)).toEqual(["A"]);
  });

  it("does not write when nothing changed", async () => {
    provider.createBucket(target, { rules: [stored(rule("A"))] });

    const report = await applier.apply(target, await diffAgainstProvider([rule("A")]), options);

    expect(report.written).toBe(false);
    expect(report.finalState).toEqual(snapshotState([rule("A")]));
    expect(provider.putCalls).toBe(0);
  });

  it("reports drift without writing when pruning is off", async () => {
    provider.createBucket(target, { rules: [stored(rule("A")), stored(rule("drift"))] });

    const report = await applier.apply(target, await diffAgainstProvider([rule("A")]), options);

    expect(report.written).toBe(false);
    expect(report.outcomes).toEqual([
      { ruleId: "A", action: "Skipped", attempts: 0, detail: "unchanged" },
      { ruleId: "drift", action: "Skipped", attempts: 0, detail: "drift reported" },
    ]);
    expect(provider.putCalls).toBe(0);
  });

  it("retries transient write failures with the attempt count on each outcome", async () => {
    provider.createBucket(target);
    const diff = await diffAgainstProvider([rule("r1")]);
    provider.failPut({ kind: "Transient", message: "SlowDown" }, 2);

    const report = await applier.apply(target, diff, options);

    expect(report.outcomes).toEqual([{ ruleId: "r1", action: "Created", attempts: 3 }]);
    expect(provider.putCalls).toBe(3);
  });

  it("fails every accepted rule together once attempts run out", async () => {
    provider.createBucket(target);
    const diff = await diffAgainstProvider([rule("a"), rule("b")]);
    provider.failPut({ kind: "Transient", message: "SlowDown" }, 5);

    const report = await applier.apply(target, diff, { ...options, maxAttempts: 2 });

    const error = { kind: "Transient", message: "SlowDown" };
    expect(report.outcomes).toEqual([
      { ruleId: "a", action: "Failed", attempts: 2, error },
      { ruleId: "b", action: "Failed", attempts: 2, error },
    ]);
    expect(report.written).toBe(false);
    expect(provider.putCalls).toBe(2);
  });

  it("does not retry terminal write failures", async () => {
    provider.createBucket(target, { rules: [stored(rule("keep"))] });
    const diff = await diffAgainstProvider([rule("keep"), rule("new")]);
    provider.failPut({ kind: "Terminal", message: "MalformedXML", code: "MalformedXML" });

    const report = await applier.apply(target, diff, options);

    expect(report.outcomes).toEqual([
      { ruleId: "keep", action: "Skipped", attempts: 0, detail: "unchanged" },
      {
        ruleId: "new",
        action: "Failed",
        attempts: 1,
        error: { kind: "Terminal", message: "MalformedXML", code: "MalformedXML" },
      },
    ]);
    expect(provider.putCalls).toBe(1);
    expect(provider.getState(target)?.rules.map((r) => r.id)).toEqual(["keep"]);
  });

  it("treats a write past its deadline as transient", async () => {
    provider.createBucket(target);
    const diff = await diffAgainstProvider([rule("slow")]);
    provider.setLatency(200);

    const report = await applier.apply(target, diff, { ...options, maxAttempts: 1, writeTimeoutMs: 10 });

    expect(report.outcomes).toEqual([
      {
        ruleId: "slow",
        action: "Failed",
        attempts: 1,
        error: { kind: "Transient", message: "Configuration write exceeded 10ms", code: "Timeout" },
      },
    ]);
  });

  describe("pre-transition hooks", () => {
    it("passes candidate objects and excludes rejected rules from the write", async () => {
      provider.createBucket(target, { objects: ["gated/1.log", "open/2.log", "gated/3.log"] });
      const hook = new ScriptedHook("review", async () => err({ kind: "Rejected", message: "legal hold" }));
      const ruleSet = [rule("gated", { requiresHook: true }), rule("open")];

      const report = await applier.apply(target, await diffAgainstProvider(ruleSet), { ...options, hook });

      expect(hook.seen).toEqual([{ ruleId: "gated", keys: ["gated/1.log", "gated/3.log"] }]);
      expect(report.outcomes).toEqual([
        { ruleId: "gated", action: "Failed", attempts: 0, error: { kind: "Rejected", message: "legal hold" } },
        { ruleId: "open", action: "Created", attempts: 1 },
      ]);
      expect(provider.getState(target)?.rules.map((r) => r.id)).toEqual(["open"]);
    });

    it("writes rules the hook approves", async () => {
      provider.createBucket(target);
      const hook = new ScriptedHook("review", async () => ok(undefined));

      const report = await applier.apply(
        target,
        await diffAgainstProvider([rule("gated", { requiresHook: true })]),
        { ...options, hook },
      );

      expect(report.outcomes).toEqual([{ ruleId: "gated", action: "Created", attempts: 1 }]);
    });

    it("fails a rule whose hook does not answer in time", async () => {
      provider.createBucket(target);
      const hook = new ScriptedHook("stuck", () => new Promise<Result<void, HookError>>(() => {}));

      const report = await applier.apply(
        target,
        await diffAgainstProvider([rule("gated", { requiresHook: true })]),
        { ...options, hook, hookTimeoutMs: 20 },
      );

      expect(report.outcomes).toEqual([
        {
          ruleId: "gated",
          action: "Failed",
          attempts: 0,
          error: { kind: "Timeout", message: "Hook 'stuck' did not answer within 20ms" },
        },
      ]);
      expect(provider.putCalls).toBe(0);
    });

    it("proceeds without a hook when none is configured", async () => {
      provider.createBucket(target);

      const report = await applier.apply(target, await diffAgainstProvider([rule("gated", { requiresHook: true })]), options);

      expect(report.outcomes).toEqual([{ ruleId: "gated", action: "Created", attempts: 1 }]);
    });
  });

  it("leaves the provider untouched when cancelled before the write", async () => {
    provider.createBucket(target, { rules: [stored(rule("keep")), stored(rule("drift"))] });
    const diff = await diffAgainstProvider([rule("keep"), rule("new")]);
    const controller = new AbortController();
    controller.abort();

    const report = await applier.apply(target, diff, { ...options, pruneEnabled: true, signal: controller.signal });

    expect(report.cancelled).toBe(true);
    expect(report.written).toBe(false);
    expect(report.outcomes).toEqual([
      { ruleId: "keep", action: "Skipped", attempts: 0, detail: "unchanged" },
      { ruleId: "new", action: "Skipped", attempts: 0, detail: "cancelled before write" },
      { ruleId: "drift", action: "Skipped", attempts: 0, detail: "cancelled before write" },
    ]);
    expect(provider.putCalls).toBe(0);
  });

  it("lets a write already in flight finish when cancelled", async () => {
    const slow = new SlowAbortableProvider();
    slow.createBucket(target);
    const state = await slow.fetch(target);
    if (!state.ok) throw new Error(state.error.message);
    const diff = diffRuleSet([rule("r1")], state.value);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const report = await new LifecycleApplier(slow, silentLogger).apply(target, diff, {
      ...options,
      signal: controller.signal,
    });

    expect(controller.signal.aborted).toBe(true);
    expect(report.cancelled).toBe(false);
    expect(report.written).toBe(true);
    expect(report.outcomes).toEqual([{ ruleId: "r1", action: "Created", attempts: 1 }]);
    expect(slow.getState(target)?.rules.map((r) => r.id)).toEqual(["r1"]);
  });
});
