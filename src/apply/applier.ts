/**
 * Lifecycle Applier
 *
 * Executes a DiffResult against a provider. Because the provider replaces the
 * whole configuration on every write, all accepted changes go out in a single
 * write: they succeed or fail together, and rules the diff left alone are
 * written back exactly as they were read.
 */

import { hasActionableChanges } from "../diff/engine.js";
import { snapshotState } from "../diff/snapshot.js";
import { withDeadline } from "../deadline.js";
import type { PreTransitionHook } from "../hook/types.js";
import type { Logger } from "../logger.js";
import type { LifecycleProvider } from "../provider/types.js";
import { retryResult, type RetryConfig } from "../retry.js";
import type {
  ApplyAction,
  ApplyError,
  ApplyOutcome,
  DiffResult,
  FinalState,
  LifecycleRule,
  OutcomeError,
  Target,
} from "../types.js";
import { findDroppedRules, mergeConfiguration } from "./merge.js";

export type ApplyOptions = {
  pruneEnabled: boolean;
  /** Write attempts, including the first */
  maxAttempts: number;
  hook?: PreTransitionHook;
  retry?: Omit<RetryConfig, "attempts">;
  writeTimeoutMs: number;
  hookTimeoutMs: number;
  signal?: AbortSignal;
};

export type ApplyReport = {
  /** Desired rules in RuleSet order, then provider-only rules in provider order */
  outcomes: ApplyOutcome[];
  finalState: FinalState;
  written: boolean;
  cancelled: boolean;
};

async function* noObjects(): AsyncIterable<string> {}

export class LifecycleApplier<TRaw> {
  constructor(
    private readonly provider: LifecycleProvider<TRaw>,
    private readonly logger: Logger,
  ) {}

  async apply(target: Target, diff: DiffResult<TRaw>, options: ApplyOptions): Promise<ApplyReport> {
    const outcomes = new Map<string, ApplyOutcome>();
    const set = (ruleId: string, action: ApplyAction, attempts: number, extra: Partial<ApplyOutcome> = {}) =>
      outcomes.set(ruleId, { ruleId, action, attempts, ...extra });

    for (const id of diff.unchanged) set(id, "Skipped", 0, { detail: "unchanged" });
    if (!options.pruneEnabled) {
      for (const id of diff.toDelete) set(id, "Skipped", 0, { detail: "drift reported" });
    }

    const unchangedState = snapshotState(diff.current.rules);
    const report = (written: boolean, cancelled: boolean, finalState: FinalState): ApplyReport => ({
      outcomes: this.ordered(diff, outcomes),
      finalState,
      written,
      cancelled,
    });

    if (!hasActionableChanges(diff, options.pruneEnabled)) {
      return report(false, false, unchangedState);
    }

    // Pre-transition hooks gate creates and updates before anything is written
    const pending = new Set([...diff.toCreate, ...diff.toUpdate]);
    const upsert = new Map<string, LifecycleRule>();
    for (const [id, rule] of diff.desired) {
      if (!pending.has(id)) continue;
      if (options.signal?.aborted) break;
      const hookError = await this.runHook(target, rule, options);
      if (hookError) {
        set(id, "Failed", 0, { error: hookError });
        continue;
      }
      upsert.set(id, rule);
    }

    const remove = new Set(options.pruneEnabled ? diff.toDelete : []);
    const accepted: Array<[string, ApplyAction]> = [
      ...diff.toCreate.filter((id) => upsert.has(id)).map((id): [string, ApplyAction] => [id, "Created"]),
      ...diff.toUpdate.filter((id) => upsert.has(id)).map((id): [string, ApplyAction] => [id, "Updated"]),
      ...[...remove].map((id): [string, ApplyAction] => [id, "Deleted"]),
    ];

    if (options.signal?.aborted) {
      for (const id of pending) {
        if (!outcomes.has(id)) set(id, "Skipped", 0, { detail: "cancelled before write" });
      }
      for (const id of remove) set(id, "Skipped", 0, { detail: "cancelled before write" });
      this.logger.warn("Apply cancelled before write", { target: target.bucket });
      return report(false, true, unchangedState);
    }

    // Every change was refused by its hook
    if (accepted.length === 0) {
      return report(false, false, unchangedState);
    }

    const configuration = mergeConfiguration(diff.current, { upsert, remove });
    const dropped = findDroppedRules(diff.current, configuration, remove);
    if (dropped.length > 0) {
      const error: OutcomeError = {
        kind: "Terminal",
        message: `Merged configuration would drop rules not scheduled for deletion: ${dropped.join(", ")}`,
      };
      this.logger.error("Refusing to write merged configuration", { target: target.bucket, dropped });
      for (const [id] of accepted) set(id, "Failed", 0, { error });
      return report(false, false, unchangedState);
    }

    // The write is atomic at the provider: once started it is not cancelled
    const { result, attempts } = await retryResult<void, ApplyError>(
      () =>
        withDeadline(
          (signal) => this.provider.putConfiguration(target, configuration, { signal }),
          options.writeTimeoutMs,
          (): ApplyError => ({
            kind: "Transient",
            message: `Configuration write exceeded ${options.writeTimeoutMs}ms`,
            code: "Timeout",
          }),
        ),
      {
        ...options.retry,
        attempts: options.maxAttempts,
        label: `put-lifecycle ${target.bucket}`,
        shouldRetry: (error) => error.kind === "Transient",
        onRetry: (info) =>
          this.logger.warn("Retrying configuration write", {
            target: target.bucket,
            attempt: info.attempt,
            maxAttempts: info.maxAttempts,
            delayMs: info.delayMs,
            error: info.error.message,
          }),
      },
    );

    if (!result.ok) {
      this.logger.error("Configuration write failed", {
        target: target.bucket,
        attempts,
        kind: result.error.kind,
        error: result.error.message,
      });
      for (const [id] of accepted) set(id, "Failed", attempts, { error: result.error });
      return report(false, false, unchangedState);
    }

    for (const [id, action] of accepted) set(id, action, attempts);
    this.logger.info("Configuration written", { target: target.bucket, attempts, changes: accepted.length });
    return report(true, false, snapshotState(configuration.entries.map((entry) => entry.rule)));
  }

  /** Hook failure for a rule, or undefined when it may be written */
  private async runHook(target: Target, rule: LifecycleRule, options: ApplyOptions): Promise<OutcomeError | undefined> {
    if (!rule.requiresHook) return undefined;
    const hook = options.hook;
    if (!hook) {
      this.logger.warn("Rule requires a pre-transition hook but none is configured", { ruleId: rule.id });
      return undefined;
    }

    const result = await withDeadline(
      (signal) => {
        const candidates = this.provider.listObjectKeys
          ? this.provider.listObjectKeys(target, rule.prefixFilter, { signal })
          : noObjects();
        return hook.invoke(target, rule, candidates, { signal });
      },
      options.hookTimeoutMs,
      () => ({ kind: "Timeout" as const, message: `Hook '${hook.name}' did not answer within ${options.hookTimeoutMs}ms` }),
      options.signal,
    );
    if (result.ok) return undefined;

    this.logger.warn("Pre-transition hook failed", { ruleId: rule.id, kind: result.error.kind, error: result.error.message });
    return result.error;
  }

  private ordered(diff: DiffResult<TRaw>, outcomes: Map<string, ApplyOutcome>): ApplyOutcome[] {
    const list: ApplyOutcome[] = [];
    for (const id of [...diff.desired.keys(), ...diff.toDelete]) {
      const outcome = outcomes.get(id);
      if (outcome) list.push(outcome);
    }
    return list;
  }
}
