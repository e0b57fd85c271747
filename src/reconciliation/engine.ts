/**
 * Reconciliation Engine
 *
 * Validate → lock → fetch → diff → apply → audit, for one target per call.
 * Provider, hook and audit failures come back as result statuses; the engine
 * only throws on programming errors.
 */

import { LifecycleApplier } from "../apply/applier.js";
import type { AuditEntry } from "../audit/types.js";
import type { AuditLog } from "../audit/audit-log.js";
import { diffRuleSet, formatDiffSummary } from "../diff/engine.js";
import { withDeadline } from "../deadline.js";
import type { PreTransitionHook } from "../hook/types.js";
import type { Logger } from "../logger.js";
import type { LifecycleProvider } from "../provider/types.js";
import { RETRY_DEFAULTS, retryResult, type RetryConfig } from "../retry.js";
import { validateRuleSet } from "../rules/validate.js";
import {
  targetKey,
  type ApplyOutcome,
  type ConflictWarning,
  type DiffResult,
  type FetchError,
  type FinalState,
  type LogError,
  type ProviderState,
  type RuleSet,
  type Target,
  type ValidationError,
} from "../types.js";
import { ReconciliationLock } from "./lock.js";

// ============================================================================
// Types
// ============================================================================

export type ReconcilerTimeouts = {
  providerMs: number;
  hookMs: number;
};

export type ReconcilerOptions<TRaw> = {
  provider: LifecycleProvider<TRaw>;
  auditLog: AuditLog;
  logger: Logger;
  hook?: PreTransitionHook;
  /** Attempts per provider call, including the first */
  maxAttempts?: number;
  retry?: Omit<RetryConfig, "attempts">;
  timeouts?: Partial<ReconcilerTimeouts>;
  /** Clock, for audit timestamps and durations */
  now?: () => Date;
};

export type ReconcileRequest = {
  target: Target;
  ruleSet: RuleSet;
  prune?: boolean;
  dryRun?: boolean;
  signal?: AbortSignal;
};

export type CancelStage = "fetch" | "apply" | "write";

type ResultBase = {
  target: Target;
  warnings: ConflictWarning[];
  durationMs: number;
  /** Set when the audit record could not be written */
  auditWarning?: LogError;
};

type Outcome<TRaw> =
  | { status: "invalid"; errors: ValidationError[] }
  | { status: "busy" }
  | { status: "fetch-failed"; error: FetchError; attempts: number }
  | { status: "cancelled"; stage: CancelStage; outcomes: ApplyOutcome[] }
  | { status: "planned"; diff: DiffResult<TRaw> }
  | { status: "completed"; diff: DiffResult<TRaw>; outcomes: ApplyOutcome[]; finalState: FinalState };

export type ReconcileResult<TRaw = unknown> = ResultBase & Outcome<TRaw>;

export const DEFAULT_TIMEOUTS: ReconcilerTimeouts = {
  providerMs: 30_000,
  hookMs: 60_000,
};

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_INVALID = 2;

/**
 * 0 when everything reconciled, 2 for rejected input, 1 for anything else that
 * left the target short of the declared state.
 */
export function exitCodeFor(result: ReconcileResult<unknown>): number {
  switch (result.status) {
    case "invalid":
      return EXIT_INVALID;
    case "planned":
      return EXIT_OK;
    case "completed":
      return result.outcomes.some((o) => o.action === "Failed") ? EXIT_FAILED : EXIT_OK;
    default:
      return EXIT_FAILED;
  }
}

// ============================================================================
// Reconciler
// ============================================================================

export class Reconciler<TRaw = unknown> {
  private readonly lock = new ReconciliationLock();
  private readonly applier: LifecycleApplier<TRaw>;
  private readonly provider: LifecycleProvider<TRaw>;
  private readonly logger: Logger;
  private readonly maxAttempts: number;
  private readonly timeouts: ReconcilerTimeouts;
  private readonly now: () => Date;

  constructor(private readonly options: ReconcilerOptions<TRaw>) {
    this.provider = options.provider;
    this.logger = options.logger;
    this.applier = new LifecycleApplier(options.provider, options.logger);
    this.maxAttempts = Math.max(1, options.maxAttempts ?? RETRY_DEFAULTS.attempts);
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };
    this.now = options.now ?? (() => new Date());
  }

  isReconciling(target: Target): boolean {
    return this.lock.isHeld(targetKey(target));
  }

  /** Fetch and diff only; the provider is never written */
  plan(request: Omit<ReconcileRequest, "dryRun">): Promise<ReconcileResult<TRaw>> {
    return this.reconcile({ ...request, dryRun: true });
  }

  async reconcile(request: ReconcileRequest): Promise<ReconcileResult<TRaw>> {
    const started = this.now();
    const key = targetKey(request.target);
    const log = this.logger.child({ target: key });

    const validation = validateRuleSet(request.ruleSet);
    const warnings = validation.ok ? validation.value.warnings : validation.error.warnings;
    for (const warning of warnings) {
      log.warn("Rule conflict", { ruleIds: warning.ruleIds, message: warning.message });
    }

    let outcome: Outcome<TRaw>;
    if (!validation.ok) {
      log.error("Rule set rejected", { errors: validation.error.errors.length });
      outcome = { status: "invalid", errors: validation.error.errors };
    } else if (!this.lock.tryAcquire(key)) {
      log.warn("Reconciliation already in progress");
      outcome = { status: "busy" };
    } else {
      try {
        outcome = await this.run(request, log);
      } finally {
        this.lock.release(key);
      }
    }

    const durationMs = Math.max(0, this.now().getTime() - started.getTime());
    const result: ReconcileResult<TRaw> = { ...outcome, target: request.target, warnings, durationMs };

    const recorded = await this.options.auditLog.record(this.auditEntry(request, result, started));
    if (!recorded.ok) result.auditWarning = recorded.error;

    log.info("Reconciliation finished", { status: result.status, durationMs });
    return result;
  }

  private async run(request: ReconcileRequest, log: Logger): Promise<Outcome<TRaw>> {
    const { target, signal } = request;
    if (signal?.aborted) return { status: "cancelled", stage: "fetch", outcomes: [] };

    const fetched = await this.fetchState(target, log, signal);
    if (signal?.aborted) {
      log.warn("Reconciliation cancelled during fetch");
      return { status: "cancelled", stage: "fetch", outcomes: [] };
    }
    if (!fetched.result.ok) {
      log.error("Could not read current configuration", {
        kind: fetched.result.error.kind,
        error: fetched.result.error.message,
        attempts: fetched.attempts,
      });
      return { status: "fetch-failed", error: fetched.result.error, attempts: fetched.attempts };
    }

    const diff = diffRuleSet(request.ruleSet, fetched.result.value);
    log.info("Computed change set", { summary: formatDiffSummary(diff) });

    if (request.dryRun) return { status: "planned", diff };
    if (signal?.aborted) return { status: "cancelled", stage: "apply", outcomes: [] };

    const report = await this.applier.apply(target, diff, {
      pruneEnabled: request.prune ?? false,
      maxAttempts: this.maxAttempts,
      hook: this.options.hook,
      retry: this.options.retry,
      writeTimeoutMs: this.timeouts.providerMs,
      hookTimeoutMs: this.timeouts.hookMs,
      signal,
    });

    if (report.cancelled) return { status: "cancelled", stage: "write", outcomes: report.outcomes };
    return { status: "completed", diff, outcomes: report.outcomes, finalState: report.finalState };
  }

  private fetchState(target: Target, log: Logger, signal?: AbortSignal) {
    const timeoutMs = this.timeouts.providerMs;
    return retryResult<ProviderState<TRaw>, FetchError>(
      () =>
        withDeadline(
          (deadline) => this.provider.fetch(target, { signal: deadline }),
          timeoutMs,
          (): FetchError => ({ kind: "Transient", message: `Configuration read exceeded ${timeoutMs}ms`, code: "Timeout" }),
          signal,
        ),
      {
        ...this.options.retry,
        attempts: this.maxAttempts,
        label: `get-lifecycle ${target.bucket}`,
        shouldRetry: (error) => error.kind === "Transient",
        onRetry: (info) =>
          log.warn("Retrying configuration read", {
            attempt: info.attempt,
            delayMs: info.delayMs,
            error: info.error.message,
          }),
        signal,
      },
    );
  }

  private auditEntry(request: ReconcileRequest, result: ReconcileResult<TRaw>, started: Date): AuditEntry {
    const entry: AuditEntry = {
      timestamp: started.toISOString(),
      targetKey: targetKey(request.target),
      target: { bucket: request.target.bucket, region: request.target.region },
      status: result.status,
      dryRun: request.dryRun ?? false,
      prune: request.prune ?? false,
      outcomes: [],
      durationMs: result.durationMs,
    };

    switch (result.status) {
      case "invalid":
        entry.error = result.errors.map((e) => `${e.path}: ${e.message}`).join("; ");
        break;
      case "busy":
        entry.error = "reconciliation already in progress";
        break;
      case "fetch-failed":
        entry.error = `${result.error.kind}: ${result.error.message}`;
        break;
      case "cancelled":
        entry.outcomes = result.outcomes;
        entry.error = `cancelled before ${result.stage}`;
        break;
      case "planned":
        entry.diff = summarize(result.diff);
        break;
      case "completed":
        entry.diff = summarize(result.diff);
        entry.outcomes = result.outcomes;
        entry.finalStateHash = result.finalState.hash;
        break;
    }
    return entry;
  }
}

function summarize(diff: DiffResult<unknown>) {
  return {
    toCreate: [...diff.toCreate],
    toUpdate: [...diff.toUpdate],
    toDelete: [...diff.toDelete],
    unchanged: [...diff.unchanged],
  };
}
