/**
 * Lifecycle Reconciler — CLI Commands
 *
 * Commands: run, plan, validate, audit list
 *
 * Collaborators are created through injectable factories so the whole command
 * surface runs in-process under test.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { AuditLog } from "../audit/audit-log.js";
import { InMemoryAuditStore } from "../audit/memory-store.js";
import { JsonlAuditStore } from "../audit/jsonl-store.js";
import { SQLiteAuditStore } from "../audit/sqlite-store.js";
import { ReconcileStatusSchema, type AuditStore } from "../audit/types.js";
import { loadConfig, type ReconcilerConfig, type ReconcilerConfigInput } from "../config.js";
import { LambdaPreTransitionHook } from "../hook/lambda-hook.js";
import type { PreTransitionHook } from "../hook/types.js";
import { createLogger, type Logger, type LogLevel } from "../logger.js";
import { S3LifecycleProvider } from "../provider/s3-provider.js";
import type { LifecycleProvider } from "../provider/types.js";
import { EXIT_FAILED, EXIT_INVALID, EXIT_OK, Reconciler, exitCodeFor } from "../reconciliation/engine.js";
import { loadRuleSetFile } from "../rules/schema.js";
import { validateRuleSet } from "../rules/validate.js";
import { Check } from "@sinclair/typebox/value";
import { createTarget, targetKey } from "../types.js";
import { formatAuditRecord, formatResult, formatValidationErrors, formatWarnings, resultToJson } from "./format.js";

export type CliIO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  io?: CliIO;
  createProvider?: (config: ReconcilerConfig) => LifecycleProvider<unknown>;
  createAuditStore?: (config: ReconcilerConfig) => AuditStore;
  createHook?: (config: ReconcilerConfig) => PreTransitionHook | undefined;
  createLogger?: (level: LogLevel) => Logger;
  now?: () => Date;
  /** Cancels an in-flight run or plan */
  signal?: AbortSignal;
};

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

export function defaultAuditStore(config: ReconcilerConfig): AuditStore {
  switch (config.audit.store) {
    case "sqlite":
      return new SQLiteAuditStore(config.audit.path);
    case "memory":
      return new InMemoryAuditStore();
    case "jsonl":
      return new JsonlAuditStore(config.audit.path);
  }
}

function defaultHook(config: ReconcilerConfig): PreTransitionHook | undefined {
  if (!config.hook.functionName) return undefined;
  return new LambdaPreTransitionHook({
    functionName: config.hook.functionName,
    region: config.region,
    sampleSize: config.hook.sampleSize,
    maxAttempts: config.maxAttempts,
    retry: config.retry,
  });
}

/**
 * Relative durations ("24h", "7d", "30m") or an ISO-8601 timestamp.
 */
export function resolveSince(input: string | undefined, now: Date): string | undefined {
  if (!input) return undefined;

  const match = input.match(/^(\d+)(h|d|m)$/);
  if (match) {
    const [, num = "0", unit = "d"] = match;
    const multipliers: Record<string, number> = { h: 3_600_000, d: 86_400_000, m: 60_000 };
    const ms = Number.parseInt(num, 10) * (multipliers[unit] ?? 86_400_000);
    return new Date(now.getTime() - ms).toISOString();
  }

  // Assume ISO-8601 if not relative
  return input;
}

function parseCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

type CommonOptions = {
  region?: string;
  config?: string;
  maxAttempts?: number;
  json?: boolean;
};

type ReconcileOptions = CommonOptions & {
  rules: string;
  prune?: boolean;
};

export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? processIO;
  const env = deps.env ?? process.env;
  const now = deps.now ?? (() => new Date());
  let exitCode = EXIT_OK;

  async function resolveConfig(opts: CommonOptions): Promise<ReconcilerConfig | undefined> {
    const overrides: ReconcilerConfigInput = { region: opts.region, maxAttempts: opts.maxAttempts };
    const loaded = await loadConfig({ file: opts.config, env, overrides });
    if (loaded.ok) return loaded.value;
    for (const issue of loaded.error) io.stderr(`error: config: ${issue}`);
    exitCode = EXIT_INVALID;
    return undefined;
  }

  async function reconcileCommand(bucket: string, opts: ReconcileOptions, dryRun: boolean): Promise<void> {
    const config = await resolveConfig(opts);
    if (!config) return;

    const rules = await loadRuleSetFile(opts.rules);
    if (!rules.ok) {
      for (const line of formatValidationErrors(rules.error)) io.stderr(line);
      exitCode = EXIT_INVALID;
      return;
    }

    const logger = (deps.createLogger ?? ((level) => createLogger({ level })))(config.logLevel);
    const provider: LifecycleProvider<unknown> =
      deps.createProvider?.(config) ?? new S3LifecycleProvider({ region: config.region });
    const store = (deps.createAuditStore ?? defaultAuditStore)(config);
    try {
      const reconciler = new Reconciler({
        provider,
        auditLog: new AuditLog(store, logger),
        logger,
        hook: (deps.createHook ?? defaultHook)(config),
        maxAttempts: config.maxAttempts,
        retry: config.retry,
        timeouts: config.timeouts,
        now,
      });

      const request = {
        target: createTarget(bucket, opts.region ?? config.region),
        ruleSet: rules.value,
        prune: opts.prune ?? false,
        signal: deps.signal,
      };
      const result = dryRun ? await reconciler.plan(request) : await reconciler.reconcile(request);

      if (opts.json) io.stdout(JSON.stringify(resultToJson(result), null, 2));
      else for (const line of formatResult(result)) io.stdout(line);
      exitCode = exitCodeFor(result);
    } finally {
      await store.close();
    }
  }

  const program = new Command("lifecycle-reconciler")
    .description("Reconcile declared storage lifecycle rules against a bucket")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });

  // ── run ─────────────────────────────────────────────────────
  program
    .command("run")
    .description("Apply a rule set to a bucket")
    .argument("<bucket>", "Bucket name")
    .requiredOption("-r, --rules <file>", "Rule set JSON file")
    .option("--region <region>", "Bucket region")
    .option("--prune", "Delete provider rules the rule set does not declare")
    .option("-c, --config <file>", "Config JSON file")
    .option("--max-attempts <n>", "Attempts per provider call", parseCount)
    .option("--json", "Output as JSON")
    .action((bucket: string, opts: ReconcileOptions) => reconcileCommand(bucket, opts, false));

  // ── plan ────────────────────────────────────────────────────
  program
    .command("plan")
    .description("Show the changes a run would make, without writing")
    .argument("<bucket>", "Bucket name")
    .requiredOption("-r, --rules <file>", "Rule set JSON file")
    .option("--region <region>", "Bucket region")
    .option("--prune", "Include deletion of undeclared provider rules")
    .option("-c, --config <file>", "Config JSON file")
    .option("--json", "Output as JSON")
    .action((bucket: string, opts: ReconcileOptions) => reconcileCommand(bucket, opts, true));

  // ── validate ────────────────────────────────────────────────
  program
    .command("validate")
    .description("Check a rule set without contacting the provider")
    .requiredOption("-r, --rules <file>", "Rule set JSON file")
    .action(async (opts: { rules: string }) => {
      const rules = await loadRuleSetFile(opts.rules);
      if (!rules.ok) {
        for (const line of formatValidationErrors(rules.error)) io.stderr(line);
        exitCode = EXIT_INVALID;
        return;
      }

      const validation = validateRuleSet(rules.value);
      const warnings = validation.ok ? validation.value.warnings : validation.error.warnings;
      for (const line of formatWarnings(warnings)) io.stderr(line);
      if (!validation.ok) {
        for (const line of formatValidationErrors(validation.error.errors)) io.stderr(line);
        exitCode = EXIT_INVALID;
        return;
      }
      io.stdout(`${rules.value.length} rule(s) valid`);
    });

  // ── audit list ──────────────────────────────────────────────
  const audit = program.command("audit").description("Query the reconciliation audit log");

  audit
    .command("list")
    .description("List recent reconciliations, newest first")
    .option("--target <bucket>", "Filter by bucket")
    .option("--region <region>", "Region of the --target bucket")
    .addOption(new Option("--status <status>", "Filter by status").choices(ReconcileStatusSchema.anyOf.map((s) => s.const)))
    .option("--since <date>", "Start date (ISO-8601 or relative like '24h', '7d')")
    .option("-n, --limit <n>", "Max results", parseCount, 25)
    .option("-c, --config <file>", "Config JSON file")
    .option("--json", "Output as JSON")
    .action(
      async (opts: { target?: string; region?: string; status?: string; since?: string; limit: number; config?: string; json?: boolean }) => {
        const config = await resolveConfig({ config: opts.config });
        if (!config) return;

        const status = opts.status;
        const store = (deps.createAuditStore ?? defaultAuditStore)(config);
        try {
          const records = await store.query({
            targetKey: opts.target ? targetKey(createTarget(opts.target, opts.region ?? config.region)) : undefined,
            status: Check(ReconcileStatusSchema, status) ? status : undefined,
            since: resolveSince(opts.since, now()),
            limit: opts.limit,
          });

          if (opts.json) {
            io.stdout(JSON.stringify(records, null, 2));
            return;
          }
          if (records.length === 0) {
            io.stdout("No audit records found.");
            return;
          }
          for (const record of records) io.stdout(formatAuditRecord(record));
        } finally {
          await store.close();
        }
      },
    );

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_INVALID;
    }
    throw error;
  }
  return exitCode;
}

export { EXIT_OK, EXIT_FAILED, EXIT_INVALID };
