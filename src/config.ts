/**
 * Reconciler Configuration
 *
 * Layered settings: built-in defaults, an optional JSON file, environment
 * variables, then explicit overrides (CLI flags). The merged value is checked
 * once with Zod.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { LOG_LEVELS } from "./logger.js";
import { err, ok, type Result } from "./types.js";

// =============================================================================
// Zod Schemas
// =============================================================================

export const AUDIT_STORES = ["jsonl", "sqlite", "memory"] as const;

export type AuditStoreKind = (typeof AUDIT_STORES)[number];

const DEFAULT_AUDIT_PATHS: Record<AuditStoreKind, string> = {
  jsonl: ".lifecycle/audit.jsonl",
  sqlite: ".lifecycle/audit.db",
  memory: "",
};

export const retryConfigSchema = z
  .object({
    minDelayMs: z.number().int().nonnegative().default(200),
    maxDelayMs: z.number().int().nonnegative().default(20_000),
    jitter: z.number().min(0).max(1).default(0.2),
  })
  .refine((r) => r.maxDelayMs >= r.minDelayMs, {
    message: "maxDelayMs must not be smaller than minDelayMs",
    path: ["maxDelayMs"],
  });

export const auditConfigSchema = z
  .object({
    store: z.enum(AUDIT_STORES).default("jsonl"),
    path: z.string().min(1).optional(),
  })
  .transform((audit) => ({ store: audit.store, path: audit.path ?? DEFAULT_AUDIT_PATHS[audit.store] }));

export const reconcilerConfigSchema = z.object({
  region: z.string().min(1).optional(),
  maxAttempts: z.number().int().min(1).max(10).default(3),
  retry: retryConfigSchema.default({}),
  timeouts: z
    .object({
      providerMs: z.number().int().positive().default(30_000),
      hookMs: z.number().int().positive().default(60_000),
    })
    .default({}),
  audit: auditConfigSchema.default({}),
  hook: z
    .object({
      functionName: z.string().min(1).optional(),
      sampleSize: z.number().int().min(0).max(1000).default(100),
    })
    .default({}),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type ReconcilerConfig = z.output<typeof reconcilerConfigSchema>;
export type ReconcilerConfigInput = z.input<typeof reconcilerConfigSchema>;

// =============================================================================
// Loading
// =============================================================================

export type LoadConfigOptions = {
  /** JSON file; an explicit path that cannot be read is an error */
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ReconcilerConfigInput;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function mergeLayers(...layers: Record<string, unknown>[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const previous = merged[key];
      merged[key] = isRecord(previous) && isRecord(value) ? mergeLayers(previous, value) : value;
    }
  }
  return merged;
}

function envNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  // Left as a string so the schema reports it
  return Number.isFinite(parsed) ? parsed : value;
}

/**
 * Settings taken from the environment
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return {
    region: env.LIFECYCLE_REGION || env.AWS_REGION || undefined,
    maxAttempts: envNumber(env.LIFECYCLE_MAX_ATTEMPTS),
    audit: {
      store: env.LIFECYCLE_AUDIT_STORE || undefined,
      path: env.LIFECYCLE_AUDIT_PATH || undefined,
    },
    hook: { functionName: env.LIFECYCLE_HOOK_FUNCTION || undefined },
    logLevel: env.LIFECYCLE_LOG_LEVEL || undefined,
  };
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

export function parseConfig(value: unknown): Result<ReconcilerConfig, string[]> {
  const parsed = reconcilerConfigSchema.safeParse(value);
  return parsed.success ? ok(parsed.data) : err(formatIssues(parsed.error));
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<Result<ReconcilerConfig, string[]>> {
  let fileLayer: Record<string, unknown> = {};
  if (options.file) {
    let text: string;
    try {
      text = await readFile(options.file, "utf-8");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err([`Cannot read config file: ${message}`]);
    }
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err([`Config file is not valid JSON: ${message}`]);
    }
    if (!isRecord(value)) return err([`Config file must contain a JSON object`]);
    fileLayer = value;
  }

  return parseConfig(mergeLayers(fileLayer, configFromEnv(options.env ?? {}), options.overrides ?? {}));
}
