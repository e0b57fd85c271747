/**
 * Bucket Lifecycle Reconciler
 *
 * Declarative storage lifecycle rules, diffed against a bucket's live
 * configuration and applied with retry, pre-transition hooks and an audit trail.
 */

export * from "./src/types.js";
export * from "./src/rules/index.js";
export * from "./src/diff/index.js";
export * from "./src/provider/index.js";
export * from "./src/hook/index.js";
export * from "./src/apply/index.js";
export * from "./src/audit/index.js";
export * from "./src/reconciliation/index.js";
export { loadConfig, parseConfig, configFromEnv, reconcilerConfigSchema, AUDIT_STORES } from "./src/config.js";
export type { ReconcilerConfig, ReconcilerConfigInput, AuditStoreKind, LoadConfigOptions } from "./src/config.js";
export { createLogger, silentLogger, type Logger, type LogLevel, type LoggerOptions } from "./src/logger.js";
export { retryResult, computeBackoffDelay, RETRY_DEFAULTS, type RetryConfig, type RetryOptions } from "./src/retry.js";
export { withDeadline } from "./src/deadline.js";
export { classifyApplyError, classifyFetchError, isTransientAWSError } from "./src/aws-errors.js";
export { runCli, type CliDeps, type CliIO } from "./src/cli/index.js";
