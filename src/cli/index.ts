export { runCli, resolveSince, defaultAuditStore, type CliDeps, type CliIO } from "./program.js";
export { formatAuditRecord, formatResult, formatValidationErrors, formatWarnings, resultToJson } from "./format.js";
