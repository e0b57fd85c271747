/**
 * Reconciliation Module
 */

export {
  Reconciler,
  exitCodeFor,
  DEFAULT_TIMEOUTS,
  EXIT_OK,
  EXIT_FAILED,
  EXIT_INVALID,
  type ReconcilerOptions,
  type ReconcilerTimeouts,
  type ReconcileRequest,
  type ReconcileResult,
  type CancelStage,
} from "./engine.js";

export { ReconciliationLock } from "./lock.js";
