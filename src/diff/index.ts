/**
 * Diff Engine Module
 */

export {
  diffRuleSet,
  compareRule,
  hasActionableChanges,
  formatDiffSummary,
} from "./engine.js";

export { snapshotState } from "./snapshot.js";
