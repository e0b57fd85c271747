/**
 * Applier Module
 */

export { LifecycleApplier, type ApplyOptions, type ApplyReport } from "./applier.js";
export { mergeConfiguration, findDroppedRules, type MergePlan } from "./merge.js";
