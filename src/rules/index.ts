/**
 * RuleSet Model Module
 */

export {
  validateRuleSet,
  findPrefixConflicts,
  MAX_RULES,
  MAX_RULE_ID_LENGTH,
  MAX_PREFIX_LENGTH,
  type ValidationWarnings,
  type ValidationFailure,
} from "./validate.js";

export {
  parseRuleSetDocument,
  loadRuleSetFile,
  RuleSetDocumentSchema,
  LifecycleRuleSchema,
  TransitionSchema,
  StorageClassSchema,
  type RuleSetDocument,
  type LifecycleRuleDocument,
} from "./schema.js";
