/**
 * Pre-Transition Hooks
 */

export type { PreTransitionHook, HookInvokeOptions } from "./types.js";
export {
  LambdaPreTransitionHook,
  DEFAULT_SAMPLE_SIZE,
  type LambdaHookConfig,
  type HookPayload,
} from "./lambda-hook.js";
