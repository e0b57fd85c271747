import type { HookError, LifecycleRule, Result, Target } from "../types.js";

export type HookInvokeOptions = {
  signal?: AbortSignal;
};

/**
 * External processing that must approve a rule before it is written.
 *
 * `candidateObjects` is lazy: implementations pull only as many keys as they
 * need. Invocation is synchronous from the applier's point of view; the rule
 * is not written until the returned promise settles.
 */
export interface PreTransitionHook {
  readonly name: string;
  invoke(
    target: Target,
    rule: LifecycleRule,
    candidateObjects: AsyncIterable<string>,
    options?: HookInvokeOptions,
  ): Promise<Result<void, HookError>>;
}
