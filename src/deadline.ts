/**
 * Deadlines for provider and hook calls.
 */

import type { Result } from "./types.js";

/**
 * Run `fn` with an AbortSignal that fires after `timeoutMs` (or when `parent`
 * aborts). If the deadline passes first, `onTimeout()` becomes the result and
 * the late call is abandoned.
 */
export async function withDeadline<T, E>(
  fn: (signal: AbortSignal) => Promise<Result<T, E>>,
  timeoutMs: number,
  onTimeout: () => E,
  parent?: AbortSignal,
): Promise<Result<T, E>> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener("abort", forwardAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<Result<T, E>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort(new Error(`deadline of ${timeoutMs}ms exceeded`));
      resolve({ ok: false, error: onTimeout() });
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", forwardAbort);
  }
}
