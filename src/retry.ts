/**
 * Retry Runner
 *
 * Exponential backoff (base delay, doubling, capped, jittered) around calls
 * that report failure through a typed Result instead of throwing. The caller
 * decides which errors are retryable; the runner never inspects them.
 */

import type { Result } from "./types.js";

/**
 * Retry configuration options
 */
export type RetryConfig = {
  attempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
};

/**
 * Retry attempt information
 */
export type RetryInfo<E> = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: E;
  label?: string;
};

export type RetryOptions<E> = RetryConfig & {
  label?: string;
  shouldRetry: (error: E, attempt: number) => boolean;
  onRetry?: (info: RetryInfo<E>) => void;
  /** Stops retrying (not the in-flight call) once aborted */
  signal?: AbortSignal;
};

export type RetryOutcome<T, E> = {
  result: Result<T, E>;
  attempts: number;
};

export const RETRY_DEFAULTS: Required<RetryConfig> = {
  attempts: 3,
  minDelayMs: 200,
  maxDelayMs: 20_000,
  jitter: 0.2,
};

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export function resolveRetryConfig(
  defaults: Required<RetryConfig>,
  overrides?: RetryConfig,
): Required<RetryConfig> {
  const attempts = Math.max(1, Math.round(overrides?.attempts ?? defaults.attempts));
  const minDelayMs = Math.max(0, Math.round(overrides?.minDelayMs ?? defaults.minDelayMs));
  const maxDelayMs = Math.max(minDelayMs, Math.round(overrides?.maxDelayMs ?? defaults.maxDelayMs));
  const jitter = Math.min(1, Math.max(0, overrides?.jitter ?? defaults.jitter));
  return { attempts, minDelayMs, maxDelayMs, jitter };
}

function applyJitter(delayMs: number, jitter: number): number {
  if (jitter <= 0) return delayMs;
  const offset = (Math.random() * 2 - 1) * jitter;
  return Math.max(0, Math.round(delayMs * (1 + offset)));
}

/**
 * Delay before the retry that follows `attempt` (1-based).
 */
export function computeBackoffDelay(attempt: number, config: Required<RetryConfig>): number {
  const base = config.minDelayMs * 2 ** (attempt - 1);
  const capped = Math.min(base, config.maxDelayMs);
  const jittered = applyJitter(capped, config.jitter);
  return Math.min(Math.max(jittered, config.minDelayMs), config.maxDelayMs);
}

/**
 * Run `fn` until it succeeds, returns a non-retryable error, or the attempt
 * budget is spent. The last result is returned together with the number of
 * calls made.
 */
export async function retryResult<T, E>(
  fn: (attempt: number) => Promise<Result<T, E>>,
  options: RetryOptions<E>,
): Promise<RetryOutcome<T, E>> {
  const config = resolveRetryConfig(RETRY_DEFAULTS, options);
  const maxAttempts = config.attempts;

  let attempt = 1;
  for (;;) {
    const result = await fn(attempt);
    if (result.ok) return { result, attempts: attempt };
    if (attempt >= maxAttempts || !options.shouldRetry(result.error, attempt)) {
      return { result, attempts: attempt };
    }
    if (options.signal?.aborted) return { result, attempts: attempt };

    const delayMs = computeBackoffDelay(attempt, config);
    options.onRetry?.({
      attempt,
      maxAttempts,
      delayMs,
      error: result.error,
      label: options.label,
    });
    await sleep(delayMs);
    attempt += 1;
  }
}
