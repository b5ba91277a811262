/**
 * Retry policy with exponential backoff and jitter.
 *
 * The policy is a plain object so it can be tested on its own and shared by
 * the segment fetcher and the key resolver.
 */

import { defaultSleep, type Sleep } from "./hls-types.ts";

// ============================================================================
// Types
// ============================================================================

export interface RetryPolicyOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay unit; the wait after attempt n is baseDelayMs * 2^n */
  baseDelayMs: number;
  /** Upper bound for the exponential part of the delay */
  maxDelayMs: number;
  /** Random extra delay as a fraction of the computed delay (0-1) */
  jitterRatio: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000, // 2s -> 4s between attempts
  maxDelayMs: 30_000,
  jitterRatio: 0.1,
};

export interface RetryPolicy {
  readonly options: RetryPolicyOptions;
  /** Delay to wait after `failedAttempts` attempts have failed (>= 1). */
  delayFor(failedAttempts: number): number;
  /** Whether another attempt is allowed after `failedAttempts` failures. */
  canRetry(failedAttempts: number): boolean;
}

/**
 * Outcome of one attempt. `retryable: false` ends the loop immediately.
 * `cancelled` means the attempt gave up before doing any work; it is not
 * counted.
 */
export type AttemptOutcome<T, E> =
  | { ok: true; data: T }
  | { ok: false; error: E; retryable: boolean }
  | { ok: false; cancelled: true };

export type RetryOutcome<T, E> =
  | { ok: true; data: T; attempts: number }
  | { ok: false; error: E; attempts: number; cancelled: false }
  | { ok: false; error: null; attempts: number; cancelled: true };

export interface RunWithRetryOptions<E> {
  /** Checked before every attempt */
  signal?: AbortSignal;
  sleep?: Sleep;
  onRetry?: (info: { attempt: number; delayMs: number; error: E }) => void;
}

// ============================================================================
// Policy
// ============================================================================

export function createRetryPolicy(
  overrides: Partial<RetryPolicyOptions> = {},
  random: () => number = Math.random,
): RetryPolicy {
  const options: RetryPolicyOptions = { ...DEFAULT_RETRY_POLICY, ...overrides };

  if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got: ${options.maxAttempts}`);
  }
  if (options.baseDelayMs < 0 || options.maxDelayMs < 0) {
    throw new RangeError("Retry delays must be non-negative");
  }
  if (options.jitterRatio < 0 || options.jitterRatio > 1) {
    throw new RangeError(`jitterRatio must be between 0 and 1, got: ${options.jitterRatio}`);
  }

  return {
    options,
    delayFor(failedAttempts) {
      const exponential = Math.min(
        options.maxDelayMs,
        options.baseDelayMs * Math.pow(2, failedAttempts),
      );
      return Math.round(exponential * (1 + options.jitterRatio * random()));
    },
    canRetry(failedAttempts) {
      return failedAttempts < options.maxAttempts;
    },
  };
}

// ============================================================================
// Runner
// ============================================================================

/**
 * Run `attempt` until it succeeds, fails permanently, the policy runs out of
 * attempts, or `signal` aborts.
 */
export async function runWithRetry<T, E>(
  policy: RetryPolicy,
  attempt: (attemptNumber: number) => Promise<AttemptOutcome<T, E>>,
  options: RunWithRetryOptions<E> = {},
): Promise<RetryOutcome<T, E>> {
  const sleep = options.sleep ?? defaultSleep;
  let attempts = 0;

  while (true) {
    if (options.signal?.aborted) {
      return { ok: false, error: null, attempts, cancelled: true };
    }

    const outcome = await attempt(attempts + 1);
    if ("cancelled" in outcome) {
      return { ok: false, error: null, attempts, cancelled: true };
    }

    attempts++;
    if (outcome.ok) {
      return { ok: true, data: outcome.data, attempts };
    }

    if (!outcome.retryable || !policy.canRetry(attempts)) {
      return { ok: false, error: outcome.error, attempts, cancelled: false };
    }

    const delayMs = policy.delayFor(attempts);
    options.onRetry?.({ attempt: attempts, delayMs, error: outcome.error });
    await sleep(delayMs, options.signal);
  }
}
