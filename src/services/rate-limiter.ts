/**
 * Token bucket limiting the request rate to the origin.
 *
 * One limiter is shared by every worker of a download. Each request takes a
 * token; tokens refill continuously at `requestsPerSecond` up to `burst`.
 * Waiters are served first-in first-out.
 */

import { CancelledError } from "./errors.ts";

// ============================================================================
// Types
// ============================================================================

export interface RateLimiterConfig {
  /** Sustained request rate (0 = unlimited) */
  requestsPerSecond: number;
  /** Bucket capacity: requests allowed back-to-back after an idle period */
  burst: number;
}

export interface RateLimiter {
  /** Wait for a token. Rejects with CancelledError if `signal` aborts first. */
  acquire(signal?: AbortSignal): Promise<void>;
  /** Tokens currently available (fractional) */
  available(): number;
  /** Number of callers waiting for a token */
  pending(): number;
}

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export const UNLIMITED: RateLimiterConfig = { requestsPerSecond: 0, burst: 1 };

// ============================================================================
// Rate Limiter
// ============================================================================

export function createRateLimiter(
  config: RateLimiterConfig,
  now: () => number = Date.now,
): RateLimiter {
  const rate = config.requestsPerSecond;
  const capacity = Math.max(1, Math.floor(config.burst));

  if (rate < 0 || !Number.isFinite(rate)) {
    throw new RangeError(`requestsPerSecond must be a finite non-negative number, got: ${rate}`);
  }

  let tokens = capacity;
  let lastRefill = now();
  const waiters: Waiter[] = [];
  let timer: ReturnType<typeof setTimeout> | null = null;

  function refill(): void {
    const current = now();
    const elapsedSeconds = (current - lastRefill) / 1000;
    if (elapsedSeconds > 0) {
      tokens = Math.min(capacity, tokens + elapsedSeconds * rate);
      lastRefill = current;
    }
  }

  function detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener("abort", waiter.onAbort);
    }
  }

  function drain(): void {
    timer = null;
    refill();

    while (waiters.length > 0 && tokens >= 1) {
      tokens -= 1;
      const waiter = waiters.shift();
      if (waiter) {
        detach(waiter);
        waiter.resolve();
      }
    }

    if (waiters.length > 0) {
      const waitMs = Math.ceil(((1 - tokens) / rate) * 1000);
      timer = setTimeout(drain, Math.max(1, waitMs));
    }
  }

  function acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }
    if (rate === 0) {
      return Promise.resolve();
    }

    refill();
    if (waiters.length === 0 && tokens >= 1) {
      tokens -= 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = waiters.indexOf(waiter);
          if (index >= 0) waiters.splice(index, 1);
          reject(new CancelledError());
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      waiters.push(waiter);
      if (timer === null) drain();
    });
  }

  return {
    acquire,
    available: () => {
      if (rate === 0) return Infinity;
      refill();
      return tokens;
    },
    pending: () => waiters.length,
  };
}
