/**
 * Retrying HTTP fetcher for segments and key material.
 *
 * Design:
 * - Every attempt takes a rate limiter token first
 * - Each attempt has its own timeout; cancellation is checked between attempts
 * - Transient failures (timeout, network, 5xx, 429) are retried per the policy
 * - Nothing is written to disk here
 */

import { silentLogger, type Logger } from "../logger.ts";
import type { FetchError, FetchResult, SegmentDescriptor, Sleep } from "./hls-types.ts";
import { createRateLimiter, UNLIMITED, type RateLimiter } from "./rate-limiter.ts";
import { createRetryPolicy, runWithRetry, type AttemptOutcome, type RetryPolicy } from "./retry-policy.ts";

// ============================================================================
// HTTP Fetcher Interface
// ============================================================================

/**
 * HTTP fetcher interface for dependency injection.
 * Allows mocking in tests.
 */
export interface HttpFetcher {
  fetch(url: string, init?: RequestInit): Promise<Response>;
}

/**
 * Default HTTP fetcher using global fetch.
 */
export const defaultFetcher: HttpFetcher = {
  fetch: (url, init) => fetch(url, init),
};

// ============================================================================
// Types
// ============================================================================

export interface RetryingFetcherConfig {
  http?: HttpFetcher;
  limiter?: RateLimiter;
  policy?: RetryPolicy;
  /** Per-attempt timeout in milliseconds */
  timeoutMs?: number;
  /** Headers sent with every request (User-Agent, Referer, ...) */
  headers?: Record<string, string>;
  sleep?: Sleep;
  logger?: Logger;
}

export interface FetchBytesOptions {
  signal?: AbortSignal;
  /** Sequence number reported in errors */
  sequenceNumber?: number | null;
  /** Request only this byte range of the resource */
  range?: { offset: number; length: number };
}

export interface RetryingFetcher {
  /** Fetch any resource (key, playlist) with retries. */
  fetchBytes(url: string, options?: FetchBytesOptions): Promise<FetchResult>;
  /** Fetch one segment with retries. */
  fetch(descriptor: SegmentDescriptor, signal?: AbortSignal): Promise<FetchResult>;
}

type AttemptError = Omit<FetchError, "attempts" | "sequenceNumber">;

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

// ============================================================================
// Pure Functions
// ============================================================================

/**
 * Whether an HTTP status is worth retrying.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Build the Range header value for a sub-range request.
 */
export function rangeHeader(offset: number, length: number): string {
  return `bytes=${offset}-${offset + length - 1}`;
}

// ============================================================================
// Retrying Fetcher
// ============================================================================

export function createRetryingFetcher(config: RetryingFetcherConfig = {}): RetryingFetcher {
  const http = config.http ?? defaultFetcher;
  const limiter = config.limiter ?? createRateLimiter(UNLIMITED);
  const policy = config.policy ?? createRetryPolicy();
  const timeoutMs = config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const baseHeaders = config.headers ?? {};
  const log = config.logger ?? silentLogger;

  async function attemptOnce(
    url: string,
    options: FetchBytesOptions,
  ): Promise<AttemptOutcome<Uint8Array, AttemptError>> {
    try {
      await limiter.acquire(options.signal);
    } catch (error) {
      if (options.signal?.aborted) {
        // Nothing was sent
        return { ok: false, cancelled: true };
      }
      throw error;
    }

    const headers: Record<string, string> = { ...baseHeaders };
    if (options.range) {
      headers["Range"] = rangeHeader(options.range.offset, options.range.length);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await http.fetch(url, { headers, signal: controller.signal });

      if (!response.ok) {
        // Release the connection; the body is not needed
        await response.body?.cancel().catch(() => {});
        return {
          ok: false,
          retryable: isRetryableStatus(response.status),
          error: {
            reason: "http_status",
            statusCode: response.status,
            message: `HTTP ${response.status}: ${response.statusText}`,
          },
        };
      }

      let data = new Uint8Array(await response.arrayBuffer());

      if (options.range) {
        const { offset, length } = options.range;
        if (response.status === 200 && data.length > length) {
          // Server ignored the Range header and sent the whole resource
          data = data.subarray(offset, offset + length);
        }
        if (data.length !== length) {
          return {
            ok: false,
            retryable: true,
            error: {
              reason: "network",
              message: `Expected ${length} bytes, got ${data.length}`,
            },
          };
        }
      }

      return { ok: true, data };
    } catch (error) {
      if (controller.signal.aborted) {
        return {
          ok: false,
          retryable: true,
          error: { reason: "timeout", message: `Request timed out after ${timeoutMs}ms` },
        };
      }
      return {
        ok: false,
        retryable: true,
        error: {
          reason: "network",
          message: error instanceof Error ? error.message : "Network error",
        },
      };
    } finally {
      clearTimeout(timer);
    }
  }

  async function fetchBytes(url: string, options: FetchBytesOptions = {}): Promise<FetchResult> {
    const sequenceNumber = options.sequenceNumber ?? null;

    const outcome = await runWithRetry(policy, () => attemptOnce(url, options), {
      signal: options.signal,
      sleep: config.sleep,
      onRetry: ({ attempt, delayMs, error }) => {
        log.debug("Retrying request", {
          url,
          sequence: sequenceNumber,
          attempt,
          maxAttempts: policy.options.maxAttempts,
          delayMs,
          error: error.message,
        });
      },
    });

    if (outcome.ok) {
      return { ok: true, data: outcome.data, attempts: outcome.attempts };
    }
    if (outcome.cancelled) {
      return {
        ok: false,
        error: {
          sequenceNumber,
          reason: "cancelled",
          message: "Download was cancelled",
          attempts: outcome.attempts,
        },
      };
    }
    return {
      ok: false,
      error: { ...outcome.error, sequenceNumber, attempts: outcome.attempts },
    };
  }

  function fetchSegment(descriptor: SegmentDescriptor, signal?: AbortSignal): Promise<FetchResult> {
    const range = descriptor.byteLength !== undefined && descriptor.byteOffset !== undefined
      ? { offset: descriptor.byteOffset, length: descriptor.byteLength }
      : undefined;

    return fetchBytes(descriptor.uri, {
      signal,
      sequenceNumber: descriptor.sequenceNumber,
      range,
    });
  }

  return {
    fetchBytes,
    fetch: fetchSegment,
  };
}
