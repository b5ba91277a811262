/**
 * Segment worker pool.
 *
 * Drains the segments still needed by the resume ledger with at most
 * `concurrency` workers in flight. Per segment:
 *   claim -> fetch (rate limited, retried) -> write ciphertext ->
 *   decrypt in place -> complete -> report bytes
 *
 * Per-segment failures are recorded in the ledger and never stop the other
 * workers. Once more than `failureThreshold` segments have failed, or the
 * signal aborts, workers stop claiming new segments.
 */

import { join } from "node:path";
import pLimit from "p-limit";
import { errorMessage, silentLogger, type Logger } from "../logger.ts";
import type { ResumeLedger } from "../db/resume-ledger.ts";
import { decryptSegment } from "./decryptor.ts";
import { DecryptionError } from "./errors.ts";
import { defaultFileSystem, type FileSystem } from "./file-system.ts";
import type { EncryptionKey, Manifest, SegmentDescriptor } from "./hls-types.ts";
import { ivForSegment } from "./manifest-parser.ts";
import type { ProgressAggregator } from "./progress-aggregator.ts";
import type { RetryingFetcher } from "./segment-fetcher.ts";

// ============================================================================
// Types
// ============================================================================

export interface WorkerPoolOptions {
  /** Directory segment files are written to */
  workingDir: string;
  /** Maximum segments in flight (default 100) */
  concurrency?: number;
  /** Stop claiming once more than this many segments failed (default 25) */
  failureThreshold?: number;
}

export interface WorkerPoolDeps {
  ledger: ResumeLedger;
  fetcher: RetryingFetcher;
  progress?: ProgressAggregator;
  fs?: FileSystem;
  logger?: Logger;
}

export type PoolStopReason = "cancelled" | "failure_threshold";

export interface PoolResult {
  /** Segments downloaded in this run */
  completed: number[];
  /** Segments that failed terminally in this run */
  failed: number[];
  /** Failed in this run after also failing in an earlier run */
  repeatedFailures: number[];
  /** Segments left pending (not attempted, or cancelled mid-flight) */
  pending: number[];
  bytesDownloaded: number;
  stopReason: PoolStopReason | null;
}

export interface SegmentWorkerPool {
  downloadAll(manifest: Manifest, key: EncryptionKey | null, signal?: AbortSignal): Promise<PoolResult>;
}

type SegmentOutcome =
  | { ok: true; bytes: number; attempts: number }
  | { ok: false; cancelled: boolean; message: string; attempts: number };

export const DEFAULT_CONCURRENCY = 100;
export const DEFAULT_FAILURE_THRESHOLD = 25;
const SEGMENT_NAME_WIDTH = 6;

// ============================================================================
// Path Utilities (pure functions)
// ============================================================================

/**
 * File name for a segment: zero-padded sequence number, e.g. `000042.ts`.
 */
export function segmentFileName(sequenceNumber: number): string {
  return `${String(sequenceNumber).padStart(SEGMENT_NAME_WIDTH, "0")}.ts`;
}

export function segmentPath(workingDir: string, sequenceNumber: number): string {
  return join(workingDir, segmentFileName(sequenceNumber));
}

// ============================================================================
// Worker Pool
// ============================================================================

export function createSegmentWorkerPool(
  deps: WorkerPoolDeps,
  options: WorkerPoolOptions,
): SegmentWorkerPool {
  const { ledger, fetcher, progress } = deps;
  const fs = deps.fs ?? defaultFileSystem;
  const log = deps.logger ?? silentLogger;
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  const failureThreshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got: ${concurrency}`);
  }
  if (!Number.isInteger(failureThreshold) || failureThreshold < 0) {
    throw new RangeError(`failureThreshold must be a non-negative integer, got: ${failureThreshold}`);
  }

  async function downloadAll(
    manifest: Manifest,
    key: EncryptionKey | null,
    signal?: AbortSignal,
  ): Promise<PoolResult> {
    const completed: number[] = [];
    const failed: number[] = [];
    const repeatedFailures: number[] = [];
    let bytesDownloaded = 0;
    let stopReason: PoolStopReason | null = null;
    // Download state that cannot be saved ends the run once in-flight work settles
    const fatalErrors: unknown[] = [];

    /**
     * Fetch, store and decrypt one claimed segment.
     * Unexpected errors (disk) are returned as failures.
     */
    async function fetchAndStore(segment: SegmentDescriptor, path: string): Promise<SegmentOutcome> {
      let attempts = 0;

      try {
        // A bad decrypt means corrupted bytes: fetch once more before giving up
        for (let round = 1; ; round++) {
          const result = await fetcher.fetch(segment, signal);
          if (!result.ok) {
            attempts += result.error.attempts;
            return {
              ok: false,
              cancelled: result.error.reason === "cancelled",
              message: result.error.message,
              attempts,
            };
          }
          attempts += result.attempts;

          await fs.writeFile(path, result.data);

          if (segment.encrypted) {
            if (!key) {
              return { ok: false, cancelled: false, message: "No key available for encrypted segment", attempts };
            }
            try {
              const plaintext = decryptSegment(result.data, key.keyBytes, ivForSegment(segment), segment.sequenceNumber);
              await fs.writeFile(path, plaintext);
            } catch (error) {
              if (!(error instanceof DecryptionError)) throw error;
              if (round < 2) {
                log.warn("Decryption failed, re-fetching segment", {
                  sequence: segment.sequenceNumber,
                  error: error.message,
                });
                continue;
              }
              return { ok: false, cancelled: false, message: error.message, attempts };
            }
          }

          return { ok: true, bytes: result.data.length, attempts };
        }
      } catch (error) {
        return { ok: false, cancelled: false, message: errorMessage(error), attempts };
      }
    }

    async function processSegment(segment: SegmentDescriptor): Promise<void> {
      const sequence = segment.sequenceNumber;

      if (signal?.aborted) {
        stopReason ??= "cancelled";
        return;
      }
      if (stopReason !== null || fatalErrors.length > 0) return;

      const failedBefore = (ledger.entry(sequence)?.failedRuns ?? 0) > 0;
      if (!ledger.claim(sequence)) return;

      const path = segmentPath(options.workingDir, sequence);
      const outcome = await fetchAndStore(segment, path);

      if (outcome.ok) {
        await ledger.complete(sequence, { attempts: outcome.attempts, bytes: outcome.bytes });
        completed.push(sequence);
        bytesDownloaded += outcome.bytes;
        progress?.record(outcome.bytes);
        log.debug("Segment downloaded", { sequence, bytes: outcome.bytes, attempts: outcome.attempts });
        return;
      }

      if (outcome.cancelled) {
        await ledger.release(sequence, outcome.attempts);
        stopReason ??= "cancelled";
        return;
      }

      // Never leave ciphertext behind for a failed segment
      await fs.remove(path);
      await ledger.fail(sequence, outcome.message, outcome.attempts);
      failed.push(sequence);
      if (failedBefore) repeatedFailures.push(sequence);
      progress?.recordFailure();

      log.warn(failedBefore ? "Segment failed again" : "Segment failed", {
        sequence,
        attempts: ledger.entry(sequence)?.attempts,
        error: outcome.message,
      });

      if (failed.length > failureThreshold && stopReason === null) {
        stopReason = "failure_threshold";
        log.error("Failure threshold exceeded, no new segments will be started", {
          failed: failed.length,
          threshold: failureThreshold,
        });
      }
    }

    const queue = manifest.segments.filter((segment) => {
      const status = ledger.entry(segment.sequenceNumber)?.status;
      return status === "pending" || status === "failed";
    });

    log.info("Starting segment downloads", {
      queued: queue.length,
      total: manifest.segments.length,
      concurrency,
    });

    const limit = pLimit(concurrency);
    await Promise.all(queue.map((segment) =>
      limit(async () => {
        try {
          await processSegment(segment);
        } catch (error) {
          if (fatalErrors.length === 0) {
            log.error("Cannot save download state, no new segments will be started", {
              sequence: segment.sequenceNumber,
              error: errorMessage(error),
            });
          }
          fatalErrors.push(error);
        }
      })
    ));
    if (fatalErrors.length > 0) {
      throw fatalErrors[0];
    }

    const byNumber = (a: number, b: number) => a - b;
    const pending = ledger
      .entries()
      .filter((e) => e.status === "pending")
      .map((e) => e.sequenceNumber);

    return {
      completed: completed.sort(byNumber),
      failed: failed.sort(byNumber),
      repeatedFailures: repeatedFailures.sort(byNumber),
      pending,
      bytesDownloaded,
      stopReason,
    };
  }

  return { downloadAll };
}
