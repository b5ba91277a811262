/**
 * Progress aggregation for a segment download.
 *
 * Workers report byte deltas as segments finish (in any order); callers read
 * a sample at any time or receive pushed samples at a bounded rate.
 */

import type { ProgressCallback, ProgressSample } from "./hls-types.ts";

// ============================================================================
// Speed Tracker
// ============================================================================

/**
 * Tracks download speed using a rolling window of samples.
 */
export class SpeedTracker {
  private samples: { time: number; bytes: number }[] = [];
  private readonly windowMs: number;

  constructor(windowMs: number) {
    this.windowMs = windowMs;
  }

  /**
   * Add a sample with the current cumulative bytes downloaded.
   */
  addSample(time: number, totalBytes: number): void {
    this.samples.push({ time, bytes: totalBytes });

    // Keep one sample older than the window as the baseline
    const cutoff = time - this.windowMs;
    while (this.samples.length > 2 && this.samples[1].time <= cutoff) {
      this.samples.shift();
    }
  }

  /**
   * Average speed in bytes/sec across the window, 0 until two samples exist.
   */
  getCurrentSpeed(): number {
    if (this.samples.length < 2) return 0;

    const oldest = this.samples[0];
    const newest = this.samples[this.samples.length - 1];
    const elapsedMs = newest.time - oldest.time;
    if (elapsedMs <= 0) return 0;

    return ((newest.bytes - oldest.bytes) / elapsedMs) * 1000;
  }
}

// ============================================================================
// Aggregator
// ============================================================================

export interface ProgressAggregatorOptions {
  segmentsTotal: number;
  bytesTotal?: number | null;
  /** Segments already downloaded by an earlier run */
  segmentsAlreadyDone?: number;
  /** Bytes already downloaded by an earlier run */
  bytesAlreadyDone?: number;
  onProgress?: ProgressCallback;
  /** Minimum time between pushed samples (default 500ms) */
  intervalMs?: number;
  /** Rolling window for the instantaneous rate (default 3000ms) */
  rateWindowMs?: number;
  now?: () => number;
}

export interface ProgressAggregator {
  /** A segment finished with `bytes` fetched. */
  record(bytes: number): void;
  /** A segment failed terminally. */
  recordFailure(): void;
  sample(): ProgressSample;
  /** Push the current sample regardless of the interval. */
  flush(): void;
}

export const DEFAULT_PROGRESS_INTERVAL_MS = 500;

export function createProgressAggregator(options: ProgressAggregatorOptions): ProgressAggregator {
  const now = options.now ?? Date.now;
  const intervalMs = options.intervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS;
  const startedAt = now();
  const speed = new SpeedTracker(options.rateWindowMs ?? 3000);

  let bytesDownloaded = options.bytesAlreadyDone ?? 0;
  let segmentsDone = options.segmentsAlreadyDone ?? 0;
  let segmentsFailed = 0;
  let lastEmit: number | null = null;

  speed.addSample(startedAt, bytesDownloaded);

  function sample(): ProgressSample {
    return {
      bytesDownloaded,
      bytesTotal: options.bytesTotal ?? null,
      segmentsDone,
      segmentsFailed,
      segmentsTotal: options.segmentsTotal,
      instantaneousRateBytesPerSec: speed.getCurrentSpeed(),
      elapsedMs: now() - startedAt,
    };
  }

  function emit(force: boolean): void {
    if (!options.onProgress) return;
    const current = now();
    if (!force && lastEmit !== null && current - lastEmit < intervalMs) return;
    lastEmit = current;
    options.onProgress(sample());
  }

  return {
    record(bytes) {
      bytesDownloaded += bytes;
      segmentsDone++;
      speed.addSample(now(), bytesDownloaded);
      emit(false);
    },
    recordFailure() {
      segmentsFailed++;
      emit(false);
    },
    sample,
    flush: () => emit(true),
  };
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format bytes to human readable string.
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1) return "0 B";
  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB", "TB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(1)) + " " + sizes[i];
}

/**
 * Format speed (bytes per second).
 */
export function formatSpeed(bytesPerSec: number): string {
  return formatBytes(bytesPerSec) + "/s";
}

/**
 * One-line summary of a progress sample, e.g.
 * `12/40 segments, 1 failed, 18.2 MB, 2.1 MB/s`.
 */
export function describeProgress(sample: ProgressSample): string {
  const failed = sample.segmentsFailed > 0 ? `, ${sample.segmentsFailed} failed` : "";
  const bytes = sample.bytesTotal !== null
    ? `${formatBytes(sample.bytesDownloaded)} of ${formatBytes(sample.bytesTotal)}`
    : formatBytes(sample.bytesDownloaded);
  return `${sample.segmentsDone}/${sample.segmentsTotal} segments${failed}, ${bytes}, ` +
    formatSpeed(sample.instantaneousRateBytesPerSec);
}
