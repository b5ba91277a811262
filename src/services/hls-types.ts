/**
 * Types shared across the HLS download pipeline.
 */

// ============================================================================
// Manifest
// ============================================================================

export type EncryptionMethod = "AES-128";

/**
 * Key tag found in the playlist (`#EXT-X-KEY`).
 */
export interface KeyReference {
  method: EncryptionMethod;
  /** Absolute key URI */
  uri: string;
  /** Explicit IV from the tag, if any */
  iv: Uint8Array | null;
}

/**
 * One media segment of the playlist. Frozen after parsing.
 */
export interface SegmentDescriptor {
  readonly sequenceNumber: number;
  /** Absolute segment URI */
  readonly uri: string;
  /** Duration from #EXTINF in seconds (0 if absent) */
  readonly duration: number;
  /** Whether an AES-128 key applies to this segment */
  readonly encrypted: boolean;
  /** Length from #EXT-X-BYTERANGE */
  readonly byteLength?: number;
  /** Offset from #EXT-X-BYTERANGE; when set the segment is a sub-range of `uri` */
  readonly byteOffset?: number;
  /** IV from the key tag; when absent the IV is derived from the sequence number */
  readonly explicitIV?: Uint8Array;
}

export interface Manifest {
  mediaSequence: number;
  targetDuration: number | null;
  /** Sum of segment durations in seconds */
  totalDuration: number;
  /** #EXT-X-ENDLIST seen */
  endList: boolean;
  key: KeyReference | null;
  segments: readonly SegmentDescriptor[];
}

/**
 * Resolved key material, shared read-only by all workers.
 */
export interface EncryptionKey {
  keyBytes: Uint8Array;
  keyURI: string;
}

// ============================================================================
// Fetching
// ============================================================================

export type FetchFailureReason = "timeout" | "network" | "http_status" | "cancelled";

/**
 * Terminal failure of a single fetch after the retry budget.
 */
export interface FetchError {
  /** Segment sequence number, or null for non-segment requests (key, playlist) */
  sequenceNumber: number | null;
  reason: FetchFailureReason;
  message: string;
  statusCode?: number;
  attempts: number;
}

export type FetchResult =
  | { ok: true; data: Uint8Array; attempts: number }
  | { ok: false; error: FetchError };

// ============================================================================
// Progress
// ============================================================================

export interface ProgressSample {
  bytesDownloaded: number;
  /** Known only when every segment declares a byte length */
  bytesTotal: number | null;
  segmentsDone: number;
  segmentsFailed: number;
  segmentsTotal: number;
  instantaneousRateBytesPerSec: number;
  elapsedMs: number;
}

export type ProgressCallback = (sample: ProgressSample) => void;

// ============================================================================
// Timing
// ============================================================================

/**
 * Delay function. Resolves early (without throwing) when `signal` aborts.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
