/**
 * Persisted download state types.
 */

// ============================================================================
// Resume Ledger Types
// ============================================================================

/**
 * Segment status in the ledger.
 * `downloading` is never trusted after a restart and is read back as `pending`.
 */
export type SegmentStatus = "pending" | "downloading" | "downloaded" | "failed";

export const SEGMENT_STATUSES: readonly SegmentStatus[] = [
  "pending",
  "downloading",
  "downloaded",
  "failed",
];

/**
 * Per-segment ledger entry.
 */
export interface ResumeEntry {
  sequenceNumber: number;
  status: SegmentStatus;
  /** HTTP attempts across all runs */
  attempts: number;
  lastError: string | null;
  /** Bytes fetched for the segment (set once downloaded) */
  bytes: number | null;
  /** Runs in which this segment ended as failed */
  failedRuns: number;
}

/**
 * Ledger snapshot stored in the episode working directory.
 */
export interface DownloadState {
  version: 1;
  episodeId: string;
  manifestUri: string | null;
  mediaSequence: number;
  segmentCount: number;
  createdAt: string;
  updatedAt: string;
  /** Set once every segment is downloaded */
  completedAt: string | null;
  entries: ResumeEntry[];
}

/**
 * Identity of the download a ledger belongs to. A ledger on disk must match
 * it exactly to be reused.
 */
export interface LedgerInit {
  episodeId: string;
  manifestUri: string | null;
  mediaSequence: number;
  segmentCount: number;
}
