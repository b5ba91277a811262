/**
 * Crash-safe record of per-segment progress.
 *
 * Design:
 * - Pure functions for creating, validating and recovering state (testable)
 * - In-memory transitions are synchronous, so a claim can never be won twice
 * - Snapshots are written one at a time to a temp file, then renamed over
 *   the ledger, so a crash mid-write leaves the previous snapshot intact
 */

import { errorMessage, silentLogger, type Logger } from "../logger.ts";
import { LedgerCorruptionError } from "../services/errors.ts";
import { defaultFileSystem, type FileSystem } from "../services/file-system.ts";
import {
  SEGMENT_STATUSES,
  type DownloadState,
  type LedgerInit,
  type ResumeEntry,
  type SegmentStatus,
} from "./types.ts";

export const LEDGER_FILE_NAME = "download-state.json";

// ============================================================================
// Types
// ============================================================================

export interface ResumeLedgerDeps {
  fs?: FileSystem;
  logger?: Logger;
  now?: () => Date;
}

export interface ResumeLedger {
  readonly path: string;
  /** Sequences found `downloading` on load and reset to `pending` */
  readonly recoveredSequences: readonly number[];
  /** Atomically move a pending or failed entry to downloading. */
  claim(sequenceNumber: number): boolean;
  complete(sequenceNumber: number, result: { attempts: number; bytes: number }): Promise<void>;
  fail(sequenceNumber: number, error: string, attempts: number): Promise<void>;
  /** Return a claimed entry to pending (cancelled before finishing). */
  release(sequenceNumber: number, attempts: number): Promise<void>;
  /** Reset a downloaded entry whose file has gone missing. */
  requeue(sequenceNumber: number): Promise<void>;
  markComplete(): Promise<void>;
  entry(sequenceNumber: number): Readonly<ResumeEntry> | undefined;
  entries(): ResumeEntry[];
  snapshot(): DownloadState;
  isComplete(): boolean;
  /** Wait for queued writes. */
  flush(): Promise<void>;
}

// ============================================================================
// Pure Functions
// ============================================================================

/**
 * Create the state for a download that has never run.
 */
export function createFreshState(init: LedgerInit, now: Date): DownloadState {
  const timestamp = now.toISOString();
  const entries: ResumeEntry[] = [];
  for (let i = 0; i < init.segmentCount; i++) {
    entries.push({
      sequenceNumber: init.mediaSequence + i,
      status: "pending",
      attempts: 0,
      lastError: null,
      bytes: null,
      failedRuns: 0,
    });
  }

  return {
    version: 1,
    episodeId: init.episodeId,
    manifestUri: init.manifestUri,
    mediaSequence: init.mediaSequence,
    segmentCount: init.segmentCount,
    createdAt: timestamp,
    updatedAt: timestamp,
    completedAt: null,
    entries,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function isStatus(value: unknown): value is SegmentStatus {
  return typeof value === "string" && (SEGMENT_STATUSES as readonly string[]).includes(value);
}

function isStringOrNull(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

function isCountOrNull(value: unknown): value is number | null {
  return value === null || isNonNegativeInteger(value);
}

function parseEntry(raw: unknown, expectedSequence: number, path: string): ResumeEntry {
  if (!isRecord(raw)) {
    throw new LedgerCorruptionError(`Entry for segment ${expectedSequence} is not an object`, path);
  }

  const { sequenceNumber, status, attempts, lastError, bytes, failedRuns } = raw;
  if (!isNonNegativeInteger(sequenceNumber) || sequenceNumber !== expectedSequence) {
    throw new LedgerCorruptionError(
      `Expected entry for segment ${expectedSequence}, found ${String(sequenceNumber)}`,
      path,
    );
  }
  if (!isStatus(status)) {
    throw new LedgerCorruptionError(`Segment ${expectedSequence} has invalid status`, path);
  }
  if (!isNonNegativeInteger(attempts) || !isNonNegativeInteger(failedRuns)) {
    throw new LedgerCorruptionError(`Segment ${expectedSequence} has invalid counters`, path);
  }
  if (!isStringOrNull(lastError)) {
    throw new LedgerCorruptionError(`Segment ${expectedSequence} has invalid lastError`, path);
  }
  if (!isCountOrNull(bytes)) {
    throw new LedgerCorruptionError(`Segment ${expectedSequence} has invalid byte count`, path);
  }

  return { sequenceNumber, status, attempts, lastError, bytes, failedRuns };
}

/**
 * Validate a parsed ledger file.
 * @throws LedgerCorruptionError when any field is missing or inconsistent
 */
export function parseDownloadState(raw: unknown, path: string): DownloadState {
  if (!isRecord(raw)) {
    throw new LedgerCorruptionError("Download state is not an object", path);
  }
  if (raw.version !== 1) {
    throw new LedgerCorruptionError(`Unsupported download state version ${String(raw.version)}`, path);
  }

  const { episodeId, manifestUri, mediaSequence, segmentCount, createdAt, updatedAt, completedAt, entries } = raw;
  if (typeof episodeId !== "string" || !isStringOrNull(manifestUri)) {
    throw new LedgerCorruptionError("Download state has invalid identity fields", path);
  }
  if (!isNonNegativeInteger(mediaSequence) || !isNonNegativeInteger(segmentCount) || segmentCount === 0) {
    throw new LedgerCorruptionError("Download state has invalid segment counts", path);
  }
  if (typeof createdAt !== "string" || typeof updatedAt !== "string" || !isStringOrNull(completedAt)) {
    throw new LedgerCorruptionError("Download state has invalid timestamps", path);
  }
  if (!Array.isArray(entries) || entries.length !== segmentCount) {
    throw new LedgerCorruptionError(
      `Download state lists ${Array.isArray(entries) ? entries.length : 0} entries, expected ${segmentCount}`,
      path,
    );
  }

  const parsedEntries = entries.map((entry: unknown, i) => parseEntry(entry, mediaSequence + i, path));

  if (completedAt !== null && parsedEntries.some((e) => e.status !== "downloaded")) {
    throw new LedgerCorruptionError("Download state is marked complete but has unfinished segments", path);
  }

  return {
    version: 1,
    episodeId,
    manifestUri,
    mediaSequence,
    segmentCount,
    createdAt,
    updatedAt,
    completedAt,
    entries: parsedEntries,
  };
}

/**
 * Ensure a stored ledger belongs to the download being started.
 * @throws LedgerCorruptionError on mismatch
 */
export function checkConsistency(state: DownloadState, init: LedgerInit, path: string): void {
  if (state.episodeId !== init.episodeId) {
    throw new LedgerCorruptionError(
      `Download state belongs to episode "${state.episodeId}", not "${init.episodeId}"`,
      path,
    );
  }
  if (state.mediaSequence !== init.mediaSequence || state.segmentCount !== init.segmentCount) {
    throw new LedgerCorruptionError(
      `Download state covers segments ${state.mediaSequence}+${state.segmentCount}, ` +
        `playlist has ${init.mediaSequence}+${init.segmentCount}`,
      path,
    );
  }
}

/**
 * Reset entries interrupted mid-download. Mutates `state`.
 * @returns sequence numbers that were reset
 */
export function recoverInterrupted(state: DownloadState): number[] {
  const recovered: number[] = [];
  for (const entry of state.entries) {
    if (entry.status === "downloading") {
      entry.status = "pending";
      recovered.push(entry.sequenceNumber);
    }
  }
  return recovered;
}

function cloneState(state: DownloadState): DownloadState {
  return { ...state, entries: state.entries.map((e) => ({ ...e })) };
}

// ============================================================================
// Resume Ledger
// ============================================================================

/**
 * Load the ledger at `path`, or create a fresh one when none exists.
 *
 * @throws LedgerCorruptionError when an existing file cannot be read, parsed
 *   or does not match `init`
 */
export async function loadResumeLedger(
  path: string,
  init: LedgerInit,
  deps: ResumeLedgerDeps = {},
): Promise<ResumeLedger> {
  const fs = deps.fs ?? defaultFileSystem;
  const log = deps.logger ?? silentLogger;
  const now = deps.now ?? (() => new Date());
  const tempPath = `${path}.tmp`;

  let state: DownloadState;
  let recovered: number[] = [];
  let needsWrite = false;

  if (await fs.exists(path)) {
    let text: string;
    try {
      text = await fs.readTextFile(path);
    } catch (error) {
      throw new LedgerCorruptionError(`Cannot read download state (${errorMessage(error)})`, path);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      throw new LedgerCorruptionError("Download state is not valid JSON", path);
    }

    state = parseDownloadState(raw, path);
    checkConsistency(state, init, path);
    recovered = recoverInterrupted(state);
    needsWrite = recovered.length > 0;

    const done = state.entries.filter((e) => e.status === "downloaded").length;
    log.info("Loaded download state", {
      path,
      downloaded: done,
      total: state.segmentCount,
      recovered: recovered.length,
    });
  } else {
    state = createFreshState(init, now());
    needsWrite = true;
    log.debug("Created download state", { path, segments: state.segmentCount });
  }

  const byIndex = (sequenceNumber: number) => sequenceNumber - state.mediaSequence;
  let writeChain: Promise<void> = Promise.resolve();

  async function writeSnapshot(): Promise<void> {
    state.updatedAt = now().toISOString();
    await fs.writeFile(tempPath, JSON.stringify(state, null, 2));
    await fs.rename(tempPath, path);
  }

  /**
   * Queue a snapshot write behind any write already in flight.
   */
  function persist(): Promise<void> {
    const run = writeChain.then(writeSnapshot);
    // A failed write is reported to its caller; the chain itself keeps going
    writeChain = run.catch((error) => {
      log.error("Failed to write download state", { path, error: errorMessage(error) });
    });
    return run;
  }

  function requireEntry(sequenceNumber: number): ResumeEntry {
    const entry = state.entries[byIndex(sequenceNumber)];
    if (!entry) {
      throw new RangeError(`Segment ${sequenceNumber} is not part of this download`);
    }
    return entry;
  }

  function requireStatus(entry: ResumeEntry, expected: SegmentStatus, action: string): void {
    if (entry.status !== expected) {
      throw new Error(
        `Cannot ${action} segment ${entry.sequenceNumber}: status is ${entry.status}, expected ${expected}`,
      );
    }
  }

  if (needsWrite) {
    await persist();
  }

  return {
    path,
    recoveredSequences: recovered,

    claim(sequenceNumber) {
      const entry = requireEntry(sequenceNumber);
      if (entry.status !== "pending" && entry.status !== "failed") {
        return false;
      }
      entry.status = "downloading";
      return true;
    },

    complete(sequenceNumber, result) {
      const entry = requireEntry(sequenceNumber);
      requireStatus(entry, "downloading", "complete");
      entry.status = "downloaded";
      entry.attempts += result.attempts;
      entry.bytes = result.bytes;
      entry.lastError = null;
      return persist();
    },

    fail(sequenceNumber, error, attempts) {
      const entry = requireEntry(sequenceNumber);
      requireStatus(entry, "downloading", "fail");
      entry.status = "failed";
      entry.attempts += attempts;
      entry.lastError = error;
      entry.failedRuns++;
      return persist();
    },

    release(sequenceNumber, attempts) {
      const entry = requireEntry(sequenceNumber);
      requireStatus(entry, "downloading", "release");
      entry.status = "pending";
      entry.attempts += attempts;
      return persist();
    },

    requeue(sequenceNumber) {
      const entry = requireEntry(sequenceNumber);
      requireStatus(entry, "downloaded", "requeue");
      entry.status = "pending";
      entry.bytes = null;
      state.completedAt = null;
      return persist();
    },

    markComplete() {
      const unfinished = state.entries.find((e) => e.status !== "downloaded");
      if (unfinished) {
        return Promise.reject(
          new Error(`Cannot mark complete: segment ${unfinished.sequenceNumber} is ${unfinished.status}`),
        );
      }
      state.completedAt ??= now().toISOString();
      return persist();
    },

    entry: (sequenceNumber) => {
      const entry = state.entries[byIndex(sequenceNumber)];
      return entry ? { ...entry } : undefined;
    },
    entries: () => state.entries.map((e) => ({ ...e })),
    snapshot: () => cloneState(state),
    isComplete: () => state.completedAt !== null,
    flush: () => writeChain,
  };
}
