/**
 * Episode downloader: turns one HLS media playlist into ordered, decrypted
 * segment files in a working directory.
 *
 * Design:
 * - All collaborators (HTTP, file system, clock, sleep) are injected
 * - Fatal problems (playlist, key, ledger) throw typed errors
 * - Segment failures come back as a partial result, never as a throw
 * - Re-running against the same directory resumes from the ledger
 */

import { basename, join } from "node:path";
import { silentLogger, type Logger } from "../logger.ts";
import { LEDGER_FILE_NAME, loadResumeLedger, type ResumeLedger } from "../db/resume-ledger.ts";
import { CancelledError, KeyFetchError, ManifestParseError, PartialDownloadError, type PartialReason } from "./errors.ts";
import { defaultFileSystem, type FileSystem } from "./file-system.ts";
import { defaultSleep, type EncryptionKey, type Manifest, type ProgressCallback, type Sleep } from "./hls-types.ts";
import { createKeyResolver } from "./key-resolver.ts";
import { parseManifest } from "./manifest-parser.ts";
import { createProgressAggregator } from "./progress-aggregator.ts";
import { createRateLimiter, UNLIMITED, type RateLimiterConfig } from "./rate-limiter.ts";
import { createRetryPolicy, type RetryPolicyOptions } from "./retry-policy.ts";
import { createRetryingFetcher, type HttpFetcher, type RetryingFetcher } from "./segment-fetcher.ts";
import { createSegmentWorkerPool, segmentPath } from "./worker-pool.ts";

// ============================================================================
// Types
// ============================================================================

export const PLAYLIST_FILE_NAME = "playlist.m3u8";

export type ManifestSource =
  | { url: string }
  | { text: string; baseUrl?: string };

export interface DownloadEpisodeOptions {
  manifestSource: ManifestSource;
  /** Key URI overriding the one in the playlist */
  keySource?: string;
  workingDir: string;
  /** Defaults to the working directory's name */
  episodeId?: string;
  concurrency?: number;
  rateLimit?: RateLimiterConfig;
  retry?: Partial<RetryPolicyOptions>;
  requestTimeoutMs?: number;
  failureThreshold?: number;
  /** Sent with every request (User-Agent, Referer, ...) */
  headers?: Record<string, string>;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
  progressIntervalMs?: number;
}

export type DownloadResult =
  | {
    ok: true;
    /** Decrypted segment files in sequence order */
    segmentPaths: string[];
    /** Bytes fetched by this run */
    bytesDownloaded: number;
    /** Nothing was fetched: the directory already held the full episode */
    alreadyComplete: boolean;
  }
  | {
    ok: false;
    error: PartialDownloadError;
    failedSequences: number[];
    pendingSequences: number[];
    /** Segments that have now failed in more than one run */
    repeatedFailures: number[];
    completedPaths: string[];
    cancelled: boolean;
  };

interface LoadedManifest {
  manifest: Manifest;
  manifestUri: string | null;
  text: string;
  fromCache: boolean;
}

export interface EpisodeDownloaderDeps {
  http?: HttpFetcher;
  fs?: FileSystem;
  logger?: Logger;
  sleep?: Sleep;
  random?: () => number;
  now?: () => number;
}

// ============================================================================
// Helpers (pure)
// ============================================================================

/**
 * Sum of segment sizes, when every segment declares one.
 */
export function knownTotalBytes(manifest: Manifest): number | null {
  let total = 0;
  for (const segment of manifest.segments) {
    if (segment.byteLength === undefined) return null;
    total += segment.byteLength;
  }
  return total;
}

function sequencesWithStatus(ledger: ResumeLedger, status: "pending" | "failed" | "downloaded"): number[] {
  return ledger
    .entries()
    .filter((e) => e.status === status)
    .map((e) => e.sequenceNumber);
}

// ============================================================================
// Episode Downloader
// ============================================================================

export function createEpisodeDownloader(deps: EpisodeDownloaderDeps = {}) {
  const fs = deps.fs ?? defaultFileSystem;
  const log = deps.logger ?? silentLogger;
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? Date.now;

  /**
   * Read the cached playlist, or obtain it from the source.
   * The caller writes the cache once the download state has accepted it.
   */
  async function loadManifest(
    source: ManifestSource,
    cachePath: string,
    fetcher: RetryingFetcher,
    signal?: AbortSignal,
  ): Promise<LoadedManifest> {
    if ("text" in source) {
      return {
        manifest: parseManifest(source.text, source.baseUrl),
        manifestUri: source.baseUrl ?? null,
        text: source.text,
        fromCache: false,
      };
    }

    if (await fs.exists(cachePath)) {
      log.info("Using cached playlist", { path: cachePath });
      const text = await fs.readTextFile(cachePath);
      return { manifest: parseManifest(text, source.url), manifestUri: source.url, text, fromCache: true };
    }

    log.info("Fetching playlist", { url: source.url });
    const result = await fetcher.fetchBytes(source.url, { signal });
    if (!result.ok) {
      if (result.error.reason === "cancelled") throw new CancelledError();
      throw new ManifestParseError(`Failed to fetch playlist: ${result.error.message}`);
    }

    const text = new TextDecoder().decode(result.data);
    return { manifest: parseManifest(text, source.url), manifestUri: source.url, text, fromCache: false };
  }

  /**
   * Reset downloaded entries whose segment file is gone.
   * @returns number of entries requeued
   */
  async function requeueMissing(ledger: ResumeLedger, workingDir: string): Promise<number> {
    let requeued = 0;
    for (const sequence of sequencesWithStatus(ledger, "downloaded")) {
      if (!(await fs.exists(segmentPath(workingDir, sequence)))) {
        await ledger.requeue(sequence);
        requeued++;
      }
    }
    return requeued;
  }

  async function downloadEpisode(options: DownloadEpisodeOptions): Promise<DownloadResult> {
    const { workingDir, signal } = options;
    const episodeId = options.episodeId ?? basename(workingDir);
    const episodeLog = log.child(episodeId);

    const fetcher = createRetryingFetcher({
      http: deps.http,
      limiter: createRateLimiter(options.rateLimit ?? UNLIMITED, now),
      policy: createRetryPolicy(options.retry, deps.random),
      timeoutMs: options.requestTimeoutMs,
      headers: options.headers,
      sleep,
      logger: episodeLog.child("fetch"),
    });

    await fs.mkdir(workingDir, { recursive: true });

    // 1. Playlist
    const cachePath = join(workingDir, PLAYLIST_FILE_NAME);
    const loaded = await loadManifest(options.manifestSource, cachePath, fetcher, signal);
    const { manifest, manifestUri } = loaded;
    episodeLog.info("Playlist loaded", {
      segments: manifest.segments.length,
      mediaSequence: manifest.mediaSequence,
      encrypted: manifest.key !== null,
      totalDuration: Math.round(manifest.totalDuration),
    });

    // 2. Ledger
    const ledger = await loadResumeLedger(
      join(workingDir, LEDGER_FILE_NAME),
      {
        episodeId,
        manifestUri,
        mediaSequence: manifest.mediaSequence,
        segmentCount: manifest.segments.length,
      },
      { fs, logger: episodeLog.child("ledger"), now: () => new Date(now()) },
    );
    // Only a playlist the download state accepted may replace the cache
    if (!loaded.fromCache) {
      await fs.writeFile(cachePath, loaded.text);
    }
    if (ledger.recoveredSequences.length > 0) {
      episodeLog.warn("Recovered interrupted segments", { sequences: ledger.recoveredSequences });
    }

    const wasComplete = ledger.isComplete();
    const requeued = await requeueMissing(ledger, workingDir);
    if (wasComplete && requeued === 0) {
      episodeLog.info("Episode already downloaded");
      return {
        ok: true,
        segmentPaths: manifest.segments.map((s) => segmentPath(workingDir, s.sequenceNumber)),
        bytesDownloaded: 0,
        alreadyComplete: true,
      };
    }
    if (requeued > 0) {
      episodeLog.warn("Segment files missing, downloading again", { count: requeued });
    }

    // 3. Key, only when an encrypted segment still has to be fetched
    const needsKey = manifest.segments.some(
      (s) => s.encrypted && ledger.entry(s.sequenceNumber)?.status !== "downloaded",
    );
    let key: EncryptionKey | null = null;
    if (needsKey) {
      const keyUri = options.keySource ?? manifest.key?.uri;
      if (!keyUri) {
        throw new KeyFetchError("Playlist has encrypted segments but no key URI", "");
      }
      try {
        key = await createKeyResolver(fetcher).resolve(keyUri, signal);
      } catch (error) {
        if (signal?.aborted) throw new CancelledError();
        throw error;
      }
      episodeLog.debug("Decryption key resolved", { uri: keyUri });
    }

    // 4. Segments
    const alreadyDone = ledger.entries().filter((e) => e.status === "downloaded");
    const progress = createProgressAggregator({
      segmentsTotal: manifest.segments.length,
      bytesTotal: knownTotalBytes(manifest),
      segmentsAlreadyDone: alreadyDone.length,
      bytesAlreadyDone: alreadyDone.reduce((sum, e) => sum + (e.bytes ?? 0), 0),
      onProgress: options.onProgress,
      intervalMs: options.progressIntervalMs,
      now,
    });

    const pool = createSegmentWorkerPool(
      { ledger, fetcher, progress, fs, logger: episodeLog.child("pool") },
      {
        workingDir,
        concurrency: options.concurrency,
        failureThreshold: options.failureThreshold,
      },
    );

    const outcome = await pool.downloadAll(manifest, key, signal);
    progress.flush();

    const failedSequences = sequencesWithStatus(ledger, "failed");
    const pendingSequences = sequencesWithStatus(ledger, "pending");

    if (failedSequences.length === 0 && pendingSequences.length === 0) {
      await ledger.markComplete();
      episodeLog.info("Episode downloaded", {
        segments: manifest.segments.length,
        bytes: outcome.bytesDownloaded,
      });
      return {
        ok: true,
        segmentPaths: manifest.segments.map((s) => segmentPath(workingDir, s.sequenceNumber)),
        bytesDownloaded: outcome.bytesDownloaded,
        alreadyComplete: false,
      };
    }

    const cancelled = outcome.stopReason === "cancelled" || signal?.aborted === true;
    const reason: PartialReason = cancelled ? "cancelled" : outcome.stopReason ?? "failures";
    const error = new PartialDownloadError(failedSequences, pendingSequences, reason);
    episodeLog.warn(error.message, {
      failed: failedSequences.length,
      pending: pendingSequences.length,
      repeatedFailures: outcome.repeatedFailures,
    });

    return {
      ok: false,
      error,
      failedSequences,
      pendingSequences,
      repeatedFailures: outcome.repeatedFailures,
      completedPaths: sequencesWithStatus(ledger, "downloaded").map((seq) => segmentPath(workingDir, seq)),
      cancelled,
    };
  }

  return { downloadEpisode };
}

export type EpisodeDownloader = ReturnType<typeof createEpisodeDownloader>;
