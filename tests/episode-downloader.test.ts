import { readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LEDGER_FILE_NAME, parseDownloadState } from "../src/db/resume-ledger.ts";
import {
  createEpisodeDownloader,
  knownTotalBytes,
  PLAYLIST_FILE_NAME,
  type DownloadEpisodeOptions,
} from "../src/services/episode-downloader.ts";
import { CancelledError, KeyFetchError, LedgerCorruptionError, ManifestParseError } from "../src/services/errors.ts";
import type { ProgressSample } from "../src/services/hls-types.ts";
import { parseManifest } from "../src/services/manifest-parser.ts";
import type { HttpFetcher } from "../src/services/segment-fetcher.ts";
import { segmentPath } from "../src/services/worker-pool.ts";
import {
  buildPlaylist,
  CIPHERTEXT_LENGTH,
  createFakeOrigin,
  createRecordingSleep,
  createTempDir,
  ORIGIN_BASE,
  removeTempDir,
  segmentPlaintext,
  type FakeOrigin,
} from "./helpers.ts";

let dir: string;

beforeEach(async () => {
  dir = await createTempDir("episode-test-");
});

afterEach(async () => {
  await removeTempDir(dir);
});

function downloaderFor(http: HttpFetcher) {
  return createEpisodeDownloader({ http, sleep: createRecordingSleep().sleep, random: () => 0 });
}

function optionsFor(origin: FakeOrigin, overrides: Partial<DownloadEpisodeOptions> = {}): DownloadEpisodeOptions {
  return {
    manifestSource: { url: origin.playlistUrl },
    workingDir: dir,
    episodeId: "show-ep1",
    ...overrides,
  };
}

async function readLedger() {
  const path = join(dir, LEDGER_FILE_NAME);
  return parseDownloadState(JSON.parse(await readFile(path, "utf8")), path);
}

async function segmentText(sequenceNumber: number): Promise<string> {
  return await readFile(segmentPath(dir, sequenceNumber), "utf8");
}

describe("knownTotalBytes", () => {
  it("should sum byte ranges only when every segment has one", () => {
    const ranged = parseManifest(
      "#EXTM3U\n#EXTINF:4,\n#EXT-X-BYTERANGE:100@0\na.ts\n#EXTINF:4,\n#EXT-X-BYTERANGE:50\na.ts\n",
      ORIGIN_BASE,
    );
    expect(knownTotalBytes(ranged)).toBe(150);
    expect(knownTotalBytes(parseManifest(buildPlaylist({ count: 2 }), ORIGIN_BASE))).toBeNull();
  });
});

describe("downloadEpisode", () => {
  it("should download, decrypt and order every segment", async () => {
    const origin = createFakeOrigin({ count: 4, mediaSequence: 100 });

    const result = await downloaderFor(origin.http).downloadEpisode(optionsFor(origin));

    expect(result).toEqual({
      ok: true,
      segmentPaths: [100, 101, 102, 103].map((seq) => segmentPath(dir, seq)),
      bytesDownloaded: 4 * CIPHERTEXT_LENGTH,
      alreadyComplete: false,
    });
    expect(await segmentText(102)).toBe(Buffer.from(segmentPlaintext(102)).toString());
    expect(await readFile(join(dir, PLAYLIST_FILE_NAME), "utf8")).toBe(origin.playlist);
    expect(origin.hits("key.bin")).toBe(1);

    const ledger = await readLedger();
    expect(ledger.episodeId).toBe("show-ep1");
    expect(ledger.manifestUri).toBe(origin.playlistUrl);
    expect(ledger.completedAt).not.toBeNull();
  });

  it("should return at once on a second run", async () => {
    const origin = createFakeOrigin({ count: 3 });
    await downloaderFor(origin.http).downloadEpisode(optionsFor(origin));
    const requestsAfterFirstRun = origin.requests.length;

    const result = await downloaderFor(origin.http).downloadEpisode(optionsFor(origin));

    expect(result).toEqual({
      ok: true,
      segmentPaths: [0, 1, 2].map((seq) => segmentPath(dir, seq)),
      bytesDownloaded: 0,
      alreadyComplete: true,
    });
    expect(origin.requests.length).toBe(requestsAfterFirstRun);
  });

  it("should send the configured headers with every request", async () => {
    const origin = createFakeOrigin({ count: 2 });

    await downloaderFor(origin.http).downloadEpisode(
      optionsFor(origin, { headers: { "User-Agent": "test-agent", "Referer": "https://player.example/" } }),
    );

    expect(origin.requests).toHaveLength(4);
    for (const request of origin.requests) {
      expect(request).toMatchObject({ userAgent: "test-agent", referer: "https://player.example/" });
    }
  });

  it("should use playlist text without fetching it", async () => {
    const origin = createFakeOrigin({ count: 2 });

    const result = await downloaderFor(origin.http).downloadEpisode(
      optionsFor(origin, { manifestSource: { text: origin.playlist, baseUrl: ORIGIN_BASE } }),
    );

    expect(result.ok).toBe(true);
    expect(origin.hits("playlist.m3u8")).toBe(0);
  });

  it("should use a key URI given in the options", async () => {
    const origin = createFakeOrigin({ count: 2 });
    const http: HttpFetcher = {
      fetch: (url, init) => origin.http.fetch(url.replace("alt-key", "key.bin"), init),
    };

    const result = await downloaderFor(http).downloadEpisode(
      optionsFor(origin, { keySource: `${ORIGIN_BASE}alt-key` }),
    );

    expect(result.ok).toBe(true);
    expect(origin.hits("key.bin")).toBe(1);
  });

  it("should report the progress of the run", async () => {
    const origin = createFakeOrigin({ count: 4 });
    const samples: ProgressSample[] = [];

    await downloaderFor(origin.http).downloadEpisode(
      optionsFor(origin, { onProgress: (sample) => samples.push(sample), progressIntervalMs: 0 }),
    );

    const last = samples[samples.length - 1];
    expect(last).toMatchObject({
      segmentsDone: 4,
      segmentsFailed: 0,
      segmentsTotal: 4,
      bytesDownloaded: 4 * CIPHERTEXT_LENGTH,
      bytesTotal: null,
    });
  });

  describe("partial downloads", () => {
    it("should return the failed segments and keep the rest", async () => {
      const origin = createFakeOrigin({ count: 4 });
      origin.failSegment(2, 500, 3);

      const result = await downloaderFor(origin.http).downloadEpisode(optionsFor(origin, { concurrency: 2 }));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failedSequences).toEqual([2]);
        expect(result.pendingSequences).toEqual([]);
        expect(result.repeatedFailures).toEqual([]);
        expect(result.completedPaths).toEqual([0, 1, 3].map((seq) => segmentPath(dir, seq)));
        expect(result.cancelled).toBe(false);
        expect(result.error.message).toBe("Download incomplete, 1 segment(s) failed: 2");
        expect(result.error.reason).toBe("failures");
      }
      const ledger = await readLedger();
      expect(ledger.entries[2]).toMatchObject({ status: "failed", attempts: 3 });
      expect(ledger.completedAt).toBeNull();
    });

    it("should fetch only the failed segment on the next run", async () => {
      const origin = createFakeOrigin({ count: 4 });
      origin.failSegment(2, 500, 3);
      await downloaderFor(origin.http).downloadEpisode(optionsFor(origin));

      const result = await downloaderFor(origin.http).downloadEpisode(optionsFor(origin));

      expect(result.ok).toBe(true);
      expect(origin.hits("seg-2.ts")).toBe(4);
      expect(origin.segmentHits()).toBe(3 + 4);
      expect((await readLedger()).entries[2]).toMatchObject({ status: "downloaded", attempts: 4 });
    });

    it("should refetch a segment left downloading by a crash", async () => {
      const origin = createFakeOrigin({ count: 3 });
      await downloaderFor(origin.http).downloadEpisode(optionsFor(origin));

      const ledgerPath = join(dir, LEDGER_FILE_NAME);
      const state = await readLedger();
      state.entries[1].status = "downloading";
      state.completedAt = null;
      await writeFile(ledgerPath, JSON.stringify(state));

      const result = await downloaderFor(origin.http).downloadEpisode(optionsFor(origin));

      expect(result.ok && result.alreadyComplete).toBe(false);
      expect(origin.hits("seg-1.ts")).toBe(2);
      expect(origin.segmentHits()).toBe(4);
    });

    it("should refetch only segment files that went missing", async () => {
      const origin = createFakeOrigin({ count: 5 });
      await downloaderFor(origin.http).downloadEpisode(optionsFor(origin));
      await rm(segmentPath(dir, 1));
      await rm(segmentPath(dir, 3));

      const result = await downloaderFor(origin.http).downloadEpisode(optionsFor(origin));

      expect(result.ok).toBe(true);
      expect(origin.segmentHits()).toBe(5 + 2);
      expect(await segmentText(3)).toBe(Buffer.from(segmentPlaintext(3)).toString());
    });
  });

  describe("cancellation", () => {
    it("should leave unstarted segments pending", async () => {
      const origin = createFakeOrigin({ count: 4 });
      const controller = new AbortController();
      const http: HttpFetcher = {
        fetch: (url, init) => {
          if (url.endsWith("seg-1.ts")) controller.abort();
          return origin.http.fetch(url, init);
        },
      };

      const result = await downloaderFor(http).downloadEpisode(
        optionsFor(origin, { concurrency: 1, signal: controller.signal }),
      );

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.cancelled).toBe(true);
        expect(result.pendingSequences).toEqual([2, 3]);
        expect(result.failedSequences).toEqual([]);
        expect(result.error.reason).toBe("cancelled");
        expect(result.error.message).toBe("Download cancelled with 2 segment(s) remaining, no segments failed");
      }
    });

    it("should throw when cancelled before the playlist is fetched", async () => {
      const origin = createFakeOrigin({ count: 2 });
      const controller = new AbortController();
      controller.abort();

      await expect(
        downloaderFor(origin.http).downloadEpisode(optionsFor(origin, { signal: controller.signal })),
      ).rejects.toBeInstanceOf(CancelledError);
      expect(origin.requests).toHaveLength(0);
    });
  });

  describe("fatal errors", () => {
    it("should raise ManifestParseError when the playlist cannot be fetched", async () => {
      const http: HttpFetcher = {
        fetch: async () => new Response("nope", { status: 404, statusText: "Not Found" }),
      };

      await expect(
        downloaderFor(http).downloadEpisode({ manifestSource: { url: `${ORIGIN_BASE}playlist.m3u8` }, workingDir: dir }),
      ).rejects.toThrow(new ManifestParseError("Failed to fetch playlist: HTTP 404: Not Found"));
    });

    it("should raise KeyFetchError and fetch no segments when the key is unavailable", async () => {
      const origin = createFakeOrigin({ count: 2 });
      origin.failKey(403);

      await expect(downloaderFor(origin.http).downloadEpisode(optionsFor(origin))).rejects.toBeInstanceOf(
        KeyFetchError,
      );
      expect(origin.segmentHits()).toBe(0);
    });

    it("should raise LedgerCorruptionError when the playlist no longer matches", async () => {
      const origin = createFakeOrigin({ count: 3 });
      await downloaderFor(origin.http).downloadEpisode(optionsFor(origin));

      await expect(
        downloaderFor(origin.http).downloadEpisode(
          optionsFor(origin, { manifestSource: { text: buildPlaylist({ count: 4 }), baseUrl: ORIGIN_BASE } }),
        ),
      ).rejects.toBeInstanceOf(LedgerCorruptionError);
    });

    it("should keep the cached playlist when a different one is rejected", async () => {
      const origin = createFakeOrigin({ count: 3 });
      await downloaderFor(origin.http).downloadEpisode(optionsFor(origin));

      await expect(
        downloaderFor(origin.http).downloadEpisode(
          optionsFor(origin, { manifestSource: { text: buildPlaylist({ count: 4 }), baseUrl: ORIGIN_BASE } }),
        ),
      ).rejects.toBeInstanceOf(LedgerCorruptionError);
      expect(await readFile(join(dir, PLAYLIST_FILE_NAME), "utf8")).toBe(origin.playlist);

      const result = await downloaderFor(origin.http).downloadEpisode(optionsFor(origin));

      expect(result).toMatchObject({ ok: true, alreadyComplete: true });
    });

    it("should not cache a playlist that fails to parse", async () => {
      const http: HttpFetcher = { fetch: async () => new Response("not a playlist") };

      await expect(
        downloaderFor(http).downloadEpisode({ manifestSource: { url: `${ORIGIN_BASE}playlist.m3u8` }, workingDir: dir }),
      ).rejects.toBeInstanceOf(ManifestParseError);
      await expect(readFile(join(dir, PLAYLIST_FILE_NAME))).rejects.toThrow();
    });
  });
});
