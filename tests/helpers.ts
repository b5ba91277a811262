/**
 * Shared test fixtures: an in-process HLS origin served by Hono, and
 * temporary working directories.
 */

import { createCipheriv } from "node:crypto";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Hono } from "hono";
import { sequenceNumberToIV } from "../src/services/manifest-parser.ts";
import type { HttpFetcher } from "../src/services/segment-fetcher.ts";

export const ORIGIN_BASE = "http://origin.test/ep/";
export const TEST_KEY = Uint8Array.from([
  0x00, 0x11, 0x22, 0x33, 0x44, 0x55, 0x66, 0x77,
  0x88, 0x99, 0xaa, 0xbb, 0xcc, 0xdd, 0xee, 0xff,
]);

/** Every fixture segment is 40 bytes of plaintext, 48 once encrypted. */
export const PLAINTEXT_LENGTH = 40;
export const CIPHERTEXT_LENGTH = 48;

// ============================================================================
// Fixture Builders
// ============================================================================

export function encryptSegment(plaintext: Uint8Array, key: Uint8Array, iv: Uint8Array): Uint8Array {
  const cipher = createCipheriv("aes-128-cbc", key, iv);
  return Buffer.concat([cipher.update(plaintext), cipher.final()]);
}

export function segmentPlaintext(sequenceNumber: number): Uint8Array {
  return Buffer.from(`segment-${String(sequenceNumber).padStart(4, "0")}`.padEnd(PLAINTEXT_LENGTH, "#"));
}

export interface PlaylistOptions {
  count: number;
  mediaSequence?: number;
  encrypted?: boolean;
}

export function buildPlaylist(options: PlaylistOptions): string {
  const mediaSequence = options.mediaSequence ?? 0;
  const lines = [
    "#EXTM3U",
    "#EXT-X-VERSION:3",
    "#EXT-X-TARGETDURATION:10",
    `#EXT-X-MEDIA-SEQUENCE:${mediaSequence}`,
  ];
  if (options.encrypted ?? true) {
    lines.push('#EXT-X-KEY:METHOD=AES-128,URI="key.bin"');
  }
  for (let i = 0; i < options.count; i++) {
    lines.push("#EXTINF:10.0,", `seg-${mediaSequence + i}.ts`);
  }
  lines.push("#EXT-X-ENDLIST", "");
  return lines.join("\n");
}

// ============================================================================
// Fake Origin
// ============================================================================

interface Fault {
  kind: "status" | "truncate";
  status: number;
  remaining: number;
}

export interface RecordedRequest {
  file: string;
  userAgent: string | undefined;
  referer: string | undefined;
}

export interface FakeOrigin {
  http: HttpFetcher;
  playlistUrl: string;
  keyUrl: string;
  playlist: string;
  requests: RecordedRequest[];
  /** Requests made for one file, e.g. `seg-3.ts` */
  hits(file: string): number;
  /** Requests made for any segment */
  segmentHits(): number;
  /** Answer `status` for the next `times` requests of a segment */
  failSegment(sequenceNumber: number, status: number, times?: number): void;
  /** Drop the last byte of the next `times` responses of a segment */
  truncateSegment(sequenceNumber: number, times?: number): void;
  failKey(status: number, times?: number): void;
}

export function createFakeOrigin(options: PlaylistOptions): FakeOrigin {
  const encrypted = options.encrypted ?? true;
  const playlist = buildPlaylist(options);
  const faults = new Map<string, Fault>();
  const requests: RecordedRequest[] = [];

  function segmentBody(sequenceNumber: number): Uint8Array {
    const plaintext = segmentPlaintext(sequenceNumber);
    return encrypted ? encryptSegment(plaintext, TEST_KEY, sequenceNumberToIV(sequenceNumber)) : plaintext;
  }

  function takeFault(file: string): Fault | null {
    const fault = faults.get(file);
    if (!fault || fault.remaining <= 0) return null;
    fault.remaining--;
    return fault;
  }

  const app = new Hono();

  app.get("/ep/:file", (c) => {
    const file = c.req.param("file");
    requests.push({ file, userAgent: c.req.header("User-Agent"), referer: c.req.header("Referer") });

    const fault = takeFault(file);
    if (fault?.kind === "status") {
      return new Response("fault", { status: fault.status });
    }

    if (file === "playlist.m3u8") {
      return new Response(playlist, { headers: { "Content-Type": "application/vnd.apple.mpegurl" } });
    }
    if (file === "key.bin") {
      return new Response(TEST_KEY);
    }

    const match = /^seg-(\d+)\.ts$/.exec(file);
    if (!match) {
      return new Response("Not Found", { status: 404 });
    }
    const body = segmentBody(Number(match[1]));
    return new Response(fault?.kind === "truncate" ? body.subarray(0, body.length - 1) : body);
  });

  const hits = (file: string) => requests.filter((r) => r.file === file).length;

  return {
    http: { fetch: async (url, init) => app.request(url, init) },
    playlistUrl: `${ORIGIN_BASE}playlist.m3u8`,
    keyUrl: `${ORIGIN_BASE}key.bin`,
    playlist,
    requests,
    hits,
    segmentHits: () => requests.filter((r) => r.file.startsWith("seg-")).length,
    failSegment(sequenceNumber, status, times = Infinity) {
      faults.set(`seg-${sequenceNumber}.ts`, { kind: "status", status, remaining: times });
    },
    truncateSegment(sequenceNumber, times = Infinity) {
      faults.set(`seg-${sequenceNumber}.ts`, { kind: "truncate", status: 200, remaining: times });
    },
    failKey(status, times = Infinity) {
      faults.set("key.bin", { kind: "status", status, remaining: times });
    },
  };
}

// ============================================================================
// Temporary Directories
// ============================================================================

export async function createTempDir(prefix = "hls-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/** Sleep that returns at once and records the requested delays. */
export function createRecordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
