import { describe, expect, it } from "vitest";
import { CancelledError } from "../src/services/errors.ts";
import type { SegmentDescriptor } from "../src/services/hls-types.ts";
import type { RateLimiter } from "../src/services/rate-limiter.ts";
import { createRetryPolicy } from "../src/services/retry-policy.ts";
import {
  createRetryingFetcher,
  isRetryableStatus,
  rangeHeader,
  type HttpFetcher,
} from "../src/services/segment-fetcher.ts";
import { createRecordingSleep } from "./helpers.ts";

const SEGMENT: SegmentDescriptor = {
  sequenceNumber: 4,
  uri: "https://cdn.example.com/seg4.ts",
  duration: 6,
  encrypted: true,
};

interface Call {
  url: string;
  headers: Headers;
}

/** Fetcher answering from a list of handlers, the last one repeating. */
function scriptedFetcher(handlers: Array<(init?: RequestInit) => Promise<Response>>) {
  const calls: Call[] = [];
  const http: HttpFetcher = {
    fetch: (url, init) => {
      const handler = handlers[Math.min(calls.length, handlers.length - 1)];
      calls.push({ url, headers: new Headers(init?.headers) });
      return handler(init);
    },
  };
  return { http, calls };
}

const ok = (body: string | Uint8Array, status = 200) => async () => new Response(body, { status });
const status = (code: number, statusText: string) => async () => new Response("error", { status: code, statusText });

function fetcherFor(http: HttpFetcher, overrides: { timeoutMs?: number; limiter?: RateLimiter } = {}) {
  const recording = createRecordingSleep();
  const fetcher = createRetryingFetcher({
    http,
    policy: createRetryPolicy({ jitterRatio: 0 }),
    headers: { "User-Agent": "test-agent" },
    sleep: recording.sleep,
    ...overrides,
  });
  return { fetcher, delays: recording.delays };
}

// ============================================================================
// Pure Functions
// ============================================================================

describe("isRetryableStatus", () => {
  it("should retry 429 and 5xx only", () => {
    expect([429, 500, 502, 503].map(isRetryableStatus)).toEqual([true, true, true, true]);
    expect([400, 403, 404, 410].map(isRetryableStatus)).toEqual([false, false, false, false]);
  });
});

describe("rangeHeader", () => {
  it("should build an inclusive byte range", () => {
    expect(rangeHeader(100, 50)).toBe("bytes=100-149");
  });
});

// ============================================================================
// Retrying Fetcher
// ============================================================================

describe("createRetryingFetcher", () => {
  it("should return the body of a successful response", async () => {
    const { http, calls } = scriptedFetcher([ok("segment-bytes")]);
    const { fetcher } = fetcherFor(http);

    const result = await fetcher.fetch(SEGMENT);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(Buffer.from(result.data).toString()).toBe("segment-bytes");
      expect(result.attempts).toBe(1);
    }
    expect(calls[0].url).toBe("https://cdn.example.com/seg4.ts");
    expect(calls[0].headers.get("User-Agent")).toBe("test-agent");
    expect(calls[0].headers.get("Range")).toBeNull();
  });

  it("should retry server errors with backoff", async () => {
    const { http, calls } = scriptedFetcher([status(503, "Service Unavailable"), status(429, "Too Many Requests"), ok("x")]);
    const { fetcher, delays } = fetcherFor(http);

    const result = await fetcher.fetch(SEGMENT);

    expect(result.ok && result.attempts).toBe(3);
    expect(calls).toHaveLength(3);
    expect(delays).toEqual([2000, 4000]);
  });

  it("should not retry client errors", async () => {
    const { http, calls } = scriptedFetcher([status(404, "Not Found")]);
    const { fetcher, delays } = fetcherFor(http);

    const result = await fetcher.fetch(SEGMENT);

    expect(result).toEqual({
      ok: false,
      error: {
        sequenceNumber: 4,
        reason: "http_status",
        statusCode: 404,
        message: "HTTP 404: Not Found",
        attempts: 1,
      },
    });
    expect(calls).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it("should report network errors after the retry budget", async () => {
    const { http, calls } = scriptedFetcher([async () => {
      throw new Error("connection reset");
    }]);
    const { fetcher } = fetcherFor(http);

    const result = await fetcher.fetch(SEGMENT);

    expect(result).toEqual({
      ok: false,
      error: { sequenceNumber: 4, reason: "network", message: "connection reset", attempts: 3 },
    });
    expect(calls).toHaveLength(3);
  });

  it("should time out a stalled request", async () => {
    const stalled = (init?: RequestInit) =>
      new Promise<Response>((_, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    const { http } = scriptedFetcher([stalled, ok("late but fine")]);
    const { fetcher } = fetcherFor(http, { timeoutMs: 20 });

    const result = await fetcher.fetch(SEGMENT);

    expect(result.ok && result.attempts).toBe(2);
  });

  it("should label exhausted timeouts", async () => {
    const stalled = (init?: RequestInit) =>
      new Promise<Response>((_, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    const { http } = scriptedFetcher([stalled]);
    const fetcher = createRetryingFetcher({
      http,
      policy: createRetryPolicy({ maxAttempts: 1 }),
      timeoutMs: 20,
    });

    const result = await fetcher.fetch(SEGMENT);

    expect(result).toEqual({
      ok: false,
      error: { sequenceNumber: 4, reason: "timeout", message: "Request timed out after 20ms", attempts: 1 },
    });
  });

  it("should not start when already cancelled", async () => {
    const { http, calls } = scriptedFetcher([ok("x")]);
    const { fetcher } = fetcherFor(http);
    const controller = new AbortController();
    controller.abort();

    const result = await fetcher.fetch(SEGMENT, controller.signal);

    expect(result).toEqual({
      ok: false,
      error: { sequenceNumber: 4, reason: "cancelled", message: "Download was cancelled", attempts: 0 },
    });
    expect(calls).toHaveLength(0);
  });

  it("should not count a request cancelled while waiting for the limiter", async () => {
    const controller = new AbortController();
    let acquired = 0;
    const limiter: RateLimiter = {
      acquire: async () => {
        acquired++;
        if (acquired === 2) {
          controller.abort();
          throw new CancelledError();
        }
      },
      available: () => 0,
      pending: () => 0,
    };
    const { http, calls } = scriptedFetcher([status(503, "Service Unavailable")]);
    const { fetcher } = fetcherFor(http, { limiter });

    const result = await fetcher.fetch(SEGMENT, controller.signal);

    expect(result).toEqual({
      ok: false,
      error: { sequenceNumber: 4, reason: "cancelled", message: "Download was cancelled", attempts: 1 },
    });
    expect(calls).toHaveLength(1);
  });

  it("should take a limiter token for every attempt", async () => {
    let acquired = 0;
    const limiter: RateLimiter = {
      acquire: async () => {
        acquired++;
      },
      available: () => Infinity,
      pending: () => 0,
    };
    const { http } = scriptedFetcher([status(500, "Internal Server Error"), ok("x")]);
    const { fetcher } = fetcherFor(http, { limiter });

    await fetcher.fetch(SEGMENT);

    expect(acquired).toBe(2);
  });

  describe("byte ranges", () => {
    const ranged: SegmentDescriptor = { ...SEGMENT, byteOffset: 2, byteLength: 4 };

    it("should send a Range header", async () => {
      const { http, calls } = scriptedFetcher([ok("cdef", 206)]);
      const { fetcher } = fetcherFor(http);

      const result = await fetcher.fetch(ranged);

      expect(calls[0].headers.get("Range")).toBe("bytes=2-5");
      expect(result.ok && Buffer.from(result.data).toString()).toBe("cdef");
    });

    it("should slice a full response when the server ignores the range", async () => {
      const { http } = scriptedFetcher([ok("abcdefghij")]);
      const { fetcher } = fetcherFor(http);

      const result = await fetcher.fetch(ranged);

      expect(result.ok && Buffer.from(result.data).toString()).toBe("cdef");
    });

    it("should retry a short read", async () => {
      const { http, calls } = scriptedFetcher([ok("cd", 206), ok("cdef", 206)]);
      const { fetcher } = fetcherFor(http);

      const result = await fetcher.fetch(ranged);

      expect(result.ok && result.attempts).toBe(2);
      expect(calls).toHaveLength(2);
    });
  });

  describe("fetchBytes", () => {
    it("should report a null sequence number for non-segment requests", async () => {
      const { http } = scriptedFetcher([status(403, "Forbidden")]);
      const { fetcher } = fetcherFor(http);

      const result = await fetcher.fetchBytes("https://cdn.example.com/key.bin");

      expect(!result.ok && result.error.sequenceNumber).toBeNull();
    });
  });
});
