/**
 * Configuration types and parsing for the episode downloader CLI.
 * All functions are pure and easily testable.
 */

import { isLogLevel, type LogLevel } from "./logger.ts";

export interface Config {
  // Required
  manifestUrl: string;
  workDir: string;

  // Optional with defaults
  keyUrl: string | null; // overrides the key URI in the playlist
  episodeId: string | null; // null = working directory name
  threads: number;
  rateLimit: number; // requests/sec, 0 = unlimited
  rateBurst: number;
  maxRetryAttempts: number;
  retryBaseDelayMs: number; // 1000 → waits of 2s, 4s
  retryMaxDelayMs: number;
  requestTimeoutSeconds: number;
  failureThreshold: number;
  userAgent: string;
  referer: string | null;
  logLevel: LogLevel;
}

export interface ConfigInput {
  MANIFEST_URL?: string;
  KEY_URL?: string;
  WORK_DIR?: string;
  EPISODE_ID?: string;
  THREADS?: string;
  RATE_LIMIT?: string;
  RATE_BURST?: string;
  MAX_RETRY_ATTEMPTS?: string;
  RETRY_BASE_DELAY_MS?: string;
  RETRY_MAX_DELAY_MS?: string;
  REQUEST_TIMEOUT_SECONDS?: string;
  FAILURE_THRESHOLD?: string;
  USER_AGENT?: string;
  REFERER?: string;
  LOG_LEVEL?: string;
}

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export type ConfigResult =
  | { ok: true; config: Config }
  | { ok: false; errors: ConfigError[] };

/**
 * Parse and validate configuration from environment variables.
 * Pure function - no I/O, only transforms input to output.
 */
export function parseConfig(input: ConfigInput): ConfigResult {
  const errors: ConfigError[] = [];

  // Required fields
  const manifestUrl = input.MANIFEST_URL?.trim();
  if (!manifestUrl) {
    errors.push(new ConfigError("MANIFEST_URL is required", "MANIFEST_URL"));
  } else if (!isValidUrl(manifestUrl)) {
    errors.push(
      new ConfigError(`MANIFEST_URL must be a valid URL, got: ${manifestUrl}`, "MANIFEST_URL"),
    );
  }

  const workDir = input.WORK_DIR?.trim();
  if (!workDir) {
    errors.push(new ConfigError("WORK_DIR is required", "WORK_DIR"));
  }

  // Optional fields with validation
  const keyUrl = input.KEY_URL?.trim() || null;
  if (keyUrl !== null && !isValidUrl(keyUrl)) {
    errors.push(new ConfigError(`KEY_URL must be a valid URL, got: ${keyUrl}`, "KEY_URL"));
  }

  const threads = collect(parsePositiveInt(input.THREADS, "THREADS", 100), errors);
  const rateLimit = collect(parseNonNegativeNumber(input.RATE_LIMIT, "RATE_LIMIT", 0), errors);
  const rateBurst = collect(parsePositiveInt(input.RATE_BURST, "RATE_BURST", 10), errors);
  const maxRetryAttempts = collect(
    parsePositiveInt(input.MAX_RETRY_ATTEMPTS, "MAX_RETRY_ATTEMPTS", 3),
    errors,
  );
  const retryBaseDelayMs = collect(
    parseNonNegativeInt(input.RETRY_BASE_DELAY_MS, "RETRY_BASE_DELAY_MS", 1000),
    errors,
  );
  const retryMaxDelayMs = collect(
    parseNonNegativeInt(input.RETRY_MAX_DELAY_MS, "RETRY_MAX_DELAY_MS", 30_000),
    errors,
  );
  const requestTimeoutSeconds = collect(
    parsePositiveInt(input.REQUEST_TIMEOUT_SECONDS, "REQUEST_TIMEOUT_SECONDS", 60),
    errors,
  );
  const failureThreshold = collect(
    parseNonNegativeInt(input.FAILURE_THRESHOLD, "FAILURE_THRESHOLD", 25),
    errors,
  );

  const logLevel = input.LOG_LEVEL?.trim().toLowerCase() || "info";
  if (!isLogLevel(logLevel)) {
    errors.push(
      new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got: ${logLevel}`, "LOG_LEVEL"),
    );
  }

  if (errors.length > 0 || !manifestUrl || !workDir || !isLogLevel(logLevel)) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    config: {
      manifestUrl,
      workDir,
      keyUrl,
      episodeId: input.EPISODE_ID?.trim() || null,
      threads,
      rateLimit,
      rateBurst,
      maxRetryAttempts,
      retryBaseDelayMs,
      retryMaxDelayMs,
      requestTimeoutSeconds,
      failureThreshold,
      userAgent: input.USER_AGENT?.trim() || DEFAULT_USER_AGENT,
      referer: input.REFERER?.trim() || null,
      logLevel,
    },
  };
}

/**
 * Load config from process.env (convenience wrapper).
 * This is the only impure function - it reads from environment.
 */
export function loadConfigFromEnv(): ConfigResult {
  return parseConfig({
    MANIFEST_URL: process.env.MANIFEST_URL,
    KEY_URL: process.env.KEY_URL,
    WORK_DIR: process.env.WORK_DIR,
    EPISODE_ID: process.env.EPISODE_ID,
    THREADS: process.env.THREADS,
    RATE_LIMIT: process.env.RATE_LIMIT,
    RATE_BURST: process.env.RATE_BURST,
    MAX_RETRY_ATTEMPTS: process.env.MAX_RETRY_ATTEMPTS,
    RETRY_BASE_DELAY_MS: process.env.RETRY_BASE_DELAY_MS,
    RETRY_MAX_DELAY_MS: process.env.RETRY_MAX_DELAY_MS,
    REQUEST_TIMEOUT_SECONDS: process.env.REQUEST_TIMEOUT_SECONDS,
    FAILURE_THRESHOLD: process.env.FAILURE_THRESHOLD,
    USER_AGENT: process.env.USER_AGENT,
    REFERER: process.env.REFERER,
    LOG_LEVEL: process.env.LOG_LEVEL,
  });
}

/**
 * Request headers sent to the origin for playlist, key and segments.
 */
export function buildRequestHeaders(config: Config): Record<string, string> {
  const headers: Record<string, string> = { "User-Agent": config.userAgent };
  if (config.referer) {
    headers["Referer"] = config.referer;
  }
  return headers;
}

// Helper functions (pure)

type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ConfigError; fallback: T };

/**
 * Unwrap a parse result, recording its error.
 */
function collect<T>(result: ParseResult<T>, errors: ConfigError[]): T {
  if (result.ok) return result.value;
  errors.push(result.error);
  return result.fallback;
}

function parseNonNegativeInt(
  value: string | undefined,
  field: string,
  defaultValue: number,
): ParseResult<number> {
  if (!value || value.trim() === "") {
    return { ok: true, value: defaultValue };
  }

  const num = Number(value.trim());
  if (!Number.isInteger(num) || num < 0) {
    return {
      ok: false,
      error: new ConfigError(
        `${field} must be a non-negative integer, got: ${value}`,
        field,
      ),
      fallback: defaultValue,
    };
  }

  return { ok: true, value: num };
}

function parsePositiveInt(
  value: string | undefined,
  field: string,
  defaultValue: number,
): ParseResult<number> {
  if (!value || value.trim() === "") {
    return { ok: true, value: defaultValue };
  }

  const num = Number(value.trim());
  if (!Number.isInteger(num) || num < 1) {
    return {
      ok: false,
      error: new ConfigError(
        `${field} must be a positive integer, got: ${value}`,
        field,
      ),
      fallback: defaultValue,
    };
  }

  return { ok: true, value: num };
}

function parseNonNegativeNumber(
  value: string | undefined,
  field: string,
  defaultValue: number,
): ParseResult<number> {
  if (!value || value.trim() === "") {
    return { ok: true, value: defaultValue };
  }

  const num = Number(value.trim());
  if (!Number.isFinite(num) || num < 0) {
    return {
      ok: false,
      error: new ConfigError(
        `${field} must be a non-negative number, got: ${value}`,
        field,
      ),
      fallback: defaultValue,
    };
  }

  return { ok: true, value: num };
}

/**
 * Validate a URL string.
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}
