/**
 * Command-line entry point.
 *
 * Reads configuration from the environment, downloads one episode into
 * WORK_DIR and exits with:
 * - 0 when every segment is downloaded and decrypted
 * - 1 on a fatal error (configuration, playlist, key, download state)
 * - 2 when some segments failed (re-run to resume)
 * - 130 when interrupted
 */

import { pathToFileURL } from "node:url";
import { buildRequestHeaders, loadConfigFromEnv, type Config } from "./config.ts";
import { createConsoleLogger, errorMessage, type Logger } from "./logger.ts";
import { createEpisodeDownloader } from "./services/episode-downloader.ts";
import { CancelledError } from "./services/errors.ts";
import { describeProgress } from "./services/progress-aggregator.ts";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;
export const EXIT_CANCELLED = 130;

const PROGRESS_LOG_INTERVAL_MS = 5000;

// ============================================================================
// Graceful Shutdown
// ============================================================================

interface Cleanup {
  name: string;
  fn: () => void | Promise<void>;
}

const cleanupTasks: Cleanup[] = [];

function registerCleanup(name: string, fn: () => void | Promise<void>): void {
  cleanupTasks.push({ name, fn });
}

async function runCleanup(log: Logger): Promise<void> {
  for (const task of cleanupTasks.reverse()) {
    try {
      log.debug(`Cleaning up: ${task.name}`);
      await task.fn();
    } catch (err) {
      log.error(`Error during cleanup of ${task.name}`, { error: errorMessage(err) });
    }
  }
  cleanupTasks.length = 0;
}

/**
 * First signal stops new segments and lets in-flight ones settle;
 * a second one exits immediately.
 */
function installSignalHandlers(controller: AbortController, log: Logger): void {
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      log.warn(`Received ${signal} again, exiting now`);
      process.exit(EXIT_CANCELLED);
    }
    log.info(`Received ${signal}, finishing in-flight segments...`);
    controller.abort();
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  registerCleanup("Signal handlers", () => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  });
}

// ============================================================================
// Main
// ============================================================================

async function run(config: Config, log: Logger): Promise<number> {
  const controller = new AbortController();
  installSignalHandlers(controller, log);

  const downloader = createEpisodeDownloader({ logger: log });

  const result = await downloader.downloadEpisode({
    manifestSource: { url: config.manifestUrl },
    keySource: config.keyUrl ?? undefined,
    workingDir: config.workDir,
    episodeId: config.episodeId ?? undefined,
    concurrency: config.threads,
    rateLimit: { requestsPerSecond: config.rateLimit, burst: config.rateBurst },
    retry: {
      maxAttempts: config.maxRetryAttempts,
      baseDelayMs: config.retryBaseDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
    },
    requestTimeoutMs: config.requestTimeoutSeconds * 1000,
    failureThreshold: config.failureThreshold,
    headers: buildRequestHeaders(config),
    signal: controller.signal,
    progressIntervalMs: PROGRESS_LOG_INTERVAL_MS,
    onProgress: (sample) => log.info(describeProgress(sample)),
  });

  if (result.ok) {
    log.info(result.alreadyComplete ? "Nothing to do, episode already downloaded" : "Download complete", {
      segments: result.segmentPaths.length,
      workDir: config.workDir,
    });
    return EXIT_OK;
  }

  if (result.repeatedFailures.length > 0) {
    log.warn("Some segments failed on more than one run", { sequences: result.repeatedFailures });
  }
  log.error(result.error.message, {
    failed: result.failedSequences.length,
    pending: result.pendingSequences.length,
    completed: result.completedPaths.length,
  });
  return result.cancelled ? EXIT_CANCELLED : EXIT_PARTIAL;
}

async function main(): Promise<number> {
  const configResult = loadConfigFromEnv();
  if (!configResult.ok) {
    const log = createConsoleLogger();
    log.error("Configuration error", {
      errors: configResult.errors.map((e) => ({ field: e.field, message: e.message })),
    });
    return EXIT_FATAL;
  }

  const config = configResult.config;
  const log = createConsoleLogger({ level: config.logLevel });
  log.info("Starting episode download", {
    manifestUrl: config.manifestUrl,
    workDir: config.workDir,
    threads: config.threads,
    rateLimit: config.rateLimit,
  });

  try {
    return await run(config, log);
  } catch (err) {
    if (err instanceof CancelledError) {
      log.warn(err.message);
      return EXIT_CANCELLED;
    }
    log.error("Fatal error", {
      error: errorMessage(err),
      type: err instanceof Error ? err.name : typeof err,
    });
    return EXIT_FATAL;
  } finally {
    await runCleanup(log);
  }
}

// ============================================================================
// Entry Point
// ============================================================================

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().then(
    (code) => process.exit(code),
    (err) => {
      console.error(`[ERROR] Fatal error ${errorMessage(err)}`);
      process.exit(EXIT_FATAL);
    },
  );
}
