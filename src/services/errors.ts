/**
 * Error types raised by the episode download pipeline.
 *
 * Fatal conditions (manifest, key, ledger) are thrown and end the operation.
 * Per-segment fetch failures are returned as `FetchError` results instead
 * (see hls-types.ts) and recorded in the resume ledger.
 */

export class ManifestParseError extends Error {
  constructor(
    message: string,
    /** 1-based line number in the playlist, when the error is tied to one */
    public readonly line: number | null = null,
  ) {
    super(line === null ? message : `${message} (line ${line})`);
    this.name = "ManifestParseError";
  }
}

export class KeyFetchError extends Error {
  constructor(
    message: string,
    public readonly keyUri: string,
    public readonly attempts: number = 0,
  ) {
    super(message);
    this.name = "KeyFetchError";
  }
}

export class DecryptionError extends Error {
  constructor(
    message: string,
    public readonly sequenceNumber: number | null = null,
  ) {
    super(message);
    this.name = "DecryptionError";
  }
}

export type PartialReason = "failures" | "cancelled" | "failure_threshold";

export class PartialDownloadError extends Error {
  constructor(
    public readonly failedSequences: readonly number[],
    public readonly pendingSequences: readonly number[] = [],
    public readonly reason: PartialReason = "failures",
  ) {
    super(describePartial(failedSequences, pendingSequences, reason));
    this.name = "PartialDownloadError";
  }
}

export class LedgerCorruptionError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(`${message}: ${path}`);
    this.name = "LedgerCorruptionError";
  }
}

export class CancelledError extends Error {
  constructor(message = "Download was cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

function describePartial(
  failed: readonly number[],
  pending: readonly number[],
  reason: PartialReason,
): string {
  const shown = failed.slice(0, 5).join(", ");
  const more = failed.length > 5 ? ` and ${failed.length - 5} more` : "";
  const failedPart = failed.length > 0
    ? `${failed.length} segment(s) failed: ${shown}${more}`
    : "no segments failed";

  switch (reason) {
    case "cancelled":
      return `Download cancelled with ${pending.length} segment(s) remaining, ${failedPart}`;
    case "failure_threshold":
      return `Download stopped after too many failures, ${failedPart}, ${pending.length} segment(s) not attempted`;
    default:
      return `Download incomplete, ${failedPart}`;
  }
}
