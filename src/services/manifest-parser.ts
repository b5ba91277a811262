/**
 * HLS media playlist parser.
 *
 * Turns playlist text into an ordered list of segment descriptors plus the
 * AES-128 key reference. Only media playlists are accepted: variant selection
 * from a master playlist happens before this stage.
 *
 * Supported tags:
 * - #EXTM3U (required header)
 * - #EXT-X-MEDIA-SEQUENCE, #EXT-X-TARGETDURATION, #EXTINF
 * - #EXT-X-BYTERANGE (sub-range segments)
 * - #EXT-X-KEY (METHOD=NONE | AES-128, URI, IV)
 * - #EXT-X-ENDLIST
 *
 * All other tags are ignored.
 */

import { ManifestParseError } from "./errors.ts";
import type { KeyReference, Manifest, SegmentDescriptor } from "./hls-types.ts";

// ============================================================================
// Pure Helpers
// ============================================================================

/**
 * Parse an HLS attribute list (`KEY=VALUE,KEY="VALUE"`).
 */
export function parseAttributes(list: string): Record<string, string> {
  const result: Record<string, string> = {};
  const regex = /([A-Z0-9-]+)=("([^"]*)"|([^,]*))/g;
  let match: RegExpExecArray | null;
  while ((match = regex.exec(list)) !== null) {
    result[match[1]] = match[3] !== undefined ? match[3] : match[4];
  }
  return result;
}

/**
 * Derive the IV for a segment without an explicit one: the media sequence
 * number as a 128-bit big-endian integer.
 */
export function sequenceNumberToIV(sequenceNumber: number): Uint8Array {
  if (!Number.isSafeInteger(sequenceNumber) || sequenceNumber < 0) {
    throw new RangeError(`Invalid sequence number for IV: ${sequenceNumber}`);
  }
  const iv = new Uint8Array(16);
  new DataView(iv.buffer).setBigUint64(8, BigInt(sequenceNumber));
  return iv;
}

/**
 * IV to use when decrypting a segment.
 */
export function ivForSegment(segment: SegmentDescriptor): Uint8Array {
  return segment.explicitIV ?? sequenceNumberToIV(segment.sequenceNumber);
}

/**
 * Parse a hexadecimal IV attribute (`0x` prefix, up to 32 hex digits).
 */
export function parseHexIV(value: string, line: number | null = null): Uint8Array {
  const match = value.match(/^0[xX]([0-9a-fA-F]{1,32})$/);
  if (!match) {
    throw new ManifestParseError(`Invalid IV "${value}"`, line);
  }
  return new Uint8Array(Buffer.from(match[1].padStart(32, "0"), "hex"));
}

/**
 * Check whether playlist text is a master (variant) playlist.
 */
export function isMasterPlaylist(text: string): boolean {
  return /^#EXT-X-STREAM-INF:/m.test(text);
}

function resolveUri(uri: string, baseUri: string | undefined, line: number): string {
  try {
    return new URL(uri, baseUri).toString();
  } catch {
    throw new ManifestParseError(`Cannot resolve URI "${uri}"`, line);
  }
}

function parseInteger(value: string, tag: string, line: number): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ManifestParseError(`${tag} must be a non-negative integer, got: ${value}`, line);
  }
  const num = Number(trimmed);
  if (!Number.isSafeInteger(num)) {
    throw new ManifestParseError(`${tag} is out of range: ${value}`, line);
  }
  return num;
}

function parseDecimal(value: string, tag: string, line: number): number {
  const trimmed = value.trim();
  if (!/^\d+(\.\d*)?$/.test(trimmed)) {
    throw new ManifestParseError(`${tag} must be a non-negative number, got: ${value}`, line);
  }
  return parseFloat(trimmed);
}

/**
 * Segment duration from `#EXTINF`. Live encoders sometimes write `-1` or
 * leave it empty; such a segment still downloads, with a duration of 0.
 */
export function parseSegmentDuration(value: string): number {
  const duration = Number(value.split(",")[0].trim());
  return Number.isFinite(duration) && duration > 0 ? duration : 0;
}

function parseByteRange(
  value: string,
  line: number,
): { length: number; offset: number | null } {
  const [length, offset] = value.split("@");
  return {
    length: parseInteger(length, "#EXT-X-BYTERANGE", line),
    offset: offset === undefined ? null : parseInteger(offset, "#EXT-X-BYTERANGE", line),
  };
}

function parseKeyTag(
  value: string,
  baseUri: string | undefined,
  line: number,
): KeyReference | null {
  const attrs = parseAttributes(value);
  const method = attrs["METHOD"];

  if (!method) {
    throw new ManifestParseError("#EXT-X-KEY is missing METHOD", line);
  }
  if (method === "NONE") {
    return null;
  }
  if (method !== "AES-128") {
    throw new ManifestParseError(`Unsupported encryption method: ${method}`, line);
  }
  if (!attrs["URI"]) {
    throw new ManifestParseError("#EXT-X-KEY with METHOD=AES-128 is missing URI", line);
  }

  return {
    method: "AES-128",
    uri: resolveUri(attrs["URI"], baseUri, line),
    iv: attrs["IV"] ? parseHexIV(attrs["IV"], line) : null,
  };
}

function splitTag(line: string): [tag: string, value: string] {
  const colon = line.indexOf(":");
  return colon < 0 ? [line, ""] : [line.slice(0, colon), line.slice(colon + 1)];
}

// ============================================================================
// Parser
// ============================================================================

/**
 * Parse a media playlist.
 *
 * @param text - Playlist text
 * @param baseUri - URI the playlist was loaded from; relative segment and key
 *   URIs are resolved against it
 * @throws ManifestParseError when the playlist is malformed, is a master
 *   playlist, uses unsupported features, or lists no segments
 */
export function parseManifest(text: string, baseUri?: string): Manifest {
  const lines = text.split(/\r?\n/);

  let headerIndex = 0;
  while (headerIndex < lines.length && lines[headerIndex].trim() === "") {
    headerIndex++;
  }
  if (headerIndex >= lines.length || lines[headerIndex].trim() !== "#EXTM3U") {
    throw new ManifestParseError("Playlist does not start with #EXTM3U");
  }

  const segments: SegmentDescriptor[] = [];
  const rangeEnds = new Map<string, number>();
  let mediaSequence = 0;
  let targetDuration: number | null = null;
  let totalDuration = 0;
  let endList = false;
  let manifestKey: KeyReference | null = null;
  let currentKey: KeyReference | null = null;
  let pendingDuration = 0;
  let pendingRange: { length: number; offset: number | null } | null = null;

  for (let i = headerIndex + 1; i < lines.length; i++) {
    const line = lines[i].trim();
    const lineNumber = i + 1;
    if (line === "") continue;

    if (line.startsWith("#")) {
      const [tag, value] = splitTag(line);

      switch (tag) {
        case "#EXT-X-STREAM-INF":
          throw new ManifestParseError(
            "Master playlist given; select a variant playlist first",
            lineNumber,
          );
        case "#EXT-X-MEDIA-SEQUENCE":
          if (segments.length > 0) {
            throw new ManifestParseError(
              "#EXT-X-MEDIA-SEQUENCE must appear before the first segment",
              lineNumber,
            );
          }
          mediaSequence = parseInteger(value, tag, lineNumber);
          break;
        case "#EXT-X-TARGETDURATION":
          targetDuration = parseDecimal(value, tag, lineNumber);
          break;
        case "#EXTINF":
          pendingDuration = parseSegmentDuration(value);
          break;
        case "#EXT-X-BYTERANGE":
          pendingRange = parseByteRange(value, lineNumber);
          break;
        case "#EXT-X-KEY":
          currentKey = parseKeyTag(value, baseUri, lineNumber);
          if (currentKey) {
            if (manifestKey && manifestKey.uri !== currentKey.uri) {
              throw new ManifestParseError(
                "Key rotation between different key URIs is not supported",
                lineNumber,
              );
            }
            manifestKey ??= currentKey;
          }
          break;
        case "#EXT-X-MAP":
          throw new ManifestParseError("#EXT-X-MAP init segments are not supported", lineNumber);
        case "#EXT-X-ENDLIST":
          endList = true;
          break;
        default:
          // Unknown tag or comment
          break;
      }
      continue;
    }

    const uri = resolveUri(line, baseUri, lineNumber);
    const sequenceNumber = mediaSequence + segments.length;
    let range: { byteLength: number; byteOffset: number } | null = null;

    if (pendingRange) {
      const offset = pendingRange.offset ?? rangeEnds.get(uri);
      if (offset === undefined) {
        throw new ManifestParseError(
          "#EXT-X-BYTERANGE without offset must follow a sub-range of the same URI",
          lineNumber,
        );
      }
      range = { byteLength: pendingRange.length, byteOffset: offset };
      rangeEnds.set(uri, offset + pendingRange.length);
    }

    segments.push(Object.freeze({
      sequenceNumber,
      uri,
      duration: pendingDuration,
      encrypted: currentKey !== null,
      ...(range ?? {}),
      ...(currentKey?.iv ? { explicitIV: currentKey.iv } : {}),
    }));

    totalDuration += pendingDuration;
    pendingDuration = 0;
    pendingRange = null;
  }

  if (segments.length === 0) {
    throw new ManifestParseError("Playlist contains no segments");
  }

  return {
    mediaSequence,
    targetDuration,
    totalDuration,
    endList,
    key: manifestKey,
    segments,
  };
}
