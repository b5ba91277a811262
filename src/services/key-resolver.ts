/**
 * Resolves and caches the AES-128 key for one download operation.
 *
 * A resolver must not outlive its operation: episodes may use different keys,
 * so the cache is per instance and never global.
 */

import { KeyFetchError } from "./errors.ts";
import type { EncryptionKey } from "./hls-types.ts";
import type { RetryingFetcher } from "./segment-fetcher.ts";

export const KEY_LENGTH = 16;

export interface KeyResolver {
  /**
   * Fetch the key at `keyUri`, or return the cached one.
   * @throws KeyFetchError after the fetcher's retry budget is exhausted, or
   *   when the response is not exactly 16 bytes
   */
  resolve(keyUri: string, signal?: AbortSignal): Promise<EncryptionKey>;
  /** Number of network fetches started */
  fetchCount(): number;
}

export function createKeyResolver(fetcher: RetryingFetcher): KeyResolver {
  const cache = new Map<string, Promise<EncryptionKey>>();
  let fetches = 0;

  async function load(keyUri: string, signal?: AbortSignal): Promise<EncryptionKey> {
    fetches++;
    const result = await fetcher.fetchBytes(keyUri, { signal });

    if (!result.ok) {
      throw new KeyFetchError(
        `Failed to fetch decryption key: ${result.error.message}`,
        keyUri,
        result.error.attempts,
      );
    }
    if (result.data.length !== KEY_LENGTH) {
      throw new KeyFetchError(
        `Decryption key must be ${KEY_LENGTH} bytes, got ${result.data.length}`,
        keyUri,
        result.attempts,
      );
    }

    return { keyBytes: result.data, keyURI: keyUri };
  }

  function resolve(keyUri: string, signal?: AbortSignal): Promise<EncryptionKey> {
    const cached = cache.get(keyUri);
    if (cached) return cached;

    const pending = load(keyUri, signal);
    cache.set(keyUri, pending);
    // Failed lookups are not cached
    pending.catch(() => cache.delete(keyUri));
    return pending;
  }

  return {
    resolve,
    fetchCount: () => fetches,
  };
}
