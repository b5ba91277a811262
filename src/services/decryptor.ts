/**
 * AES-128-CBC segment decryption.
 */

import { createDecipheriv } from "node:crypto";
import { DecryptionError } from "./errors.ts";

const BLOCK_SIZE = 16;

/**
 * Decrypt one segment and strip its PKCS#7 padding.
 * Pure function - safe to call from any number of workers at once.
 *
 * @throws DecryptionError when the ciphertext is not block-aligned or the
 *   padding is invalid, which usually means a truncated or corrupted segment
 */
export function decryptSegment(
  ciphertext: Uint8Array,
  key: Uint8Array,
  iv: Uint8Array,
  sequenceNumber: number | null = null,
): Uint8Array {
  if (key.length !== BLOCK_SIZE) {
    throw new DecryptionError(`Key must be ${BLOCK_SIZE} bytes, got ${key.length}`, sequenceNumber);
  }
  if (iv.length !== BLOCK_SIZE) {
    throw new DecryptionError(`IV must be ${BLOCK_SIZE} bytes, got ${iv.length}`, sequenceNumber);
  }
  if (ciphertext.length === 0 || ciphertext.length % BLOCK_SIZE !== 0) {
    throw new DecryptionError(
      `Ciphertext length ${ciphertext.length} is not a positive multiple of ${BLOCK_SIZE}`,
      sequenceNumber,
    );
  }

  try {
    const decipher = createDecipheriv("aes-128-cbc", key, iv);
    const head = decipher.update(ciphertext);
    const tail = decipher.final();
    return Buffer.concat([head, tail]);
  } catch (error) {
    throw new DecryptionError(
      `Padding check failed: ${error instanceof Error ? error.message : String(error)}`,
      sequenceNumber,
    );
  }
}
