/**
 * SHA-384 Utility Functions
 *
 * SHA-2 is big-endian: every 64-bit word is read from and written to bytes
 * most significant byte first, regardless of host endianness.
 */

import { BLOCK_LEN, BLOCK_WORDS } from "./constants.js";

/**
 * Read big-endian 64-bit words from a byte array.
 *
 * @param input - Source byte array
 * @param offset - Starting byte offset in input
 * @param words - Destination array
 * @param wordCount - Number of words to read (default: all of `words`)
 */
export function readBigEndianWords(
  input: Uint8Array,
  offset: number,
  words: BigUint64Array,
  wordCount: number = words.length,
): void {
  const view = new DataView(input.buffer, input.byteOffset, input.byteLength);
  for (let i = 0; i < wordCount; ++i, offset += 8) {
    words[i] = view.getBigUint64(offset, false);
  }
}

/**
 * Write 64-bit words to a byte array, big-endian.
 *
 * @param words - Source words
 * @param wordOffset - Starting word offset in source
 * @param wordCount - Number of words to write
 * @param output - Destination byte array
 * @param byteOffset - Starting byte offset in destination
 */
export function writeBigEndianWords(
  words: BigUint64Array,
  wordOffset: number,
  wordCount: number,
  output: Uint8Array,
  byteOffset: number,
): void {
  const view = new DataView(output.buffer, output.byteOffset, output.byteLength);
  for (let i = 0; i < wordCount; ++i, byteOffset += 8) {
    view.setBigUint64(byteOffset, words[wordOffset + i], false);
  }
}

/**
 * Serialize words to a new byte array, e.g. a 6-word hash to its 48-byte digest.
 */
export function wordsToBytes(words: BigUint64Array): Uint8Array {
  const out = new Uint8Array(words.length * 8);
  writeBigEndianWords(words, 0, words.length, out, 0);
  return out;
}

/**
 * Split an already padded message into 16-word blocks.
 */
export function bytesToBlocks(padded: Uint8Array): BigUint64Array[] {
  if (padded.length % BLOCK_LEN !== 0) {
    throw new RangeError(
      `Padded message length must be a multiple of ${BLOCK_LEN} bytes, got ${padded.length}`,
    );
  }
  const blocks: BigUint64Array[] = [];
  for (let offset = 0; offset < padded.length; offset += BLOCK_LEN) {
    const block = new BigUint64Array(BLOCK_WORDS);
    readBigEndianWords(padded, offset, block);
    blocks.push(block);
  }
  return blocks;
}

/**
 * Lowercase hex, 16 digits per word, no separators.
 */
export function wordsToHex(words: ArrayLike<bigint>): string {
  let hex = "";
  for (let i = 0; i < words.length; i++) {
    hex += words[i].toString(16).padStart(16, "0");
  }
  return hex;
}

/**
 * Parse hex into 64-bit words. Whitespace is ignored, so digests written as
 * space-separated word groups parse as-is.
 */
export function hexToWords(hex: string): BigUint64Array {
  const digits = hex.replace(/\s+/g, "");
  if (digits.length % 16 !== 0 || !/^[0-9a-fA-F]*$/.test(digits)) {
    throw new RangeError(`Expected hex in whole 64-bit words, got "${hex}"`);
  }
  const words = new BigUint64Array(digits.length / 16);
  for (let i = 0; i < words.length; i++) {
    words[i] = BigInt(`0x${digits.slice(i * 16, i * 16 + 16)}`);
  }
  return words;
}
