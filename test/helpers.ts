/**
 * Test helpers. Padding is shared with the bench scripts.
 */

import { padMessage } from "../bench/utils.js";
import { bytesToBlocks } from "../src/index.js";

export { padMessage };

export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function paddedBlocks(text: string): BigUint64Array[] {
  return bytesToBlocks(padMessage(utf8(text)));
}

/**
 * Deterministic byte pattern so failures reproduce.
 */
export function patternBytes(length: number, seed: number = 0): Uint8Array {
  const out = new Uint8Array(length);
  let x = (seed * 2654435761 + 1) >>> 0;
  for (let i = 0; i < length; i++) {
    x = (Math.imul(x, 1103515245) + 12345) >>> 0;
    out[i] = x >>> 24;
  }
  return out;
}

export const ABC_HASH =
  "cb00753f45a35e8bb5a03d699ac65007272c32ab0eded1631a8b605a43ff5bed8086072ba1e7cc2358baeca134c825a7";

export const EMPTY_HASH =
  "38b060a751ac96384cd9327eb1b1e36a21fdb71114be07434c0cc7bf63f6e1da274edebfe76f65fbd51ad2f14898b95b";

export const TWO_BLOCK_MESSAGE =
  "abcdefghbcdefghicdefghijdefghijkefghijklfghijklmghijklmnhijklmnoijklmnopjklmnopqklmnopqrlmnopqrsmnopqrstnopqrstu";

export const TWO_BLOCK_HASH =
  "09330c33f71147e83d192fc782cd1b4753111b173b3b05d22fa08086e3b0f712fcc7c71a557e2db966c3e9fa91746039";
