/**
 * Unpipelined SHA-384 compression.
 *
 * One block at a time with the full 80-word schedule, written as plainly as
 * possible. The pipelined engine is checked against it.
 */

import {
  add2,
  add4,
  add5,
  bigSigma0,
  bigSigma1,
  ch,
  maj,
  smallSigma0,
  smallSigma1,
} from "./arith.js";
import { BLOCK_WORDS, HASH_WORDS, INITIAL_DIGEST, ROUND_CONSTANTS, ROUNDS } from "./constants.js";

const schedule = new BigUint64Array(ROUNDS);

/**
 * Compress one block into a digest.
 *
 * @param digest - Incoming digest (IV for a message's first block)
 * @param block - 16 padded message words
 * @param out - Receives the outgoing digest; may be the same array as `digest`
 */
export function compressBlock(
  digest: ArrayLike<bigint>,
  block: ArrayLike<bigint>,
  out: BigUint64Array,
): void {
  for (let t = 0; t < BLOCK_WORDS; t++) {
    schedule[t] = block[t];
  }
  for (let t = BLOCK_WORDS; t < ROUNDS; t++) {
    schedule[t] = add4(
      smallSigma1(schedule[t - 2]),
      schedule[t - 7],
      smallSigma0(schedule[t - 15]),
      schedule[t - 16],
    );
  }

  let a = digest[0];
  let b = digest[1];
  let c = digest[2];
  let d = digest[3];
  let e = digest[4];
  let f = digest[5];
  let g = digest[6];
  let h = digest[7];

  for (let t = 0; t < ROUNDS; t++) {
    const t1 = add5(h, bigSigma1(e), ch(e, f, g), ROUND_CONSTANTS[t], schedule[t]);
    const t2 = add2(bigSigma0(a), maj(a, b, c));
    h = g;
    g = f;
    f = e;
    e = add2(d, t1);
    d = c;
    c = b;
    b = a;
    a = add2(t1, t2);
  }

  out[0] = add2(digest[0], a);
  out[1] = add2(digest[1], b);
  out[2] = add2(digest[2], c);
  out[3] = add2(digest[3], d);
  out[4] = add2(digest[4], e);
  out[5] = add2(digest[5], f);
  out[6] = add2(digest[6], g);
  out[7] = add2(digest[7], h);
}

/**
 * SHA-384 of an already padded message, one block after another.
 *
 * @returns The 6-word hash
 */
export function referenceDigest(blocks: ReadonlyArray<ArrayLike<bigint>>): BigUint64Array {
  if (blocks.length === 0) {
    throw new RangeError("A padded message has at least one block");
  }
  const digest = new BigUint64Array(INITIAL_DIGEST);
  for (const block of blocks) {
    if (block.length !== BLOCK_WORDS) {
      throw new RangeError(`Block must be ${BLOCK_WORDS} words, got ${block.length}`);
    }
    compressBlock(digest, block, digest);
  }
  return digest.slice(0, HASH_WORDS);
}
