/**
 * SHA-384 message schedule, eight words per tick.
 *
 * The schedule is never materialized as 80 words: each stage keeps a 16-word
 * circular window where W[i] lives at index i mod 16.
 */

import { add4, smallSigma0, smallSigma1 } from "./arith.js";
import { BLOCK_WORDS, ROUNDS, ROUNDS_PER_STAGE } from "./constants.js";

/**
 * Compute schedule words W[t..t+7] from the window.
 *
 * For t < 16 the words are the raw block words still sitting in the window.
 * For t >= 16 they follow the FIPS recurrence with the cascade
 * w2←w0, w3←w1, w4←w2, w5←w3, w6←w4, w7←(w5, w0); the window is then
 * overwritten at positions t..t+7 (mod 16).
 *
 * @param window - Current 16-word window (read only)
 * @param roundBase - First round of the batch: 0, 8, ..., 72
 * @param words - Receives the 8 schedule words
 * @param nextWindow - Receives the updated window; may be the same array as `window`
 */
export function scheduleBatch(
  window: BigUint64Array,
  roundBase: number,
  words: BigUint64Array,
  nextWindow: BigUint64Array,
): void {
  if (
    !Number.isInteger(roundBase) ||
    roundBase < 0 ||
    roundBase > ROUNDS - ROUNDS_PER_STAGE ||
    roundBase % ROUNDS_PER_STAGE !== 0
  ) {
    throw new RangeError(`Round base must be a multiple of 8 in [0, 72], got ${roundBase}`);
  }

  if (roundBase < BLOCK_WORDS) {
    for (let r = 0; r < ROUNDS_PER_STAGE; r++) {
      words[r] = window[roundBase + r];
    }
    if (nextWindow !== window) nextWindow.set(window);
    return;
  }

  // W[t + j - k] for a word already in the window
  const at = (j: number, k: number): bigint => window[(roundBase + j - k) & 15];

  const w0 = add4(smallSigma1(at(0, 2)), at(0, 7), smallSigma0(at(0, 15)), at(0, 16));
  const w1 = add4(smallSigma1(at(1, 2)), at(1, 7), smallSigma0(at(1, 15)), at(1, 16));
  const w2 = add4(smallSigma1(w0), at(2, 7), smallSigma0(at(2, 15)), at(2, 16));
  const w3 = add4(smallSigma1(w1), at(3, 7), smallSigma0(at(3, 15)), at(3, 16));
  const w4 = add4(smallSigma1(w2), at(4, 7), smallSigma0(at(4, 15)), at(4, 16));
  const w5 = add4(smallSigma1(w3), at(5, 7), smallSigma0(at(5, 15)), at(5, 16));
  const w6 = add4(smallSigma1(w4), at(6, 7), smallSigma0(at(6, 15)), at(6, 16));
  const w7 = add4(smallSigma1(w5), w0, smallSigma0(at(7, 15)), at(7, 16));

  if (nextWindow !== window) nextWindow.set(window);

  const base = roundBase & 15;
  nextWindow[base] = words[0] = w0;
  nextWindow[base + 1] = words[1] = w1;
  nextWindow[base + 2] = words[2] = w2;
  nextWindow[base + 3] = words[3] = w3;
  nextWindow[base + 4] = words[4] = w4;
  nextWindow[base + 5] = words[5] = w5;
  nextWindow[base + 6] = words[6] = w6;
  nextWindow[base + 7] = words[7] = w7;
}
