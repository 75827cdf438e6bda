/**
 * Eight SHA-384 rounds per tick.
 *
 * Within a round only `a` and `e` receive new values; b, c, d and f, g, h are
 * the previous three a and e values shifted along. The bank therefore tracks
 * two histories of twelve words each: the four incoming values followed by
 * the eight produced, and reads the result off the last four of each.
 */

import { add2, add4, bigSigma0, bigSigma1, ch, maj } from "./arith.js";
import { ROUNDS_PER_STAGE } from "./constants.js";

const HISTORY_LEN = ROUNDS_PER_STAGE + 4;

// Reusable scratch (single-threaded; nothing escapes a call)
const aHistory = new BigUint64Array(HISTORY_LEN);
const eHistory = new BigUint64Array(HISTORY_LEN);

/**
 * Apply eight rounds to a working state.
 *
 * @param state - Working variables a..h
 * @param kw - Pre-summed K[t+r] + W[t+r] for r = 0..7
 * @param out - Receives the new a..h; may be the same array as `state`
 */
export function roundBank(
  state: ArrayLike<bigint>,
  kw: BigUint64Array,
  out: BigUint64Array,
): void {
  // History slot 3 is the current a (or e), slot 0 the oldest (d or h)
  aHistory[0] = state[3];
  aHistory[1] = state[2];
  aHistory[2] = state[1];
  aHistory[3] = state[0];
  eHistory[0] = state[7];
  eHistory[1] = state[6];
  eHistory[2] = state[5];
  eHistory[3] = state[4];

  for (let r = 0; r < ROUNDS_PER_STAGE; r++) {
    const a = aHistory[r + 3];
    const b = aHistory[r + 2];
    const c = aHistory[r + 1];
    const d = aHistory[r];
    const e = eHistory[r + 3];
    const f = eHistory[r + 2];
    const g = eHistory[r + 1];
    const h = eHistory[r];

    const t1 = add4(h, bigSigma1(e), ch(e, f, g), kw[r]);
    const t2 = add2(bigSigma0(a), maj(a, b, c));

    aHistory[r + 4] = add2(t1, t2);
    eHistory[r + 4] = add2(d, t1);
  }

  out[0] = aHistory[11];
  out[1] = aHistory[10];
  out[2] = aHistory[9];
  out[3] = aHistory[8];
  out[4] = eHistory[11];
  out[5] = eHistory[10];
  out[6] = eHistory[9];
  out[7] = eHistory[8];
}
