import { describe, expect, it } from "vitest";
import { add2, bigSigma0, bigSigma1, ch, K, maj, roundBank, SHA384_IV } from "../src/index.js";
import { paddedBlocks } from "./helpers.js";

/**
 * Eight rounds written out with the usual variable rotation.
 */
function eightRounds(state: ArrayLike<bigint>, kw: BigUint64Array): bigint[] {
  let [a, b, c, d, e, f, g, h] = Array.from(state);
  for (let r = 0; r < 8; r++) {
    const t1 = add2(add2(add2(h, bigSigma1(e)), ch(e, f, g)), kw[r]);
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
  return [a, b, c, d, e, f, g, h];
}

function firstKw(block: BigUint64Array): BigUint64Array {
  const kw = new BigUint64Array(8);
  for (let r = 0; r < 8; r++) kw[r] = add2(K[r], block[r]);
  return kw;
}

describe("roundBank", () => {
  const [block] = paddedBlocks("abc");
  const kw = firstKw(block);

  it("matches eight sequential rounds", () => {
    const out = new BigUint64Array(8);
    roundBank(SHA384_IV, kw, out);
    expect(Array.from(out)).toEqual(eightRounds(SHA384_IV, kw));
  });

  it("shifts earlier a and e values into b..d and f..h", () => {
    const afterSeven = new BigUint64Array(8);
    const afterEight = new BigUint64Array(8);
    roundBank(SHA384_IV, kw, afterEight);

    // Re-run with the last round's kw zeroed: only a and e of round 8 change
    const altered = new BigUint64Array(kw);
    altered[7] = 0n;
    roundBank(SHA384_IV, altered, afterSeven);

    expect(afterEight[0]).not.toBe(afterSeven[0]);
    expect(afterEight[4]).not.toBe(afterSeven[4]);
    expect(Array.from(afterEight.subarray(1, 4))).toEqual(Array.from(afterSeven.subarray(1, 4)));
    expect(Array.from(afterEight.subarray(5, 8))).toEqual(Array.from(afterSeven.subarray(5, 8)));
  });

  it("can write its result over its input", () => {
    const state = new BigUint64Array(SHA384_IV);
    roundBank(state, kw, state);
    expect(Array.from(state)).toEqual(eightRounds(SHA384_IV, kw));
  });

  it("is referentially transparent", () => {
    const first = new BigUint64Array(8);
    const second = new BigUint64Array(8);
    roundBank(SHA384_IV, kw, first);
    roundBank(SHA384_IV, kw, second);
    expect(Array.from(first)).toEqual(Array.from(second));
  });
});
