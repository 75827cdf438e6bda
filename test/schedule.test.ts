import { describe, expect, it } from "vitest";
import { add4, scheduleBatch, smallSigma0, smallSigma1 } from "../src/index.js";
import { paddedBlocks } from "./helpers.js";

function fullSchedule(block: BigUint64Array): bigint[] {
  const w: bigint[] = Array.from(block);
  for (let t = 16; t < 80; t++) {
    w.push(add4(smallSigma1(w[t - 2]), w[t - 7], smallSigma0(w[t - 15]), w[t - 16]));
  }
  return w;
}

describe("scheduleBatch", () => {
  const [block] = paddedBlocks("abc");

  it("passes raw block words through for the first two batches", () => {
    const window = new BigUint64Array(block);
    const words = new BigUint64Array(8);
    const next = new BigUint64Array(16);

    scheduleBatch(window, 8, words, next);

    expect(Array.from(words)).toEqual(Array.from(block.subarray(8, 16)));
    expect(Array.from(next)).toEqual(Array.from(block));
  });

  it("reproduces the 80-word schedule batch by batch", () => {
    const expected = fullSchedule(block);
    const window = new BigUint64Array(block);
    const words = new BigUint64Array(8);

    for (let t = 0; t < 80; t += 8) {
      scheduleBatch(window, t, words, window);
      expect(Array.from(words)).toEqual(expected.slice(t, t + 8));
    }
  });

  it("keeps the last 16 schedule words in the window", () => {
    const expected = fullSchedule(block);
    const window = new BigUint64Array(block);
    const words = new BigUint64Array(8);

    for (let t = 0; t <= 24; t += 8) {
      scheduleBatch(window, t, words, window);
    }

    // W[16..31] sit at indices 0..15 after the batch starting at 24
    expect(Array.from(window)).toEqual(expected.slice(16, 32));
  });

  it("is referentially transparent", () => {
    const window = new BigUint64Array(block);
    const wordsA = new BigUint64Array(8);
    const wordsB = new BigUint64Array(8);
    const nextA = new BigUint64Array(16);
    const nextB = new BigUint64Array(16);

    scheduleBatch(window, 16, wordsA, nextA);
    scheduleBatch(window, 16, wordsB, nextB);

    expect(Array.from(wordsA)).toEqual(Array.from(wordsB));
    expect(Array.from(nextA)).toEqual(Array.from(nextB));
    expect(Array.from(window)).toEqual(Array.from(block));
  });

  it("rejects round bases outside 0, 8, ..., 72", () => {
    const window = new BigUint64Array(16);
    const words = new BigUint64Array(8);
    expect(() => scheduleBatch(window, 4, words, window)).toThrow(RangeError);
    expect(() => scheduleBatch(window, 80, words, window)).toThrow(
      "Round base must be a multiple of 8 in [0, 72], got 80",
    );
  });
});
