import { describe, expect, it } from "vitest";
import {
  K,
  PIPELINE_DEPTH,
  referenceDigest,
  ROUNDS,
  ROUNDS_PER_STAGE,
  SHA384_IV,
  Sha384Pipeline,
  wordsToHex,
} from "../src/index.js";
import { ABC_HASH, paddedBlocks } from "./helpers.js";

describe("round constants", () => {
  it("has 80 entries matching FIPS 180-4", () => {
    expect(K.length).toBe(ROUNDS);
    expect(K[0]).toBe(0x428a2f98d728ae22n);
    expect(K[1]).toBe(0x7137449123ef65cdn);
    expect(K[2]).toBe(0xb5c0fbcfec4d3b2fn);
    expect(K[63]).toBe(0xc67178f2e372532bn);
    expect(K[64]).toBe(0xca273eceea26619cn);
    expect(K[79]).toBe(0x6c44198c4a475817n);
  });
});

describe("SHA-384 initial digest", () => {
  it("is the SHA-384 IV, not the SHA-512 one", () => {
    expect(wordsToHex(SHA384_IV)).toBe(
      "cbbb9d5dc1059ed8629a292a367cd5079159015a3070dd17152fecd8f70e5939" +
        "67332667ffc00b318eb44a8768581511db0c2e0d64f98fa747b5481dbefa4fa4",
    );
  });
});

describe("exported tables", () => {
  it("cannot be written through", () => {
    expect(Object.isFrozen(K)).toBe(true);
    expect(Object.isFrozen(SHA384_IV)).toBe(true);
    expect(Reflect.set(K, 0, 0n)).toBe(false);
    expect(Reflect.set(SHA384_IV, 0, 0n)).toBe(false);
    expect(K[0]).toBe(0x428a2f98d728ae22n);
    expect(SHA384_IV[0]).toBe(0xcbbb9d5dc1059ed8n);
  });

  it("leaves hashing unaffected by attempted writes", () => {
    Reflect.set(K, 0, 0n);
    Reflect.set(SHA384_IV, 0, 0n);
    const blocks = paddedBlocks("abc");

    const pipeline = new Sha384Pipeline();
    pipeline.tick({ block: blocks[0], useContinuation: false, isFinalBlock: true });
    const [out] = pipeline.drain();

    expect(wordsToHex(out.hash)).toBe(ABC_HASH);
    expect(wordsToHex(referenceDigest(blocks))).toBe(ABC_HASH);
  });
});

describe("pipeline geometry", () => {
  it("covers 80 rounds in ten stages of eight", () => {
    expect(ROUNDS_PER_STAGE).toBe(8);
    expect(PIPELINE_DEPTH).toBe(10);
  });
});
