import { describe, expect, it } from "vitest";
import {
  bytesToBlocks,
  hexToWords,
  readBigEndianWords,
  wordsToBytes,
  wordsToHex,
  writeBigEndianWords,
} from "../src/index.js";
import { padMessage, utf8 } from "./helpers.js";

describe("big-endian words", () => {
  it("reads the most significant byte first", () => {
    const bytes = new Uint8Array([0, 1, 2, 3, 4, 5, 6, 7, 0xff, 0, 0, 0, 0, 0, 0, 0x01]);
    const words = new BigUint64Array(2);
    readBigEndianWords(bytes, 0, words);
    expect(Array.from(words)).toEqual([0x0001020304050607n, 0xff00000000000001n]);
  });

  it("writes at an offset", () => {
    const out = new Uint8Array(10);
    writeBigEndianWords(new BigUint64Array([0x1122334455667788n]), 0, 1, out, 1);
    expect(Array.from(out)).toEqual([0, 0x11, 0x22, 0x33, 0x44, 0x55, 0x66, 0x77, 0x88, 0]);
  });

  it("serializes a hash to 48 bytes", () => {
    const bytes = wordsToBytes(new BigUint64Array(6).fill(0x0102030405060708n));
    expect(bytes.length).toBe(48);
    expect(Array.from(bytes.subarray(40))).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });
});

describe("bytesToBlocks", () => {
  it('splits the padded "abc" message into one block', () => {
    const blocks = bytesToBlocks(padMessage(utf8("abc")));
    expect(blocks.length).toBe(1);
    expect(blocks[0][0]).toBe(0x6162638000000000n);
    expect(blocks[0][15]).toBe(24n);
  });

  it("pads 111 bytes into one block and 112 bytes into two", () => {
    expect(padMessage(new Uint8Array(111)).length).toBe(128);
    expect(padMessage(new Uint8Array(112)).length).toBe(256);
    expect(bytesToBlocks(padMessage(new Uint8Array(112)))[1][15]).toBe(896n);
  });

  it("refuses unpadded input", () => {
    expect(() => bytesToBlocks(new Uint8Array(100))).toThrow(
      "Padded message length must be a multiple of 128 bytes, got 100",
    );
  });
});

describe("hex", () => {
  it("pads every word to 16 digits", () => {
    expect(wordsToHex([1n, 0xabcn])).toBe("00000000000000010000000000000abc");
  });

  it("parses space-separated word groups", () => {
    expect(Array.from(hexToWords("cb00753f45a35e8b b5a03d699ac65007"))).toEqual([
      0xcb00753f45a35e8bn,
      0xb5a03d699ac65007n,
    ]);
  });

  it("rejects partial words and non-hex digits", () => {
    expect(() => hexToWords("abc")).toThrow(RangeError);
    expect(() => hexToWords("zz00000000000000")).toThrow(RangeError);
  });
});
