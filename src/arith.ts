/**
 * 64-bit arithmetic for SHA-384
 *
 * Words are bigints in [0, 2^64). Every function here is pure and total over
 * that range; results are reduced mod 2^64 on the way out.
 */

import { MASK64 } from "./constants.js";

/**
 * Output of a 3:2 compressor. `sum + carry ≡ a + b + c (mod 2^64)`.
 */
export interface CarrySave {
  sum: bigint;
  carry: bigint;
}

export function add2(a: bigint, b: bigint): bigint {
  return (a + b) & MASK64;
}

/**
 * Carry-save adder: reduces three operands to two without propagating carries.
 */
export function csa(a: bigint, b: bigint, c: bigint): CarrySave {
  return {
    sum: a ^ b ^ c,
    carry: (((a & b) | (b & c) | (a & c)) << 1n) & MASK64,
  };
}

export function add3(a: bigint, b: bigint, c: bigint): bigint {
  const r = csa(a, b, c);
  return add2(r.sum, r.carry);
}

/**
 * Two compressor levels, then one carry-propagate add.
 */
export function add4(a: bigint, b: bigint, c: bigint, d: bigint): bigint {
  const r0 = csa(a, b, c);
  const r1 = csa(r0.sum, r0.carry, d);
  return add2(r1.sum, r1.carry);
}

/**
 * Three chained compressors, then one carry-propagate add.
 */
export function add5(a: bigint, b: bigint, c: bigint, d: bigint, e: bigint): bigint {
  const r0 = csa(a, b, c);
  const r1 = csa(r0.sum, r0.carry, d);
  const r2 = csa(r1.sum, r1.carry, e);
  return add2(r2.sum, r2.carry);
}

export function rotr(x: bigint, n: bigint): bigint {
  return ((x >> n) | (x << (64n - n))) & MASK64;
}

export function shr(x: bigint, n: bigint): bigint {
  return x >> n;
}

export function ch(x: bigint, y: bigint, z: bigint): bigint {
  return (x & y) ^ (~x & MASK64 & z);
}

export function maj(x: bigint, y: bigint, z: bigint): bigint {
  return (x & y) ^ (x & z) ^ (y & z);
}

/** Σ0 */
export function bigSigma0(x: bigint): bigint {
  return rotr(x, 28n) ^ rotr(x, 34n) ^ rotr(x, 39n);
}

/** Σ1 */
export function bigSigma1(x: bigint): bigint {
  return rotr(x, 14n) ^ rotr(x, 18n) ^ rotr(x, 41n);
}

/** σ0 */
export function smallSigma0(x: bigint): bigint {
  return rotr(x, 1n) ^ rotr(x, 8n) ^ shr(x, 7n);
}

/** σ1 */
export function smallSigma1(x: bigint): bigint {
  return rotr(x, 19n) ^ rotr(x, 61n) ^ shr(x, 6n);
}
