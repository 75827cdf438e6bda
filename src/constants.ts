/**
 * SHA-384 constants and pipeline geometry.
 *
 * The round constants and initial digest are derived at module load from
 * their FIPS 180-4 definitions instead of being spelled out as tables.
 */

/** Words per 1024-bit message block */
export const BLOCK_WORDS = 16;

/** Bytes per message block */
export const BLOCK_LEN = 128;

/** Words in the running digest (a..h) */
export const DIGEST_WORDS = 8;

/** Words exposed as the final SHA-384 hash */
export const HASH_WORDS = 6;

/** Bytes in the final SHA-384 hash */
export const HASH_LEN = 48;

/** Total compression rounds per block */
export const ROUNDS = 80;

/** Rounds evaluated by one stage in one tick */
export const ROUNDS_PER_STAGE = 8;

/** Number of stages; a block retires this many ticks after admission */
export const PIPELINE_DEPTH = ROUNDS / ROUNDS_PER_STAGE;

/** Lanes used by the replicated engine when no count is given */
export const DEFAULT_ENGINE_COUNT = 4;

export const MASK64 = (1n << 64n) - 1n;

function firstPrimes(count: number): number[] {
  const primes: number[] = [];
  for (let candidate = 2; primes.length < count; candidate++) {
    let isPrime = true;
    for (const p of primes) {
      if (p * p > candidate) break;
      if (candidate % p === 0) {
        isPrime = false;
        break;
      }
    }
    if (isPrime) primes.push(candidate);
  }
  return primes;
}

/**
 * Integer k-th root: floor(n^(1/k)) by Newton's method.
 * Starts from a power of two above the root so the iteration descends monotonically.
 */
function integerRoot(n: bigint, k: bigint): bigint {
  const bits = BigInt(n.toString(2).length);
  let x = 1n << ((bits + k - 1n) / k);
  for (;;) {
    const y = ((k - 1n) * x + n / x ** (k - 1n)) / k;
    if (y >= x) return x;
    x = y;
  }
}

/**
 * First 64 fractional bits of p^(1/k): floor(p^(1/k) * 2^64) mod 2^64.
 */
function fractionalRootBits(p: number, k: bigint): bigint {
  return integerRoot(BigInt(p) << (64n * k), k) & MASK64;
}

const PRIMES = firstPrimes(ROUNDS);

/**
 * Round constants K[0..79]: cube roots of the first 80 primes.
 * The engine reads this table; it is not exported from the package.
 */
export const ROUND_CONSTANTS: BigUint64Array = BigUint64Array.from(PRIMES, (p) =>
  fractionalRootBits(p, 3n),
);

/**
 * SHA-384 initial digest: square roots of the 9th through 16th primes (23..53).
 * Differs from the SHA-512 IV, which uses the first eight primes.
 * The engine reads this table; it is not exported from the package.
 */
export const INITIAL_DIGEST: BigUint64Array = BigUint64Array.from(PRIMES.slice(8, 16), (p) =>
  fractionalRootBits(p, 2n),
);

/** Frozen copy of the round constants */
export const K: readonly bigint[] = Object.freeze(Array.from(ROUND_CONSTANTS));

/** Frozen copy of the SHA-384 initial digest */
export const SHA384_IV: readonly bigint[] = Object.freeze(Array.from(INITIAL_DIGEST));
