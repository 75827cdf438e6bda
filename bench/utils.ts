/**
 * Shared benchmark utilities
 */

import { BLOCK_LEN, BLOCK_WORDS } from "../src/index.js";

export interface BenchmarkResult {
  name: string;
  blocksPerSec: number;
  throughput: number; // bytes/ms
  ticks: number;
}

/**
 * SHA-384 padding: 0x80, zeros, then the bit length as a 128-bit big-endian
 * integer, up to a multiple of 128 bytes. The engine itself takes whole blocks.
 */
export function padMessage(data: Uint8Array): Uint8Array {
  const paddedLen = Math.ceil((data.length + 17) / BLOCK_LEN) * BLOCK_LEN;
  const padded = new Uint8Array(paddedLen);
  padded.set(data);
  padded[data.length] = 0x80;
  const view = new DataView(padded.buffer);
  // Upper 64 bits of the length stay zero for any message we can hold
  view.setBigUint64(paddedLen - 8, BigInt(data.length) * 8n, false);
  return padded;
}

export const MIN_DURATION_MS = 1000;
export const WARMUP_ITERATIONS = 3;

/**
 * Random bytes from a seeded generator (mulberry32), so a failing
 * comparison can be replayed with the same seed.
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function generateInput(length: number, random: () => number = Math.random): Uint8Array {
  const input = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    input[i] = (random() * 256) | 0;
  }
  return input;
}

/**
 * Random 16-word blocks. Padding does not matter for throughput.
 */
export function generateBlocks(count: number): BigUint64Array[] {
  const blocks: BigUint64Array[] = [];
  for (let i = 0; i < count; i++) {
    const bytes = generateInput(BLOCK_WORDS * 8);
    blocks.push(new BigUint64Array(bytes.buffer));
  }
  return blocks;
}

export function now(): number {
  return performance.now();
}

/**
 * Run `fn` repeatedly for at least MIN_DURATION_MS.
 *
 * @returns Calls per millisecond
 */
export function benchmark(fn: () => void): number {
  for (let i = 0; i < WARMUP_ITERATIONS; i++) {
    fn();
  }

  let iterations = 0;
  const startTime = now();
  let elapsed = 0;

  while (elapsed < MIN_DURATION_MS) {
    fn();
    iterations++;
    elapsed = now() - startTime;
  }

  return iterations / elapsed;
}

export function formatThroughput(bytesPerMs: number): string {
  const bytesPerSec = bytesPerMs * 1000;
  if (bytesPerSec >= 1e9) {
    return `${(bytesPerSec / 1e9).toFixed(2)} GB/s`;
  } else if (bytesPerSec >= 1e6) {
    return `${(bytesPerSec / 1e6).toFixed(2)} MB/s`;
  } else if (bytesPerSec >= 1e3) {
    return `${(bytesPerSec / 1e3).toFixed(2)} KB/s`;
  }
  return `${bytesPerSec.toFixed(2)} B/s`;
}

export function printTable(results: BenchmarkResult[]): void {
  const nameWidth = 28;
  const colWidth = 14;

  const rule = (left: string, mid: string, right: string) =>
    `${left}${"─".repeat(nameWidth)}${mid}${"─".repeat(colWidth)}${mid}${"─".repeat(colWidth)}${mid}${"─".repeat(colWidth)}${right}`;

  console.log(rule("┌", "┬", "┐"));
  console.log(
    `│ ${"Variant".padEnd(nameWidth - 2)} │ ${"Blocks/s".padEnd(colWidth - 2)} │ ${"Throughput".padEnd(colWidth - 2)} │ ${"Ticks".padEnd(colWidth - 2)} │`,
  );
  console.log(rule("├", "┼", "┤"));

  for (const result of results) {
    const name = result.name.substring(0, nameWidth - 2).padEnd(nameWidth - 2);
    const blocks = result.blocksPerSec.toFixed(0).padEnd(colWidth - 2);
    const throughput = formatThroughput(result.throughput).padEnd(colWidth - 2);
    const ticks = (result.ticks > 0 ? result.ticks.toString() : "-").padEnd(colWidth - 2);
    console.log(`│ ${name} │ ${blocks} │ ${throughput} │ ${ticks} │`);
  }

  console.log(rule("└", "┴", "┘"));
}
