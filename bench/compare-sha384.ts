/**
 * Comparison: pipelined engine vs unpipelined reference vs @noble/hashes vs node:crypto
 *
 * Hashes random messages of random length with every implementation and
 * reports any mismatch.
 * Run with: npx tsx bench/compare-sha384.ts [--count N] [--max-len N] [--seed N]
 */

import { createHash } from "node:crypto";
import { sha384 as nobleSha384 } from "@noble/hashes/sha512";
import { bytesToHex } from "@noble/hashes/utils";

import { bytesToBlocks, hashPaddedMessages, referenceDigest, wordsToHex } from "../src/index.js";
import { createRandom, generateInput, padMessage } from "./utils.js";

interface Options {
  count: number;
  maxLen: number;
  seed: number;
}

function parseOptions(argv: string[]): Options {
  const options: Options = { count: 20, maxLen: 500, seed: Date.now() >>> 0 };
  for (let i = 0; i < argv.length; i += 2) {
    const value = Number(argv[i + 1]);
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`Expected a non-negative integer after ${argv[i]}, got ${argv[i + 1]}`);
    }
    switch (argv[i]) {
      case "--count":
        options.count = value;
        break;
      case "--max-len":
        options.maxLen = value;
        break;
      case "--seed":
        options.seed = value;
        break;
      default:
        throw new Error(`Unknown option ${argv[i]}`);
    }
  }
  return options;
}

async function main() {
  const options = parseOptions(process.argv.slice(2));
  const random = createRandom(options.seed);

  console.log("=".repeat(60));
  console.log("SHA-384 Implementation Comparison");
  console.log("=".repeat(60));
  console.log(`\nseed ${options.seed}, ${options.count} messages up to ${options.maxLen} bytes\n`);

  const inputs: Uint8Array[] = [];
  for (let i = 0; i < options.count; i++) {
    inputs.push(generateInput(Math.floor(random() * (options.maxLen + 1)), random));
  }

  const padded = inputs.map(padMessage);
  const run = hashPaddedMessages(padded);
  console.log(`Pipeline finished in ${run.ticks} ticks\n`);

  let mismatches = 0;
  inputs.forEach((input, i) => {
    const expected = createHash("sha384").update(input).digest("hex");
    const noble = bytesToHex(nobleSha384(input));
    const reference = wordsToHex(referenceDigest(bytesToBlocks(padded[i])));
    const pipeline = wordsToHex(run.results[i].hash);

    const ok = noble === expected && reference === expected && pipeline === expected;
    if (!ok) {
      mismatches++;
      console.log(`Test ${i} (${input.length}b): MISMATCH`);
      console.log(`  node:crypto: ${expected}`);
      console.log(`  noble:       ${noble}`);
      console.log(`  reference:   ${reference}`);
      console.log(`  pipeline:    ${pipeline}`);
    } else {
      console.log(`Test ${i} (${input.length}b): OK ${expected.slice(0, 16)}...`);
    }
  });

  console.log("\n" + "=".repeat(60));
  if (mismatches === 0) {
    console.log("All implementations match!");
  } else {
    console.log(`${mismatches} of ${inputs.length} messages differ`);
    process.exitCode = 1;
  }
}

main().catch(console.error);
