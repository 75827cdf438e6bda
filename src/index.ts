/**
 * SHA-384 - A pipelined compression engine, one block per tick
 *
 * Features:
 * - Ten-stage pipeline, eight rounds per stage, fixed ten-tick latency
 * - Multi-block messages chained through continuation digests
 * - Replicated lanes for independent messages
 * - Carry-save multi-operand 64-bit addition
 * - Unpipelined reference compressor for cross-checking
 *
 * Messages must already be padded to whole 1024-bit blocks.
 *
 * @example
 * ```typescript
 * import { hashPaddedMessages, wordsToHex } from "sha384-pipeline";
 *
 * // Many messages at once, four lanes
 * const { results } = hashPaddedMessages(paddedMessages);
 * console.log(wordsToHex(results[0].hash));
 *
 * // Driving one pipeline by hand
 * const pipeline = createPipeline();
 * pipeline.tick({ block, useContinuation: false, isFinalBlock: true });
 * const [out] = pipeline.drain();
 * ```
 */

// Core exports
export {
  add2,
  add3,
  add4,
  add5,
  csa,
  rotr,
  shr,
  ch,
  maj,
  bigSigma0,
  bigSigma1,
  smallSigma0,
  smallSigma1,
  type CarrySave,
} from "./arith.js";
export {
  K,
  SHA384_IV,
  BLOCK_WORDS,
  BLOCK_LEN,
  DIGEST_WORDS,
  HASH_WORDS,
  HASH_LEN,
  ROUNDS,
  ROUNDS_PER_STAGE,
  PIPELINE_DEPTH,
  DEFAULT_ENGINE_COUNT,
} from "./constants.js";
export { scheduleBatch } from "./schedule.js";
export { roundBank } from "./round.js";
export {
  Sha384Pipeline,
  type AdmissionInput,
  type TickOutput,
  type StageSlot,
  type MessageId,
} from "./pipeline.js";
export { ReplicatedSha384Engine, type LaneView } from "./engine.js";
export { compressBlock, referenceDigest } from "./reference.js";
export {
  hashPaddedMessages,
  type PaddedMessage,
  type HashOptions,
  type HashRun,
  type Sha384Result,
} from "./driver.js";
export {
  readBigEndianWords,
  writeBigEndianWords,
  wordsToBytes,
  bytesToBlocks,
  wordsToHex,
  hexToWords,
} from "./utils.js";

// Convenience imports
import { DEFAULT_ENGINE_COUNT } from "./constants.js";
import { ReplicatedSha384Engine } from "./engine.js";
import { Sha384Pipeline } from "./pipeline.js";

/**
 * Create a single pipeline.
 */
export function createPipeline(): Sha384Pipeline {
  return new Sha384Pipeline();
}

/**
 * Create a replicated engine.
 *
 * @param count - Number of independent lanes
 *
 * @example
 * ```typescript
 * const engine = createEngine(8);
 * const outputs = engine.tick([inputForLane0, undefined, inputForLane2]);
 * ```
 */
export function createEngine(count: number = DEFAULT_ENGINE_COUNT): ReplicatedSha384Engine {
  return new ReplicatedSha384Engine(count);
}

// Import for default export
import { hashPaddedMessages } from "./driver.js";
import { referenceDigest } from "./reference.js";

// Default export for convenience
export default {
  hashPaddedMessages,
  referenceDigest,
  Sha384Pipeline,
  ReplicatedSha384Engine,
  createPipeline,
  createEngine,
};
