/**
 * Feed many padded messages through a replicated engine.
 *
 * Messages are dealt round-robin to lanes. On every tick each lane admits at
 * most one block, taken from the first of its messages that has no block in
 * flight. A message's next block therefore always starts from the
 * continuation digest its previous block emitted, while blocks of different
 * messages fill the rest of the pipeline.
 */

import { DEFAULT_ENGINE_COUNT } from "./constants.js";
import { ReplicatedSha384Engine } from "./engine.js";
import type { AdmissionInput } from "./pipeline.js";
import { bytesToBlocks, wordsToBytes } from "./utils.js";

/**
 * A message that has already been padded: raw bytes (a multiple of 128 long)
 * or its 16-word blocks.
 */
export type PaddedMessage = Uint8Array | ReadonlyArray<ArrayLike<bigint>>;

export interface HashOptions {
  /** Number of pipeline lanes (default: 4) */
  engines?: number;
}

export interface Sha384Result {
  /** Position of the message in the input */
  index: number;
  /** 6-word hash */
  hash: BigUint64Array;
  /** 48-byte digest */
  digest: Uint8Array;
  /** Ticks from the first block's admission to the hash */
  latency: number;
}

export interface HashRun {
  /** One result per message, in input order */
  results: Sha384Result[];
  /** Ticks the engine ran */
  ticks: number;
}

interface MessageJob {
  index: number;
  blocks: ReadonlyArray<ArrayLike<bigint>>;
  nextBlock: number;
  digest: BigUint64Array | undefined;
  inFlight: boolean;
  firstAdmittedAt: number;
}

function toBlocks(message: PaddedMessage, index: number): ReadonlyArray<ArrayLike<bigint>> {
  const blocks = message instanceof Uint8Array ? bytesToBlocks(message) : message;
  if (blocks.length === 0) {
    throw new RangeError(`Message ${index} has no blocks`);
  }
  return blocks;
}

function nextAdmission(jobs: MessageJob[]): MessageJob | undefined {
  for (const job of jobs) {
    if (!job.inFlight && job.nextBlock < job.blocks.length) return job;
  }
  return undefined;
}

function admissionFor(job: MessageJob): AdmissionInput {
  const isFinalBlock = job.nextBlock === job.blocks.length - 1;
  const block = job.blocks[job.nextBlock];
  return job.digest === undefined
    ? { block, useContinuation: false, isFinalBlock, messageId: job.index }
    : {
        block,
        useContinuation: true,
        continuationDigest: job.digest,
        isFinalBlock,
        messageId: job.index,
      };
}

/**
 * Hash a batch of padded messages.
 *
 * @example
 * ```typescript
 * const { results } = hashPaddedMessages([paddedA, paddedB], { engines: 2 });
 * console.log(wordsToHex(results[0].hash));
 * ```
 */
export function hashPaddedMessages(
  messages: ReadonlyArray<PaddedMessage>,
  options: HashOptions = {},
): HashRun {
  const engine = new ReplicatedSha384Engine(options.engines ?? DEFAULT_ENGINE_COUNT);
  const laneJobs: MessageJob[][] = Array.from({ length: engine.size }, () => []);
  const jobs: MessageJob[] = messages.map((message, index) => ({
    index,
    blocks: toBlocks(message, index),
    nextBlock: 0,
    digest: undefined,
    inFlight: false,
    firstAdmittedAt: -1,
  }));
  for (const job of jobs) {
    laneJobs[job.index % engine.size].push(job);
  }

  const results: Sha384Result[] = new Array(jobs.length);
  let remaining = jobs.length;

  while (remaining > 0) {
    const now = engine.tickCount;
    const inputs = laneJobs.map((pending) => {
      const job = nextAdmission(pending);
      if (job === undefined) return undefined;
      const input = admissionFor(job);
      job.inFlight = true;
      job.nextBlock++;
      if (job.firstAdmittedAt < 0) job.firstAdmittedAt = now;
      return input;
    });

    const outputs = engine.tick(inputs);

    for (let lane = 0; lane < outputs.length; lane++) {
      const out = outputs[lane];
      if (!out.continuationValid || typeof out.messageId !== "number") continue;
      const job = jobs[out.messageId];
      job.inFlight = false;
      job.digest = out.continuationDigest;

      if (out.hashValid) {
        results[job.index] = {
          index: job.index,
          hash: out.hash,
          digest: wordsToBytes(out.hash),
          latency: out.tick - job.firstAdmittedAt,
        };
        remaining--;
      }
    }

    // Drop finished messages so lanes stop scanning them
    for (let lane = 0; lane < laneJobs.length; lane++) {
      laneJobs[lane] = laneJobs[lane].filter(
        (job) => job.inFlight || job.nextBlock < job.blocks.length,
      );
    }
  }

  return { results, ticks: engine.tickCount };
}
