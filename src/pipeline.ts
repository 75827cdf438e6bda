/**
 * SHA-384 Pipeline - ten stages of eight rounds, one block per tick
 *
 * Every tick the block in the last stage retires, every other block moves one
 * stage forward and runs its eight rounds, and a new block may enter stage 0.
 * There is no backpressure and no stalling: a block admitted on tick `a`
 * retires on tick `a + PIPELINE_DEPTH`, in admission order.
 *
 * @example
 * ```typescript
 * const pipeline = new Sha384Pipeline();
 * pipeline.tick({ block, useContinuation: false, isFinalBlock: true });
 * for (const out of pipeline.drain()) {
 *   if (out.hashValid) console.log(wordsToHex(out.hash));
 * }
 * ```
 */

import { add2 } from "./arith.js";
import {
  BLOCK_WORDS,
  DIGEST_WORDS,
  HASH_WORDS,
  INITIAL_DIGEST,
  MASK64,
  PIPELINE_DEPTH,
  ROUND_CONSTANTS,
  ROUNDS_PER_STAGE,
} from "./constants.js";
import { roundBank } from "./round.js";
import { scheduleBatch } from "./schedule.js";

/** Caller-chosen tag for the message a block belongs to */
export type MessageId = string | number;

/**
 * One block offered for admission on a tick.
 */
export interface AdmissionInput {
  /** 16 already padded words */
  block: ArrayLike<bigint>;
  /** Start from `continuationDigest` instead of the SHA-384 IV */
  useContinuation: boolean;
  /** Digest emitted by the previous block of the same message */
  continuationDigest?: ArrayLike<bigint>;
  /** Emit the 384-bit hash when this block retires */
  isFinalBlock: boolean;
  /**
   * Optional message tag. Echoed on retirement, and while a block with this
   * tag is in flight no other block with the same tag is admitted.
   */
  messageId?: MessageId;
}

/**
 * What the pipeline emits on one tick. The word arrays are zero-filled when
 * the matching valid flag is false.
 */
export interface TickOutput {
  /** Tick number this output was produced on */
  tick: number;
  continuationValid: boolean;
  continuationDigest: BigUint64Array;
  hashValid: boolean;
  hash: BigUint64Array;
  messageId: MessageId | undefined;
}

/**
 * Contents of one pipeline position.
 */
export interface StageSlot {
  valid: boolean;
  isFinalBlock: boolean;
  /** Digest the block started from; fixed from admission until retirement */
  digestCarry: BigUint64Array;
  /** Working variables a..h */
  workingState: BigUint64Array;
  /** Last 16 schedule words, W[i] at index i mod 16 */
  scheduleWindow: BigUint64Array;
  messageId: MessageId | undefined;
  /** Tick the block entered stage 0 */
  admittedAt: number;
}

const LAST_STAGE = PIPELINE_DEPTH - 1;

// Per-stage scratch, reused across stages and pipelines (single-threaded)
const stageWords = new BigUint64Array(ROUNDS_PER_STAGE);
const stageKw = new BigUint64Array(ROUNDS_PER_STAGE);

function createSlot(): StageSlot {
  return {
    valid: false,
    isFinalBlock: false,
    digestCarry: new BigUint64Array(DIGEST_WORDS),
    workingState: new BigUint64Array(DIGEST_WORDS),
    scheduleWindow: new BigUint64Array(BLOCK_WORDS),
    messageId: undefined,
    admittedAt: -1,
  };
}

/**
 * Run one stage's eight rounds on a slot, in place.
 */
function runStage(slot: StageSlot, position: number): void {
  const roundBase = position * ROUNDS_PER_STAGE;
  scheduleBatch(slot.scheduleWindow, roundBase, stageWords, slot.scheduleWindow);
  for (let r = 0; r < ROUNDS_PER_STAGE; r++) {
    stageKw[r] = add2(ROUND_CONSTANTS[roundBase + r], stageWords[r]);
  }
  roundBank(slot.workingState, stageKw, slot.workingState);
}

function checkWords(words: ArrayLike<bigint>, expected: number, what: string): void {
  if (words.length !== expected) {
    throw new RangeError(`${what} must be ${expected} words, got ${words.length}`);
  }
  for (let i = 0; i < expected; i++) {
    const w: unknown = words[i];
    if (typeof w !== "bigint") {
      throw new TypeError(`${what} word ${i} is not a bigint: ${String(w)}`);
    }
    if (w < 0n || w > MASK64) {
      throw new RangeError(`${what} word ${i} is not an unsigned 64-bit value: ${w}`);
    }
  }
}

/**
 * A single SHA-384 compression pipeline.
 */
export class Sha384Pipeline {
  private slots: StageSlot[];
  private ticks: number;
  private inFlightMessages: Set<MessageId>;

  constructor() {
    this.slots = [];
    for (let i = 0; i < PIPELINE_DEPTH; i++) {
      this.slots.push(createSlot());
    }
    this.ticks = 0;
    this.inFlightMessages = new Set();
  }

  /** Number of ticks run since construction or the last reset */
  get tickCount(): number {
    return this.ticks;
  }

  /** Number of valid slots */
  get inFlight(): number {
    let count = 0;
    for (const slot of this.slots) {
      if (slot.valid) count++;
    }
    return count;
  }

  get isIdle(): boolean {
    return this.inFlight === 0;
  }

  /**
   * Whether a block tagged `messageId` is currently between admission and retirement.
   */
  isInFlight(messageId: MessageId): boolean {
    return this.inFlightMessages.has(messageId);
  }

  /**
   * Valid flag of each position, stage 0 first.
   */
  occupancy(): boolean[] {
    return this.slots.map((slot) => slot.valid);
  }

  /**
   * Copy of the slot at a position.
   */
  slotAt(position: number): StageSlot {
    const slot = this.slots[position];
    if (slot === undefined) {
      throw new RangeError(`Position must be in [0, ${LAST_STAGE}], got ${position}`);
    }
    return {
      ...slot,
      digestCarry: new BigUint64Array(slot.digestCarry),
      workingState: new BigUint64Array(slot.workingState),
      scheduleWindow: new BigUint64Array(slot.scheduleWindow),
    };
  }

  /**
   * Invalidate every slot and restart the tick counter.
   */
  reset(): void {
    for (const slot of this.slots) {
      slot.valid = false;
      slot.messageId = undefined;
      slot.admittedAt = -1;
    }
    this.ticks = 0;
    this.inFlightMessages.clear();
  }

  /**
   * Throw if `input` cannot be admitted on the next tick.
   */
  validate(input: AdmissionInput): void {
    checkWords(input.block, BLOCK_WORDS, "Block");

    if (input.useContinuation) {
      if (input.continuationDigest === undefined) {
        throw new TypeError("useContinuation is set but no continuationDigest was given");
      }
      checkWords(input.continuationDigest, DIGEST_WORDS, "Continuation digest");
    } else if (input.continuationDigest !== undefined) {
      throw new TypeError("continuationDigest was given but useContinuation is not set");
    }

    if (input.messageId !== undefined && this.inFlightMessages.has(input.messageId)) {
      throw new Error(
        `Message ${String(input.messageId)} already has a block in flight; ` +
          `wait for its continuation digest before admitting the next block`,
      );
    }
  }

  /**
   * Advance the pipeline by one tick, optionally admitting a block.
   *
   * The input is validated before any state changes, so a rejected block
   * leaves the pipeline exactly as it was.
   */
  tick(input?: AdmissionInput): TickOutput {
    if (input !== undefined) this.validate(input);

    const now = this.ticks;
    const output = this.retire(now);

    // Shift every slot one position down the pipe; the retired slot's
    // buffers are reused for the incoming block.
    const recycled = this.slots[LAST_STAGE];
    for (let i = LAST_STAGE; i > 0; i--) {
      const slot = this.slots[i - 1];
      this.slots[i] = slot;
      if (slot.valid) runStage(slot, i);
    }
    this.slots[0] = recycled;

    if (input !== undefined) {
      this.admit(recycled, input, now);
      runStage(recycled, 0);
    } else {
      recycled.valid = false;
      recycled.messageId = undefined;
      recycled.admittedAt = -1;
    }

    this.ticks = now + 1;
    return output;
  }

  /**
   * Tick without admitting until every in-flight block has retired.
   *
   * @returns The outputs that carried a retired block, in order
   */
  drain(): TickOutput[] {
    const retired: TickOutput[] = [];
    while (!this.isIdle) {
      const out = this.tick();
      if (out.continuationValid) retired.push(out);
    }
    return retired;
  }

  private admit(slot: StageSlot, input: AdmissionInput, now: number): void {
    const start =
      input.useContinuation && input.continuationDigest !== undefined
        ? input.continuationDigest
        : INITIAL_DIGEST;
    slot.digestCarry.set(start);
    slot.workingState.set(start);
    slot.scheduleWindow.set(input.block);
    slot.valid = true;
    slot.isFinalBlock = input.isFinalBlock;
    slot.messageId = input.messageId;
    slot.admittedAt = now;

    if (input.messageId !== undefined) {
      this.inFlightMessages.add(input.messageId);
    }
  }

  private retire(now: number): TickOutput {
    const slot = this.slots[LAST_STAGE];
    const output: TickOutput = {
      tick: now,
      continuationValid: false,
      continuationDigest: new BigUint64Array(DIGEST_WORDS),
      hashValid: false,
      hash: new BigUint64Array(HASH_WORDS),
      messageId: undefined,
    };
    if (!slot.valid) return output;

    // Davies-Meyer feed-forward
    for (let k = 0; k < DIGEST_WORDS; k++) {
      output.continuationDigest[k] = add2(slot.digestCarry[k], slot.workingState[k]);
    }
    output.continuationValid = true;
    output.messageId = slot.messageId;

    if (slot.isFinalBlock) {
      output.hash.set(output.continuationDigest.subarray(0, HASH_WORDS));
      output.hashValid = true;
    }

    if (slot.messageId !== undefined) {
      this.inFlightMessages.delete(slot.messageId);
    }
    slot.valid = false;
    return output;
  }
}
