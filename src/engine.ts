/**
 * N independent SHA-384 pipelines stepped in lockstep.
 *
 * Lanes share nothing: each has its own slots, tick counter and message
 * guard, so throughput grows linearly with the lane count when there are
 * enough independent messages to keep every lane fed.
 */

import { DEFAULT_ENGINE_COUNT } from "./constants.js";
import {
  Sha384Pipeline,
  type AdmissionInput,
  type MessageId,
  type StageSlot,
  type TickOutput,
} from "./pipeline.js";

/**
 * Read-only view of one lane. Lanes advance only through
 * `ReplicatedSha384Engine.tick`, which keeps them on the same tick.
 */
export interface LaneView {
  readonly tickCount: number;
  readonly inFlight: number;
  readonly isIdle: boolean;
  isInFlight(messageId: MessageId): boolean;
  occupancy(): boolean[];
  slotAt(position: number): StageSlot;
}

function viewOf(lane: Sha384Pipeline): LaneView {
  return Object.freeze({
    get tickCount() {
      return lane.tickCount;
    },
    get inFlight() {
      return lane.inFlight;
    },
    get isIdle() {
      return lane.isIdle;
    },
    isInFlight: (messageId: MessageId) => lane.isInFlight(messageId),
    occupancy: () => lane.occupancy(),
    slotAt: (position: number) => lane.slotAt(position),
  });
}

export class ReplicatedSha384Engine {
  private lanes: Sha384Pipeline[];
  private views: LaneView[];
  private ticks = 0;

  /**
   * @param count - Number of lanes (default: 4)
   */
  constructor(count: number = DEFAULT_ENGINE_COUNT) {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`Engine count must be a positive integer, got ${count}`);
    }
    this.lanes = [];
    for (let i = 0; i < count; i++) {
      this.lanes.push(new Sha384Pipeline());
    }
    this.views = this.lanes.map(viewOf);
  }

  get size(): number {
    return this.lanes.length;
  }

  get isIdle(): boolean {
    return this.lanes.every((lane) => lane.isIdle);
  }

  get tickCount(): number {
    return this.ticks;
  }

  lane(index: number): LaneView {
    const view = this.views[index];
    if (view === undefined) {
      throw new RangeError(`Lane index must be in [0, ${this.lanes.length - 1}], got ${index}`);
    }
    return view;
  }

  /**
   * Advance every lane by one tick.
   *
   * @param inputs - Admission for each lane by index; missing or undefined entries admit nothing
   * @returns One output per lane
   */
  tick(inputs: ReadonlyArray<AdmissionInput | undefined> = []): TickOutput[] {
    if (inputs.length > this.lanes.length) {
      throw new RangeError(`Got ${inputs.length} inputs for ${this.lanes.length} lanes`);
    }
    // Validate everything first so a bad input on one lane cannot leave
    // the lanes a tick apart.
    for (let i = 0; i < inputs.length; i++) {
      const input = inputs[i];
      if (input !== undefined) this.lanes[i].validate(input);
    }
    const outputs = this.lanes.map((lane, i) => lane.tick(inputs[i]));
    this.ticks++;
    return outputs;
  }

  reset(): void {
    for (const lane of this.lanes) {
      lane.reset();
    }
    this.ticks = 0;
  }
}
