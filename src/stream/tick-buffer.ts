/**
 * Tick Buffer
 *
 * Fixed-capacity ring of ticks awaiting a drain. Every operation completes
 * synchronously, so a drain can never observe a half-applied push.
 */

import type { Tick } from "../lib/trade/types.js";
import type { OverflowPolicy } from "./types.js";

export const DEFAULT_BUFFER_CAPACITY = 100_000;

export class TickBuffer {
  private readonly slots: (Tick | undefined)[];
  private head = 0;
  private length = 0;
  private droppedCount = 0;

  constructor(
    readonly capacity: number = DEFAULT_BUFFER_CAPACITY,
    readonly overflowPolicy: OverflowPolicy = "evict-oldest"
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<Tick | undefined>(capacity);
  }

  get size(): number {
    return this.length;
  }

  /** Ticks lost to overflow since creation */
  get dropped(): number {
    return this.droppedCount;
  }

  /**
   * @returns false when the tick was rejected because the buffer is full
   */
  push(tick: Tick): boolean {
    if (this.length === this.capacity) {
      this.droppedCount++;
      if (this.overflowPolicy === "reject-newest") return false;
      // Overwrite the oldest slot and advance
      this.slots[this.head] = tick;
      this.head = (this.head + 1) % this.capacity;
      return true;
    }

    this.slots[(this.head + this.length) % this.capacity] = tick;
    this.length++;
    return true;
  }

  /**
   * Copy buffered ticks in arrival order, optionally emptying the buffer
   */
  drain(clear = true): Tick[] {
    const out: Tick[] = [];
    for (let i = 0; i < this.length; i++) {
      const tick = this.slots[(this.head + i) % this.capacity];
      if (tick) out.push(tick);
    }
    if (clear) this.clear();
    return out;
  }

  /**
   * Put ticks back at the front, ahead of anything buffered since they were drained.
   * Ticks that do not fit are counted as dropped.
   */
  restore(ticks: readonly Tick[]): void {
    const newer = this.drain(true);
    const combined = [...ticks, ...newer];
    const overflow = Math.max(0, combined.length - this.capacity);
    const kept = this.overflowPolicy === "evict-oldest" ? combined.slice(overflow) : combined.slice(0, this.capacity);
    this.droppedCount += overflow;
    for (const tick of kept) this.push(tick);
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.length = 0;
  }
}
