/**
 * Resettable in-progress batch.
 *
 * Tracks accepted example positions and the running per-side maximum length,
 * and asks its capacity policy whether the next candidate fits.
 */
import { ConfigError } from "@parabatch/core";
import { parseCapacityPolicy, type CapacityPolicy } from "./policy.js";

export class BatchAccumulator {
  readonly capacity: number;
  readonly policy: CapacityPolicy;

  private readonly _positions: number[] = [];
  private readonly _maxLengths: number[] = [];

  constructor(capacity: number, policy: CapacityPolicy | string, sideCount = 0) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigError({ message: `batchCapacity must be a positive integer, got ${capacity}` });
    }
    this.capacity = capacity;
    this.policy = typeof policy === "string" ? parseCapacityPolicy(policy) : policy;
    this.reset(sideCount);
  }

  /** Clear contents and zero the per-side maxima for `sideCount` sides. */
  reset(sideCount: number): void {
    this._positions.length = 0;
    this._maxLengths.length = sideCount;
    this._maxLengths.fill(0);
  }

  /**
   * Try to accept `position`. `lengths` holds one entry per side, already
   * including whatever the caller charges for markers.
   * Returns false and leaves the batch untouched when it does not fit.
   */
  add(position: number, lengths: readonly number[]): boolean {
    this.checkSides(lengths);
    if (!this.policy.admits(this._positions.length, this._maxLengths, lengths, this.capacity)) {
      return false;
    }
    this.accept(position, lengths);
    return true;
  }

  /** Accept `position` regardless of capacity. */
  force(position: number, lengths: readonly number[]): void {
    this.checkSides(lengths);
    this.accept(position, lengths);
  }

  /** Number of accepted examples (sentences, not tokens). */
  get size(): number {
    return this._positions.length;
  }

  get positions(): readonly number[] {
    return this._positions;
  }

  get maxLengths(): readonly number[] {
    return this._maxLengths;
  }

  /** Copy of the accepted positions, safe to keep after `reset`. */
  take(): number[] {
    return [...this._positions];
  }

  private accept(position: number, lengths: readonly number[]): void {
    this._positions.push(position);
    for (let i = 0; i < lengths.length; i++) {
      this._maxLengths[i] = Math.max(this._maxLengths[i], lengths[i]);
    }
  }

  private checkSides(lengths: readonly number[]): void {
    if (lengths.length !== this._maxLengths.length) {
      throw new RangeError(`Expected ${this._maxLengths.length} side lengths, got ${lengths.length}`);
    }
  }
}
