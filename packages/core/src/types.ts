/**
 * Core types for the parabatch system.
 */

// ── Dtype ──────────────────────────────────────────────────────────────────
export type Dtype = "i32";

// ── Shape ──────────────────────────────────────────────────────────────────
export type Shape = readonly number[];

// ── Tensor (lightweight handle) ────────────────────────────────────────────
export interface TensorData {
  readonly shape: Shape;
  readonly dtype: Dtype;
  readonly data: Int32Array;
}

// ── Batching config ────────────────────────────────────────────────────────

/** How the in-progress batch is charged: by example count or by padded token slots. */
export type CapacityPolicyName = "sentences" | "tokens";

export interface BatchingConfig {
  /** Examples per shard; 0 keeps the whole corpus in one shard. */
  readonly shardSize: number;
  /** Sentences per batch, or padded tokens per side under the token policy. */
  readonly batchCapacity: number;
  readonly capacityPolicy: CapacityPolicyName;
  /** Examples longer than this on any side are skipped; 0 disables filtering. */
  readonly maxExampleLength: number;
}

export const defaultBatchingConfig: BatchingConfig = {
  shardSize: 500_000,
  batchCapacity: 4096,
  capacityPolicy: "tokens",
  maxExampleLength: 100,
};
