/**
 * Padding and per-pass statistics for yielded batches.
 */
import type { TensorData } from "@parabatch/core";
import { PAD_ID } from "@parabatch/vocab";
import type { ParallelBatch } from "./engine.js";

/** Right-pad one side's sequences into an `[B, T]` i32 tensor, T = longest sequence. */
export function padBatch(sequences: readonly ArrayLike<number>[], padId: number): TensorData {
  const B = sequences.length;
  let T = 0;
  for (const seq of sequences) T = Math.max(T, seq.length);

  const data = new Int32Array(B * T).fill(padId);
  for (let b = 0; b < B; b++) {
    const seq = sequences[b];
    for (let t = 0; t < seq.length; t++) data[b * T + t] = seq[t];
  }
  return { shape: [B, T], dtype: "i32", data };
}

export interface SideSummary {
  /** Ids emitted, markers included. */
  readonly tokens: number;
  /** `B * T` summed over batches. */
  readonly paddedTokens: number;
  /** tokens / paddedTokens, or 0 for an empty pass. */
  readonly efficiency: number;
}

export interface EpochSummary {
  readonly batches: number;
  readonly examples: number;
  readonly largestBatch: number;
  readonly sides: readonly SideSummary[];
}

export function summarizeEpoch(batches: Iterable<ParallelBatch>): EpochSummary {
  let count = 0;
  let examples = 0;
  let largestBatch = 0;
  const tokens: number[] = [];
  const padded: number[] = [];

  for (const batch of batches) {
    count++;
    examples += batch.positions.length;
    largestBatch = Math.max(largestBatch, batch.positions.length);
    batch.sides.forEach((seqs, n) => {
      let real = 0;
      for (const seq of seqs) real += seq.length;
      tokens[n] = (tokens[n] ?? 0) + real;
      padded[n] = (padded[n] ?? 0) + padBatch(seqs, PAD_ID).data.length;
    });
  }

  return {
    batches: count,
    examples,
    largestBatch,
    sides: tokens.map((t, n) => ({
      tokens: t,
      paddedTokens: padded[n],
      efficiency: padded[n] > 0 ? t / padded[n] : 0,
    })),
  };
}
