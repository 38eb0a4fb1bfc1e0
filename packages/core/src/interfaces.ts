/**
 * Subsystem interfaces (ports).
 */
import { Context } from "effect";

// ── RNG ────────────────────────────────────────────────────────────────────
export interface Rng {
  /** Uniform sample in [0, 1). */
  next(): number;
  /** Restart the sequence from `s`. */
  seed(s: number): void;
}

export class RngService extends Context.Tag("RngService")<
  RngService,
  Rng
>() {}
