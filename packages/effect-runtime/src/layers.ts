/**
 * Effect layers for dependency injection.
 */
import { Layer } from "effect";
import { RngService, SeededRng } from "@parabatch/core";

// ── RNG Layer ──────────────────────────────────────────────────────────────

export const RngLive = (seed: number) =>
  Layer.succeed(RngService, new SeededRng(seed));
