/**
 * Seeded PRNG (xorshift128+) for reproducibility, plus the shuffles built on it.
 */
import type { Rng } from "./interfaces.js";

export class SeededRng implements Rng {
  private _s0: number;
  private _s1: number;

  constructor(seed = 42) {
    this._s0 = seed;
    this._s1 = seed ^ 0xdeadbeef;
    // Warm up
    for (let i = 0; i < 20; i++) this.next();
  }

  seed(s: number): void {
    this._s0 = s;
    this._s1 = s ^ 0xdeadbeef;
    for (let i = 0; i < 20; i++) this.next();
  }

  /** Returns a number in [0, 1). */
  next(): number {
    let s1 = this._s0;
    const s0 = this._s1;
    this._s0 = s0;
    s1 ^= s1 << 23;
    s1 ^= s1 >>> 17;
    s1 ^= s0;
    s1 ^= s0 >>> 26;
    this._s1 = s1;
    // Map to [0, 1)
    return ((this._s0 + this._s1) >>> 0) / 0x100000000;
  }
}

/** Fisher-Yates shuffle driven by `rng`. Mutates and returns `items`. */
export function shuffleInPlace<T>(items: T[], rng: Rng): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(rng.next() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

/** Uniformly random permutation of `0..n-1`. */
export function permutation(n: number, rng: Rng): number[] {
  const out = new Array<number>(n);
  for (let i = 0; i < n; i++) out[i] = i;
  return shuffleInPlace(out, rng);
}
