/**
 * Dynamic batching over an aligned parallel corpus.
 *
 * Each pass shuffles example positions, cuts them into shards, and per shard
 * filters over-long examples, sorts by side-0 length, greedily packs batches
 * under the capacity policy, and yields the shard's batches in random order.
 * Sorting keeps padding low inside a batch; the two shuffles keep batch
 * composition and order random across passes.
 */
import { Effect, Stream } from "effect";
import {
  ConfigError,
  ValidationError,
  RngService,
  permutation,
  defaultBatchingConfig,
  type BatchingConfig,
  type CorpusReadError,
  type Rng,
} from "@parabatch/core";
import { withSpan } from "@parabatch/effect-runtime";
import type { VocabularyTable } from "@parabatch/vocab";
import { BatchAccumulator } from "./accumulator.js";
import { validateBatchingConfig } from "./config.js";
import { readCorpusSide } from "./corpus.js";
import { parseCapacityPolicy, type CapacityPolicy } from "./policy.js";

/** One aligned corpus side: its vocabulary and its examples as raw ids (no markers). */
export interface CorpusSide {
  readonly vocab: VocabularyTable;
  readonly examples: readonly Int32Array[];
  readonly path?: string;
}

export interface ParallelBatch {
  /** Original example positions, in batch order. */
  readonly positions: readonly number[];
  /** `sides[n][k]` is `[bos, ...ids, eos]` of `positions[k]` on side n. */
  readonly sides: readonly (readonly Int32Array[])[];
}

/** Slots charged per example for the begin and end markers. */
const MARKER_SLOTS = 2;

function nonParallel(side: number, count: number, expected: number): ValidationError {
  return new ValidationError({
    message: `Non parallel corpus in dataset: side ${side} has ${count} examples, side 0 has ${expected}`,
  });
}

function wrap(ids: Int32Array, bos: number, eos: number): Int32Array {
  const out = new Int32Array(ids.length + MARKER_SLOTS);
  out[0] = bos;
  out.set(ids, 1);
  out[ids.length + 1] = eos;
  return out;
}

export class CorpusBatchingEngine {
  readonly config: BatchingConfig;
  private readonly _sides: readonly CorpusSide[];
  private readonly _policy: CapacityPolicy;

  constructor(sides: readonly CorpusSide[], config: BatchingConfig = defaultBatchingConfig) {
    validateBatchingConfig(config);
    for (let n = 1; n < sides.length; n++) {
      if (sides[n].examples.length !== sides[0].examples.length) {
        throw nonParallel(n, sides[n].examples.length, sides[0].examples.length);
      }
    }
    this.config = { ...config };
    // Sides are copied; the caller's arrays may change after construction.
    this._sides = sides.map((side) => ({ ...side, examples: [...side.examples] }));
    this._policy = parseCapacityPolicy(config.capacityPolicy);
  }

  /**
   * Read `paths[n]` through `vocabs[n]` for every side. The same table may be
   * passed for several sides.
   */
  static load(
    paths: readonly string[],
    vocabs: readonly VocabularyTable[],
    config: BatchingConfig = defaultBatchingConfig,
  ): Effect.Effect<CorpusBatchingEngine, ConfigError | CorpusReadError | ValidationError> {
    const program = Effect.gen(function* () {
      if (paths.length !== vocabs.length) {
        return yield* Effect.fail(
          new ConfigError({
            message: `Use as many corpora as vocabularies (${paths.length} corpora, ${vocabs.length} vocabularies)`,
          }),
        );
      }
      yield* Effect.try({
        try: () => validateBatchingConfig(config),
        catch: (cause) =>
          cause instanceof ConfigError ? cause : new ConfigError({ message: String(cause), cause }),
      });

      const sides: CorpusSide[] = [];
      for (let n = 0; n < paths.length; n++) {
        const examples = yield* readCorpusSide(paths[n], vocabs[n]);
        if (n > 0 && examples.length !== sides[0].examples.length) {
          return yield* Effect.fail(nonParallel(n, examples.length, sides[0].examples.length));
        }
        sides.push({ vocab: vocabs[n], examples, path: paths[n] });
      }
      return new CorpusBatchingEngine(sides, config);
    });
    return withSpan("corpus.load", program);
  }

  get sideCount(): number {
    return this._sides.length;
  }

  /** Number of aligned examples. */
  get size(): number {
    return this._sides.length === 0 ? 0 : this._sides[0].examples.length;
  }

  get sides(): readonly CorpusSide[] {
    return this._sides;
  }

  /** Raw ids (no markers) of `position` on `side`. */
  example(side: number, position: number): Int32Array {
    return this._sides[side].examples[position];
  }

  /**
   * One freshly shuffled pass, produced lazily. Each call reshuffles.
   * Throws `ValidationError` on the first pull when the corpus is empty.
   */
  *epoch(rng: Rng): Generator<ParallelBatch, void, undefined> {
    this.assertNonEmpty();
    for (const shard of this.shards(rng)) {
      const batches = this.pack(this.select(shard));
      for (const i of permutation(batches.length, rng)) {
        yield this.materialize(batches[i]);
      }
    }
  }

  /**
   * One freshly shuffled pass as a stream, drawing randomness from
   * `RngService`. Consumes the generator in the same order as `epoch`, so a
   * given seed yields the same batches through either surface.
   */
  stream(): Stream.Stream<ParallelBatch, ValidationError, RngService> {
    const engine = this;
    return Stream.unwrap(
      Effect.gen(function* () {
        const rng = yield* RngService;
        if (engine.isEmpty()) {
          return yield* Effect.fail(new ValidationError({ message: "Empty dataset" }));
        }
        const shards = engine.shards(rng);
        yield* Effect.logDebug(`Shuffled dataset (${engine.size} examples)`);
        yield* Effect.logDebug(`Split dataset in ${shards.length} shards`);

        const indexed = shards.map((positions, index) => ({ positions, index }));
        return Stream.fromIterable(indexed).pipe(
          Stream.mapEffect(({ positions, index }) =>
            Effect.gen(function* () {
              const selected = engine.select(positions);
              yield* Effect.logInfo(`Built shard ${index + 1}/${shards.length} (${selected.length} examples)`);
              const batches = engine.pack(selected);
              yield* Effect.logInfo(`Built ${batches.length} batches in shard`);
              const order = permutation(batches.length, rng);
              yield* Effect.logDebug(`Shuffled ${order.length} batches`);
              return order.map((i) => batches[i]);
            }),
          ),
          Stream.flatMap((batches) =>
            Stream.fromIterable(batches).pipe(Stream.map((positions) => engine.materialize(positions))),
          ),
        );
      }),
    );
  }

  /**
   * Drop positions longer than `maxExampleLength` on any side, then stable-sort
   * the rest by side-0 length.
   */
  select(shard: readonly number[]): number[] {
    const maxLength = this.config.maxExampleLength;
    const kept: { position: number; length: number }[] = [];
    for (const position of shard) {
      if (maxLength > 0 && this.longestSide(position) > maxLength) continue;
      kept.push({ position, length: this._sides[0].examples[position].length });
    }
    kept.sort((a, b) => a.length - b.length);
    return kept.map((k) => k.position);
  }

  /**
   * Greedily pack `sorted` into batches. An example that does not fit even in
   * an empty batch becomes an oversized singleton batch.
   */
  pack(sorted: readonly number[]): number[][] {
    const sideCount = this._sides.length;
    const batches: number[][] = [];
    const acc = new BatchAccumulator(this.config.batchCapacity, this._policy, sideCount);

    for (const position of sorted) {
      const lengths = this._sides.map((side) => side.examples[position].length + MARKER_SLOTS);
      if (acc.add(position, lengths)) continue;
      if (acc.size > 0) {
        batches.push(acc.take());
        acc.reset(sideCount);
      }
      if (!acc.add(position, lengths)) acc.force(position, lengths);
    }
    if (acc.size > 0) batches.push(acc.take());
    return batches;
  }

  private shards(rng: Rng): number[][] {
    const order = permutation(this.size, rng);
    const shardSize = this.config.shardSize === 0 ? order.length : this.config.shardSize;
    const shards: number[][] = [];
    for (let i = 0; i < order.length; i += shardSize) {
      shards.push(order.slice(i, i + shardSize));
    }
    return shards;
  }

  private materialize(positions: readonly number[]): ParallelBatch {
    return {
      positions: [...positions],
      sides: this._sides.map((side) =>
        positions.map((p) => wrap(side.examples[p], side.vocab.bosId, side.vocab.eosId)),
      ),
    };
  }

  private longestSide(position: number): number {
    let longest = 0;
    for (const side of this._sides) longest = Math.max(longest, side.examples[position].length);
    return longest;
  }

  private isEmpty(): boolean {
    return this.sideCount === 0 || this.size === 0;
  }

  private assertNonEmpty(): void {
    if (this.isEmpty()) throw new ValidationError({ message: "Empty dataset" });
  }
}
