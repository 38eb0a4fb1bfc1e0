import { describe, it, expect } from "vitest";
import { Chunk, Effect, Layer, Logger, LogLevel, Stream } from "effect";
import {
  SeededRng,
  permutation,
  ValidationError,
  ConfigError,
  defaultBatchingConfig,
  type BatchingConfig,
} from "@parabatch/core";
import { RngLive } from "@parabatch/effect-runtime";
import { VocabularyTable } from "@parabatch/vocab";
import { CorpusBatchingEngine, encodeLines, type ParallelBatch } from "@parabatch/batching";

const srcVocab = VocabularyTable.build(["<pad>", "<unk>", "<bos>", "<eos>", "a", "b"]);
const tgtVocab = VocabularyTable.build(["<pad>", "<unk>", "<bos>", "<eos>", "x", "y"]);

function config(overrides: Partial<BatchingConfig>): BatchingConfig {
  return { ...defaultBatchingConfig, ...overrides };
}

function engineFor(src: string[], tgt: string[], cfg: BatchingConfig): CorpusBatchingEngine {
  return new CorpusBatchingEngine(
    [
      { vocab: srcVocab, examples: encodeLines(src, srcVocab) },
      { vocab: tgtVocab, examples: encodeLines(tgt, tgtVocab) },
    ],
    cfg,
  );
}

function randomLines(rng: SeededRng, n: number, maxLen: number, words: string[]): string[] {
  return Array.from({ length: n }, () => {
    const len = Math.floor(rng.next() * (maxLen + 1));
    return Array.from({ length: len }, () => words[Math.floor(rng.next() * words.length)]).join(" ");
  });
}

function ids(batch: ParallelBatch, side: number): number[][] {
  return batch.sides[side].map((seq) => Array.from(seq));
}

const quiet = Logger.minimumLogLevel(LogLevel.None);

// Scenario corpus: position 0 is "a b" / "x y", position 1 is "b" / "y".
const SRC = ["a b", "b"];
const TGT = ["x y", "y"];

describe("CorpusBatchingEngine scenarios", () => {
  it("packs both examples into one sentence batch, shortest first", () => {
    const engine = engineFor(SRC, TGT, config({
      shardSize: 0, batchCapacity: 10, capacityPolicy: "sentences", maxExampleLength: 0,
    }));
    const batches = [...engine.epoch(new SeededRng(1))];

    expect(batches).toHaveLength(1);
    expect(batches[0].positions).toEqual([1, 0]);
    expect(ids(batches[0], 0)).toEqual([[2, 5, 3], [2, 4, 5, 3]]);
    expect(ids(batches[0], 1)).toEqual([[2, 5, 3], [2, 4, 5, 3]]);
  });

  it("splits under a four-token budget", () => {
    const engine = engineFor(SRC, TGT, config({
      shardSize: 0, batchCapacity: 4, capacityPolicy: "tokens", maxExampleLength: 0,
    }));
    expect(engine.pack([1, 0])).toEqual([[1], [0]]);

    const batches = [...engine.epoch(new SeededRng(1))];
    expect(batches).toHaveLength(2);
    expect(batches.map((b) => b.positions).sort()).toEqual([[0], [1]]);
  });

  it("emits an over-budget example as a singleton batch", () => {
    const engine = engineFor(SRC, TGT, config({
      shardSize: 0, batchCapacity: 3, capacityPolicy: "tokens", maxExampleLength: 0,
    }));
    const batches = [...engine.epoch(new SeededRng(2))];

    expect(batches).toHaveLength(2);
    const oversized = batches.find((b) => b.positions[0] === 0);
    expect(oversized?.positions).toEqual([0]);
    expect(oversized && ids(oversized, 0)).toEqual([[2, 4, 5, 3]]);
  });

  it("drops examples longer than maxExampleLength on any side", () => {
    const engine = engineFor(["a", "b"], ["x y x", "y"], config({
      shardSize: 0, batchCapacity: 10, capacityPolicy: "sentences", maxExampleLength: 2,
    }));
    const batches = [...engine.epoch(new SeededRng(3))];
    expect(batches.map((b) => b.positions)).toEqual([[1]]);
  });

  it("keeps batch-mates within a shard", () => {
    const lines = ["a", "b", "a b", "b a", "a a"];
    const engine = engineFor(lines, lines.map(() => "x"), config({
      shardSize: 1, batchCapacity: 10, capacityPolicy: "sentences", maxExampleLength: 0,
    }));
    const batches = [...engine.epoch(new SeededRng(4))];
    expect(batches).toHaveLength(5);
    expect(batches.every((b) => b.positions.length === 1)).toBe(true);
  });
});

describe("CorpusBatchingEngine.select", () => {
  const engine = engineFor(["a b", "a", "b b", "b"], ["x", "x", "x", "x"], config({
    shardSize: 0, batchCapacity: 10, capacityPolicy: "sentences", maxExampleLength: 0,
  }));

  it("sorts by side-0 length, keeping shuffle order on ties", () => {
    expect(engine.select([0, 1, 2, 3])).toEqual([1, 3, 0, 2]);
    expect(engine.select([2, 3, 0, 1])).toEqual([3, 1, 2, 0]);
  });
});

describe("CorpusBatchingEngine properties", () => {
  const dataRng = new SeededRng(2024);
  const N = 200;
  const src = randomLines(dataRng, N, 29, ["a", "b"]);
  const tgt = randomLines(dataRng, N, 29, ["x", "y"]);

  const tokenEngine = engineFor(src, tgt, config({
    shardSize: 37, batchCapacity: 60, capacityPolicy: "tokens", maxExampleLength: 20,
  }));

  it("covers exactly the kept positions once", () => {
    const batches = [...tokenEngine.epoch(new SeededRng(11))];
    const seen = batches.flatMap((b) => b.positions);
    const expected = Array.from({ length: N }, (_, i) => i).filter(
      (p) => Math.max(tokenEngine.example(0, p).length, tokenEngine.example(1, p).length) <= 20,
    );
    expect(seen).toHaveLength(new Set(seen).size);
    expect([...seen].sort((a, b) => a - b)).toEqual(expected);
  });

  it("respects the token budget on every side", () => {
    for (const batch of tokenEngine.epoch(new SeededRng(12))) {
      for (const side of batch.sides) {
        const longest = Math.max(...side.map((seq) => seq.length));
        expect(longest * side.length).toBeLessThanOrEqual(60);
      }
    }
  });

  it("keeps side-0 lengths non-decreasing inside a batch", () => {
    for (const batch of tokenEngine.epoch(new SeededRng(13))) {
      const lengths = batch.sides[0].map((seq) => seq.length);
      expect(lengths).toEqual([...lengths].sort((a, b) => a - b));
    }
  });

  it("fills sentence batches to capacity within a single shard", () => {
    const engine = engineFor(src, tgt, config({
      shardSize: 0, batchCapacity: 7, capacityPolicy: "sentences", maxExampleLength: 0,
    }));
    const sizes = [...engine.epoch(new SeededRng(14))].map((b) => b.positions.length);
    expect(sizes.every((s) => s <= 7)).toBe(true);
    expect(sizes.filter((s) => s === 7)).toHaveLength(28);
    expect(sizes.filter((s) => s !== 7)).toEqual([4]);
  });

  it("wraps every sequence in markers around the original tokens", () => {
    for (const batch of tokenEngine.epoch(new SeededRng(15))) {
      batch.positions.forEach((p, k) => {
        const s = batch.sides[0][k];
        const t = batch.sides[1][k];
        expect([s[0], s[s.length - 1]]).toEqual([2, 3]);
        expect([t[0], t[t.length - 1]]).toEqual([2, 3]);
        expect(srcVocab.decode(s.subarray(1, -1))).toBe(src[p]);
        expect(tgtVocab.decode(t.subarray(1, -1))).toBe(tgt[p]);
      });
    }
  });

  it("repeats a pass exactly for the same seed", () => {
    const first = [...tokenEngine.epoch(new SeededRng(7))];
    const second = [...tokenEngine.epoch(new SeededRng(7))];
    expect(second).toEqual(first);
  });

  it("reshuffles on every pass", () => {
    const rng = new SeededRng(7);
    const first = [...tokenEngine.epoch(rng)].map((b) => b.positions);
    const second = [...tokenEngine.epoch(rng)].map((b) => b.positions);
    expect(second).not.toEqual(first);
  });

  it("keeps batch-mates within one contiguous shard of the first shuffle", () => {
    const shardSize = 37;
    const shardOf = new Map<number, number>();
    permutation(N, new SeededRng(16)).forEach((p, i) => shardOf.set(p, Math.floor(i / shardSize)));

    const batches = [...tokenEngine.epoch(new SeededRng(16))];
    const shardIndices = batches.map((batch) => {
      const shards = new Set(batch.positions.map((p) => shardOf.get(p)));
      expect(shards.size).toBe(1);
      return shardOf.get(batch.positions[0]) ?? -1;
    });

    expect(batches.some((b) => b.positions.length > 1)).toBe(true);
    expect(shardIndices).toEqual([...shardIndices].sort((a, b) => a - b));
  });

  it("stream yields the same batches as epoch for a seed", async () => {
    const streamed = await Effect.runPromise(
      Stream.runCollect(tokenEngine.stream()).pipe(Effect.provide(Layer.merge(RngLive(21), quiet))),
    );
    expect(Chunk.toReadonlyArray(streamed)).toEqual([...tokenEngine.epoch(new SeededRng(21))]);
  });
});

describe("CorpusBatchingEngine.stream logging", () => {
  it("reports the shuffle, the shards and their batches", async () => {
    const messages: string[] = [];
    const capture = Logger.make(({ message }) => {
      messages.push(Array.isArray(message) ? message.join(" ") : String(message));
    });
    const engine = engineFor(SRC, TGT, config({
      shardSize: 1, batchCapacity: 10, capacityPolicy: "sentences", maxExampleLength: 0,
    }));

    await Effect.runPromise(
      Stream.runCollect(engine.stream()).pipe(
        Effect.provide(
          Layer.mergeAll(
            RngLive(1),
            Logger.replace(Logger.defaultLogger, capture),
            Logger.minimumLogLevel(LogLevel.Debug),
          ),
        ),
      ),
    );

    expect(messages).toEqual([
      "Shuffled dataset (2 examples)",
      "Split dataset in 2 shards",
      "Built shard 1/2 (1 examples)",
      "Built 1 batches in shard",
      "Shuffled 1 batches",
      "Built shard 2/2 (1 examples)",
      "Built 1 batches in shard",
      "Shuffled 1 batches",
    ]);
  });
});

describe("CorpusBatchingEngine failures", () => {
  it("rejects non-parallel sides", () => {
    expect(() => engineFor(["a", "b"], ["x"], defaultBatchingConfig)).toThrow(ValidationError);
  });

  it("is unaffected by later edits to the input arrays", () => {
    const src = encodeLines(SRC, srcVocab);
    const tgt = encodeLines(TGT, tgtVocab);
    const engine = new CorpusBatchingEngine(
      [
        { vocab: srcVocab, examples: src },
        { vocab: tgtVocab, examples: tgt },
      ],
      config({ shardSize: 0, batchCapacity: 10, capacityPolicy: "sentences", maxExampleLength: 0 }),
    );
    src.push(srcVocab.encode("a a"));

    expect(engine.size).toBe(2);
    expect([...engine.epoch(new SeededRng(1))].map((b) => b.positions)).toEqual([[1, 0]]);
  });

  it("rejects invalid config", () => {
    expect(() => engineFor(["a"], ["x"], config({ batchCapacity: 0 }))).toThrow(ConfigError);
  });

  it("epoch fails on an empty corpus", () => {
    const engine = engineFor([], [], defaultBatchingConfig);
    expect(() => [...engine.epoch(new SeededRng(1))]).toThrow("Empty dataset");
    expect(() => [...new CorpusBatchingEngine([]).epoch(new SeededRng(1))]).toThrow(ValidationError);
  });

  it("stream fails on an empty corpus", async () => {
    const engine = engineFor([], [], defaultBatchingConfig);
    const error = await Effect.runPromise(
      Stream.runCollect(engine.stream()).pipe(Effect.flip, Effect.provide(Layer.merge(RngLive(1), quiet))),
    );
    expect(error._tag).toBe("ValidationError");
  });
});
