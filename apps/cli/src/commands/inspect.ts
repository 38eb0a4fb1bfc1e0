/**
 * Command: parabatch inspect
 *
 * Usage:
 *   parabatch inspect --data=train.src,train.tgt --vocab=vocab.src,vocab.tgt --batchCapacity=4096
 */
import { Effect, Layer, Stream } from "effect";
import { ConfigError } from "@parabatch/core";
import { RngLive, loggingLayer, parseLogLevel } from "@parabatch/effect-runtime";
import { loadVocabulary } from "@parabatch/vocab";
import {
  CorpusBatchingEngine,
  loadBatchingConfig,
  resolveBatchingConfig,
  summarizeEpoch,
} from "@parabatch/batching";
import { flagOverrides } from "../flags.js";
import { parseKV, requireArg, intArg, strArg, listArg } from "../parse.js";

export async function inspectCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const dataPaths = listArg(requireArg(kv, "data", "comma-separated corpus files"));
  const vocabArg = listArg(requireArg(kv, "vocab", "comma-separated vocabulary files"));
  const seed = intArg(kv, "seed", 42);
  const level = parseLogLevel(strArg(kv, "logLevel", "info"));

  // A single vocabulary is tied across all sides.
  const vocabPaths = vocabArg.length === 1 ? dataPaths.map(() => vocabArg[0]) : vocabArg;

  const program = Effect.gen(function* () {
    const base = yield* loadBatchingConfig(kv["config"]);
    const config = yield* Effect.try({
      try: () => resolveBatchingConfig(flagOverrides(kv), base),
      catch: (cause) =>
        cause instanceof ConfigError ? cause : new ConfigError({ message: String(cause), cause }),
    });

    const t0 = performance.now();
    const vocabs = yield* Effect.forEach(vocabPaths, (path) => loadVocabulary(path));
    const engine = yield* CorpusBatchingEngine.load(dataPaths, vocabs, config);
    const elapsed = ((performance.now() - t0) / 1000).toFixed(2);
    yield* Effect.logInfo(`Done (${elapsed} seconds)`);

    const batches = yield* Stream.runCollect(engine.stream());
    return { config, size: engine.size, summary: summarizeEpoch(batches) };
  });

  const layer = Layer.merge(RngLive(seed), loggingLayer(level, kv["logFile"]));
  const { config, size, summary } = await Effect.runPromise(program.pipe(Effect.provide(layer)));

  console.log(`\n── one pass (seed=${seed}) ──`);
  console.log(`  policy:       ${config.capacityPolicy} (capacity ${config.batchCapacity})`);
  console.log(`  examples:     ${summary.examples} of ${size} kept`);
  console.log(`  batches:      ${summary.batches} (largest ${summary.largestBatch})`);
  summary.sides.forEach((side, n) => {
    console.log(
      `  side ${n}:       ${side.tokens} tokens in ${side.paddedTokens} slots ` +
      `(${(100 * side.efficiency).toFixed(1)}% efficient)`,
    );
  });
}
