/**
 * Corpus side loading: one example per line, mapped through a vocabulary.
 */
import { Effect } from "effect";
import type { CorpusReadError } from "@parabatch/core";
import { readTextFile, splitLines, type VocabularyTable } from "@parabatch/vocab";

export interface TokenCounts {
  readonly tokens: number;
  readonly unknowns: number;
}

/** Total ids across `examples`, and how many of them are `unkId`. */
export function countTokens(examples: readonly Int32Array[], unkId: number): TokenCounts {
  let tokens = 0;
  let unknowns = 0;
  for (const ids of examples) {
    tokens += ids.length;
    for (let i = 0; i < ids.length; i++) {
      if (ids[i] === unkId) unknowns++;
    }
  }
  return { tokens, unknowns };
}

export function encodeLines(lines: readonly string[], vocab: VocabularyTable): Int32Array[] {
  return lines.map((line) => vocab.encode(line));
}

/** Read one side of a parallel corpus. Markers are not added here. */
export function readCorpusSide(
  path: string,
  vocab: VocabularyTable,
): Effect.Effect<Int32Array[], CorpusReadError> {
  return Effect.gen(function* () {
    const text = yield* readTextFile(path);
    const examples = encodeLines(splitLines(text), vocab);
    const { tokens, unknowns } = countTokens(examples, vocab.unkId);
    const pct = tokens > 0 ? (100 * unknowns) / tokens : 0;
    yield* Effect.logInfo(
      `Read corpus (${examples.length} lines ~ ${tokens} tokens ~ ${unknowns} OOVs [${pct.toFixed(2)}%]) from ${path}`,
    );
    return examples;
  });
}
