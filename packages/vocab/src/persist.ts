/**
 * Vocabulary file loading.
 *
 * Reads one token per line with `node:fs/promises`, wrapped in
 * `Effect.tryPromise` so callers get a typed `CorpusReadError` instead of a
 * raw exception.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { CorpusReadError, ValidationError } from "@parabatch/core";
import { splitLines } from "./lines.js";
import { VocabularyTable } from "./vocabulary.js";

export function readTextFile(path: string): Effect.Effect<string, CorpusReadError> {
  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) =>
      new CorpusReadError({ message: `Cannot read file ${path}`, path, cause }),
  });
}

/** Load a vocabulary file (one token per line, markers first). */
export function loadVocabulary(
  path: string,
): Effect.Effect<VocabularyTable, CorpusReadError | ValidationError> {
  return Effect.gen(function* () {
    const text = yield* readTextFile(path);
    const vocab = yield* Effect.try({
      try: () => VocabularyTable.build(splitLines(text)),
      catch: (cause) =>
        cause instanceof ValidationError
          ? cause
          : new ValidationError({ message: `Invalid vocabulary ${path}`, cause }),
    });
    yield* Effect.logDebug(`Read vocabulary (${vocab.size} entries) from ${path}`);
    return vocab;
  });
}
