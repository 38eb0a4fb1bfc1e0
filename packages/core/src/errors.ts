/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ValidationError extends Data.TaggedError("ValidationError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class CorpusReadError extends Data.TaggedError("CorpusReadError")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {}
