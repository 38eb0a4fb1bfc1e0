/**
 * Load and validate BatchingConfig from file, merge with defaults.
 */
import { Effect } from "effect";
import {
  ConfigError,
  defaultBatchingConfig,
  type BatchingConfig,
  type CorpusReadError,
} from "@parabatch/core";
import { readTextFile } from "@parabatch/vocab";
import { isCapacityPolicyName } from "./policy.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Validate a BatchingConfig, throwing `ConfigError` on invalid values. */
export function validateBatchingConfig(config: BatchingConfig): void {
  if (!isCapacityPolicyName(config.capacityPolicy)) {
    throw new ConfigError({
      message: `capacityPolicy must be "sentences" or "tokens", got "${config.capacityPolicy}"`,
    });
  }
  if (!Number.isInteger(config.shardSize) || config.shardSize < 0) {
    throw new ConfigError({ message: `shardSize must be an integer >= 0, got ${config.shardSize}` });
  }
  if (!Number.isInteger(config.batchCapacity) || config.batchCapacity < 1) {
    throw new ConfigError({ message: `batchCapacity must be an integer >= 1, got ${config.batchCapacity}` });
  }
  if (!Number.isInteger(config.maxExampleLength) || config.maxExampleLength < 0) {
    throw new ConfigError({
      message: `maxExampleLength must be an integer >= 0, got ${config.maxExampleLength}`,
    });
  }
}

/** Merge loosely typed overrides (parsed JSON, CLI flags) over the defaults and validate. */
export function resolveBatchingConfig(
  overrides: Readonly<Record<string, unknown>>,
  base: BatchingConfig = defaultBatchingConfig,
): BatchingConfig {
  const num = (key: "shardSize" | "batchCapacity" | "maxExampleLength"): number => {
    const value = overrides[key];
    if (value === undefined) return base[key];
    if (typeof value !== "number") {
      throw new ConfigError({ message: `${key} must be a number, got ${JSON.stringify(value)}` });
    }
    return value;
  };

  const policy = overrides.capacityPolicy ?? base.capacityPolicy;
  if (typeof policy !== "string" || !isCapacityPolicyName(policy)) {
    throw new ConfigError({
      message: `capacityPolicy must be "sentences" or "tokens", got ${JSON.stringify(policy)}`,
    });
  }

  const config: BatchingConfig = {
    shardSize: num("shardSize"),
    batchCapacity: num("batchCapacity"),
    capacityPolicy: policy,
    maxExampleLength: num("maxExampleLength"),
  };
  validateBatchingConfig(config);
  return config;
}

/** Load a BatchingConfig from a JSON file path, merging with defaults. */
export function loadBatchingConfig(
  path?: string,
): Effect.Effect<BatchingConfig, ConfigError | CorpusReadError> {
  if (!path) return Effect.succeed({ ...defaultBatchingConfig });

  return Effect.gen(function* () {
    const raw = yield* readTextFile(path);
    const parsed: unknown = yield* Effect.try({
      try: () => JSON.parse(raw),
      catch: (cause) =>
        new ConfigError({ message: `Failed to parse batching config at ${path}: invalid JSON`, cause }),
    });
    if (!isRecord(parsed)) {
      return yield* Effect.fail(
        new ConfigError({ message: `Batching config at ${path} must be a JSON object` }),
      );
    }
    return yield* Effect.try({
      try: () => resolveBatchingConfig(parsed),
      catch: (cause) =>
        cause instanceof ConfigError
          ? cause
          : new ConfigError({ message: `Invalid batching config at ${path}`, cause }),
    });
  });
}
