/**
 * Batching config overrides taken from CLI flags.
 */
import { ConfigError } from "@parabatch/core";

const NUMERIC_FLAGS = ["shardSize", "batchCapacity", "maxExampleLength"] as const;

/**
 * Pick the batching flags out of parsed `--key=value` pairs. Numeric flags
 * must carry a value; range checks are left to `resolveBatchingConfig`.
 */
export function flagOverrides(kv: Record<string, string>): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const key of NUMERIC_FLAGS) {
    const value = kv[key];
    if (value === undefined) continue;
    if (value.trim() === "") {
      throw new ConfigError({ message: `--${key} needs a value` });
    }
    overrides[key] = Number(value);
  }
  if (kv["capacityPolicy"] !== undefined) overrides.capacityPolicy = kv["capacityPolicy"];
  return overrides;
}
