/**
 * Capacity policies: the rule deciding whether one more example fits in the
 * batch being filled.
 */
import { Registry, type CapacityPolicyName } from "@parabatch/core";

export interface CapacityPolicy {
  readonly name: CapacityPolicyName;
  /**
   * Whether a candidate with per-side `lengths` fits next to `size` accepted
   * examples whose per-side maxima are `maxLengths`.
   */
  admits(size: number, maxLengths: readonly number[], lengths: readonly number[], capacity: number): boolean;
}

const sentences: CapacityPolicy = {
  name: "sentences",
  admits: (size, _maxLengths, _lengths, capacity) => size < capacity,
};

// Charged as longest-so-far × batch size, per side; any side can be binding.
const tokens: CapacityPolicy = {
  name: "tokens",
  admits: (size, maxLengths, lengths, capacity) => {
    for (let i = 0; i < lengths.length; i++) {
      if (Math.max(maxLengths[i], lengths[i]) * (size + 1) > capacity) return false;
    }
    return true;
  },
};

export const capacityPolicyRegistry = new Registry<CapacityPolicy>("capacity policy");

capacityPolicyRegistry.register("sentences", () => sentences);
capacityPolicyRegistry.register("tokens", () => tokens);

export function isCapacityPolicyName(name: string): name is CapacityPolicyName {
  return capacityPolicyRegistry.has(name);
}

/** Resolve a policy by name. Throws `ConfigError` for unknown names. */
export function parseCapacityPolicy(name: string): CapacityPolicy {
  return capacityPolicyRegistry.get(name);
}
