/**
 * @parabatch/batching -- length-aware dynamic batching over parallel corpora.
 */
export {
  capacityPolicyRegistry,
  parseCapacityPolicy,
  isCapacityPolicyName,
  type CapacityPolicy,
} from "./policy.js";
export { BatchAccumulator } from "./accumulator.js";
export { countTokens, encodeLines, readCorpusSide, type TokenCounts } from "./corpus.js";
export { validateBatchingConfig, resolveBatchingConfig, loadBatchingConfig } from "./config.js";
export { CorpusBatchingEngine, type CorpusSide, type ParallelBatch } from "./engine.js";
export { padBatch, summarizeEpoch, type EpochSummary, type SideSummary } from "./pad.js";
