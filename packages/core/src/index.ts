export { ConfigError, ValidationError, CorpusReadError } from "./errors.js";
export { RngService, type Rng } from "./interfaces.js";
export { SeededRng, shuffleInPlace, permutation } from "./rng.js";
export { Registry } from "./registry.js";
export {
  defaultBatchingConfig,
  type Dtype,
  type Shape,
  type TensorData,
  type CapacityPolicyName,
  type BatchingConfig,
} from "./types.js";
