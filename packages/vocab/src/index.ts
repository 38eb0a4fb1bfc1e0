/**
 * @parabatch/vocab -- vocabulary tables for each side of a parallel corpus.
 */
export {
  VocabularyTable,
  MARKERS,
  PAD,
  UNK,
  BOS,
  EOS,
  PAD_ID,
  UNK_ID,
  BOS_ID,
  EOS_ID,
} from "./vocabulary.js";
export { splitLines } from "./lines.js";
export { loadVocabulary, readTextFile } from "./persist.js";
