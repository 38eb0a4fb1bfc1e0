export {
  RngLive,
} from "./layers.js";

export {
  prettyLogger,
  fileLogger,
  loggingLayer,
  withSpan,
  parseLogLevel,
} from "./logging.js";
