export {
  RngLive,
  OptimizerFrom,
} from "./layers.js";

export {
  formatLogLine,
  prettyLogger,
  prettyLoggerLayer,
  parseLogLevel,
  isLogLevelName,
} from "./logging.js";
