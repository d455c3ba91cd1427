export {
  BackendFrom,
  BackendFromRegistry,
  withBackendService,
} from "./layers.js";

export {
  prettyLogger,
  formatLogLine,
  loggerLayer,
  parseLogLevel,
} from "./logging.js";
