export {
  type AdvisorLogger,
  type Logger,
  type LoggerConfig,
  type RuntimeLogger,
  createLogger,
  createNoopLogger,
  createRuntimeLogger,
  resolveLogLevel,
  wrapLogger,
} from "./logger";
