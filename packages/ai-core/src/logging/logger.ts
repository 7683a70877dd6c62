/**
 * Logging
 *
 * The small logger contract that advisors, the chain executor and the chat
 * client accept, and a pino-backed implementation of it.
 *
 * @example
 * ```typescript
 * const client = ChatClient.builder(model)
 *   .logger(createRuntimeLogger({ module: "support-bot" }))
 *   .build();
 * ```
 */

import pino, {
  type DestinationStream,
  type LevelWithSilent,
  type Logger,
  type LoggerOptions,
} from "pino";

export interface AdvisorLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Advisor logger backed by pino, with child loggers for scoping.
 */
export interface RuntimeLogger extends AdvisorLogger {
  child(bindings: Record<string, unknown>): RuntimeLogger;
}

export interface LoggerConfig {
  /** Minimum level (default: `LOG_LEVEL`, else "info") */
  level?: LevelWithSilent;
  /**
   * Human-readable output through pino-pretty (default: outside production).
   * Ignored when a destination is given.
   */
  pretty?: boolean;
  /** Bindings on every line, merged over `{ service: "advisor-chain" }` */
  base?: Record<string, unknown>;
  /** Adds a `module` binding */
  module?: string;
  /** Write JSON lines here instead of stdout */
  destination?: DestinationStream;
}

const BASE_BINDINGS = { service: "advisor-chain" };

function isLevel(value: string): value is LevelWithSilent {
  return value === "silent" || value in pino.levels.values;
}

/**
 * Level named by `LOG_LEVEL`, or "info" when it is unset or unknown.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const requested = env.LOG_LEVEL?.trim().toLowerCase();
  return requested && isLevel(requested) ? requested : "info";
}

/**
 * Create the underlying pino logger.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: config.level ?? resolveLogLevel(),
    base: { ...BASE_BINDINGS, ...config.base },
  };

  if (config.destination) {
    return pino(options, config.destination);
  }

  const pretty = config.pretty ?? process.env.NODE_ENV !== "production";
  if (pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return pino(options);
}

export function createRuntimeLogger(config: LoggerConfig = {}): RuntimeLogger {
  const logger = createLogger(config);
  return wrapLogger(config.module ? logger.child({ module: config.module }) : logger);
}

/**
 * Adapt an existing pino logger.
 */
export function wrapLogger(logger: Logger): RuntimeLogger {
  return {
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, data) => (data ? logger.error(data, msg) : logger.error(msg)),
    child: (bindings) => wrapLogger(logger.child(bindings)),
  };
}

/**
 * Logger that drops everything. Used when no logger is injected.
 */
export function createNoopLogger(): AdvisorLogger {
  return {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
  };
}

export type { Logger } from "pino";
