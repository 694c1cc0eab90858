import { pino } from "pino";

import type { DestinationStream, LevelWithSilent, Logger } from "pino";

export type LoggerLevels =
  | "info"
  | "trace"
  | "debug"
  | "warn"
  | "error"
  | "fatal";
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;

export interface LoggerFactoryOptions {
  name?: string;
  /**
   * Wins over `ARROWLET_LOG_LEVEL`.
   */
  level?: LevelWithSilent;
  /**
   * Where the JSON lines go. Defaults to stdout.
   */
  destination?: DestinationStream;
}

export const LOG_LEVEL_ENV = "ARROWLET_LOG_LEVEL";

const LOG_LEVELS: readonly LevelWithSilent[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

export const isLogLevel = (value: string): value is LevelWithSilent =>
  LOG_LEVELS.some((level) => level === value);

/**
 * Reads the default level from `ARROWLET_LOG_LEVEL`.
 * Unset or unknown values fall back to "info".
 */
export const resolveLogLevel = (
  env: NodeJS.ProcessEnv = process.env,
): LevelWithSilent => {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
};

/**
 * Creates a `BaseLogger` writing through pino.
 * An `Error` message is logged under `err` with its own message as `msg`.
 */
export const loggerFactory = (options: LoggerFactoryOptions = {}) => {
  const pinoOptions = {
    name: options.name,
    level: options.level ?? resolveLogLevel(),
  };
  const pinoLogger: Logger = options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);

  const logMessage = (
    level: LoggerLevels,
    message: LoggerMessage,
    meta?: LoggerMeta,
  ) => {
    if (message instanceof Error) {
      pinoLogger[level]({ ...meta, err: message }, message.message);
      return;
    }
    if (meta) {
      pinoLogger[level](meta, message);
      return;
    }
    pinoLogger[level](message);
  };

  const logger: BaseLogger = {
    trace: (message, meta) => logMessage("trace", message, meta),
    debug: (message, meta) => logMessage("debug", message, meta),
    info: (message, meta) => logMessage("info", message, meta),
    warn: (message, meta) => logMessage("warn", message, meta),
    error: (message, meta) => logMessage("error", message, meta),
    fatal: (message, meta) => logMessage("fatal", message, meta),
  };

  return { logger, pinoLogger };
};

export default loggerFactory;
