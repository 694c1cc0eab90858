/**
 * @module trace
 * @description Logging decorators for composed wrappers.
 * `traceFun`/`traceArrow` return a wrapper of the same kind that logs every
 * application through a `BaseLogger` and otherwise behaves exactly like the
 * original. A thrown error is logged at `error` and rethrown as is.
 *
 * @example
 * ```typescript
 * import { arrow, traceArrow } from './index.mjs';
 *
 * const pipeline = traceArrow(
 *   arrow((x: number) => x + 1).composeTo(arrow((x: number) => x * 10)),
 *   { label: 'scale' },
 * );
 *
 * pipeline.apply(42); // => 430, logs "scale: called" and "scale: returned"
 * ```
 *
 * @category Debugging
 * @since 2026-10-18
 */

import { loggerFactory } from "@arrowlet/logger";

import { Arrow } from "./arrow.mjs";
import { Fun } from "./fun.mjs";
import { isMultiValue } from "./multi-value.mjs";

import type { BaseLogger, LoggerLevels } from "@arrowlet/logger";

export interface TraceOptions {
  /**
   * Prefix of every log message. Defaults to the function's name.
   */
  label?: string;
  logger?: BaseLogger;
  /**
   * Level for the call and return records. Defaults to "debug".
   */
  level?: LoggerLevels;
}

let defaultLogger: BaseLogger | undefined;

const getDefaultLogger = (): BaseLogger => {
  defaultLogger ??= loggerFactory({ name: "arrowlet" }).logger;
  return defaultLogger;
};

const traced = <Args extends unknown[], R>(
  f: (...args: Args) => R,
  options: TraceOptions,
): ((...args: Args) => R) => {
  const logger = options.logger ?? getDefaultLogger();
  const level = options.level ?? "debug";
  const label = options.label ?? (f.name || "anonymous");

  return (...args: Args): R => {
    logger[level](`${label}: called`, { args });
    try {
      const result = f(...args);
      logger[level](`${label}: returned`, {
        result: isMultiValue(result) ? result.items : result,
      });
      return result;
    } catch (error) {
      logger.error(
        error instanceof Error ? error : `${label}: threw ${String(error)}`,
        { label, args },
      );
      throw error;
    }
  };
};

export const traceFun = <Args extends unknown[], R>(
  wrapper: Fun<Args, R>,
  options: TraceOptions = {},
): Fun<Args, R> => new Fun(traced(wrapper.raw, options));

export const traceArrow = <Args extends unknown[], R>(
  wrapper: Arrow<Args, R>,
  options: TraceOptions = {},
): Arrow<Args, R> => new Arrow(traced(wrapper.raw, options));
