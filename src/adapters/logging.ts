// src/adapters/logging.ts
// pino loggers for dispatch domains, plus a logging resolver wrapper

import { pino, type DestinationStream, type Logger } from "pino";
import type { FallbackResolver, Resolution } from "../core/dispatch/types";

export type { Logger };

export type LoggerOptions = {
  /** pino level name; "silent" disables output */
  level?: string;
  name?: string;
  /** Where log lines go; stdout if omitted */
  destination?: DestinationStream;
};

/**
 * Create a pino logger for dispatch domains.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const settings = {
    name: options.name ?? "fallback-dispatch",
    level: options.level ?? process.env.DISPATCH_LOG_LEVEL ?? "warn",
  };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}

/**
 * Shared default logger.
 */
export const logger: Logger = createLogger();

/**
 * Wrap a fallback resolver with logging.
 * Each resolution is logged at debug with its outcome and duration;
 * failures at warn before being rethrown.
 */
export function loggingResolver(inner: FallbackResolver, log: Logger = logger): FallbackResolver {
  const wrapped: FallbackResolver = {
    async resolve(context): Promise<Resolution> {
      const start = Date.now();
      try {
        const resolution = await inner.resolve(context);
        log.debug(
          { member: context.name, depth: context.depth, resolution: resolution.tag, durationMs: Date.now() - start },
          "fallback resolved"
        );
        return resolution;
      } catch (error) {
        log.warn(
          { member: context.name, depth: context.depth, durationMs: Date.now() - start, err: error },
          "fallback failed"
        );
        throw error;
      }
    },
  };
  if (inner.wouldResolve) {
    wrapped.wouldResolve = inner.wouldResolve.bind(inner);
  }
  return wrapped;
}
