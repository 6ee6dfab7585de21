/**
 * Structured Logger
 *
 * JSON logging on pino, with a correlation id carried through async work so
 * a poll tick or a command can be followed across components.
 */

import { AsyncLocalStorage } from 'async_hooks';
import pino from 'pino';

// -----------------------------------------------------------------------------
// Logger Configuration
// -----------------------------------------------------------------------------

export interface LoggerConfig {
  /** Log level */
  level: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
  /** Pretty print for development */
  pretty: boolean;
  /** Base context to include in all logs */
  base?: Record<string, unknown>;
  /** Custom serializers */
  serializers?: Record<string, (value: unknown) => unknown>;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: process.env['NODE_ENV'] === 'test' ? 'silent' : 'info',
  pretty: process.env['NODE_ENV'] === 'development',
};

// -----------------------------------------------------------------------------
// Correlation Context
// -----------------------------------------------------------------------------

export interface LogContext {
  correlationId?: string;
  source?: string;
  [key: string]: unknown;
}

const logContext = new AsyncLocalStorage<LogContext>();

/**
 * Run a function with a specific logging context.
 */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return logContext.run(context, fn);
}

/**
 * Get the current logging context.
 */
export function getLogContext(): LogContext | undefined {
  return logContext.getStore();
}

// -----------------------------------------------------------------------------
// Logger Factory
// -----------------------------------------------------------------------------

let rootLogger: pino.Logger | null = null;

/**
 * Initialise the root logger.
 */
export function initLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const finalConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };

  const options: pino.LoggerOptions = {
    level: finalConfig.level,
    base: {
      service: 'hub-sync',
      ...finalConfig.base,
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
      ...finalConfig.serializers,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    mixin() {
      const ctx = getLogContext();
      if (ctx) {
        return {
          correlationId: ctx.correlationId,
          source: ctx.source,
        };
      }
      return {};
    },
  };

  if (finalConfig.pretty) {
    rootLogger = pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    });
  } else {
    rootLogger = pino(options);
  }

  return rootLogger;
}

/**
 * Get the root logger instance.
 */
export function getLogger(): pino.Logger {
  if (!rootLogger) {
    rootLogger = initLogger();
  }
  return rootLogger;
}

/**
 * Create a child logger with additional context.
 */
export function createLogger(bindings: pino.Bindings): pino.Logger {
  return getLogger().child(bindings);
}

// -----------------------------------------------------------------------------
// Scoped Loggers
// -----------------------------------------------------------------------------

export const coordinatorLogger = () => createLogger({ component: 'coordinator' });

export const pollLogger = () => createLogger({ component: 'poll' });

export const pushLogger = () => createLogger({ component: 'push' });

export const queryLogger = () => createLogger({ component: 'query' });

export const commandLogger = () => createLogger({ component: 'command' });

export const clientLogger = () => createLogger({ component: 'client' });

export const simulatorLogger = () => createLogger({ component: 'simulator' });
