/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino with a timer helper. Components take a child of
 * the logger they are handed rather than creating their own.
 */

import pino from 'pino';
import type { LogLevel } from '../config/types';

export type { Logger } from 'pino';

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  /** Write to stderr so stdout stays free for a stdio protocol transport */
  useStderr?: boolean;
  name?: string;
}

const REDACT_PATHS = [
  'password',
  'token',
  'secret',
  'authorization',
  'credentials',
  'kubeconfig',
  '*.password',
  '*.token',
  '*.secret',
  '*.client-key-data',
  '*.client-certificate-data',
];

/**
 * Create a Pino logger with sensible defaults
 */
export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const level =
    config.level ?? process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'development' ? 'debug' : 'info');

  const options: pino.LoggerOptions = {
    name: config.name ?? 'kube-session-manager',
    level,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: !config.useStderr,
          destination: config.useStderr ? 2 : 1,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          errorProps: 'stack,cause',
        },
      },
    });
  }

  return pino(options, pino.destination(config.useStderr ? 2 : 1));
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => void;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
}

/**
 * Create a performance timer for an operation
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

      logger.debug(
        {
          operation,
          duration_ms: duration,
          ...context,
          ...additionalContext,
        },
        `Completed ${operation} in ${duration}ms`,
      );
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

      logger.warn(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
    },
  };
}
