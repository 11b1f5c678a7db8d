/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino with a timer helper for long-running steps.
 */

import pino from 'pino';

export type { Logger } from 'pino';

/**
 * Create a Pino logger with the orchestrator's defaults
 */
export function createLogger(options: pino.LoggerOptions = {}): pino.Logger {
  return pino({
    name: 'kops-gce',
    level: 'info',
    ...options,
  });
}

export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => void;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
}

/**
 * Create a timer for a step; logs start at debug and completion at info
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

      logger.info(
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

      logger.error(
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
