import pino, { Logger } from 'pino';
import { config } from '../../config';

export const logger = pino({
  level: config.logLevel,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'call-relay',
    env: config.nodeEnv,
  },
  // Pretty print in development
  ...(config.nodeEnv === 'development' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

// ============================================================================
// Execution Logging
// ============================================================================

/**
 * Run `fn` with start/complete/fail log lines carrying the elapsed time.
 * Errors are logged and rethrown untouched.
 */
export async function logExecution<T>(
  correlationId: string,
  action: string,
  fn: () => Promise<T>,
  parentLogger?: Logger
): Promise<T> {
  const log = parentLogger || logger;
  const startTime = Date.now();

  log.debug({ correlationId, action }, `Starting ${action}`);

  try {
    const result = await fn();
    const durationMs = Date.now() - startTime;

    log.info({ correlationId, action, durationMs }, `Completed ${action}`);

    return result;
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const err = error instanceof Error ? error : new Error(String(error));

    log.error({
      correlationId,
      action,
      durationMs,
      error: err.message,
      stack: err.stack,
    }, `Failed ${action}`);

    throw error;
  }
}

// ============================================================================
// Child Logger Factory
// ============================================================================

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
