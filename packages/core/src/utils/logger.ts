import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

const LOG_LEVEL = process.env['CHUNKLINE_LOG_LEVEL'] ?? process.env['LOG_LEVEL'] ?? 'info';

const baseConfig: LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    pid: process.pid,
    service: 'chunkline',
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
};

export const logger: Logger = pino(baseConfig);

/** Child logger tagged with the component name. */
export function createLogger(component: string, context?: Record<string, unknown>): Logger {
  return logger.child({ component, ...context });
}

export function logError(log: Logger, error: unknown, context?: Record<string, unknown>): void {
  if (error instanceof Error) {
    log.error({ err: error, ...context }, error.message);
  } else {
    log.error({ error: String(error), ...context }, 'Unknown error occurred');
  }
}

export type { Logger };
