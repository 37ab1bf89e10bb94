import pino from 'pino';

/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging for the inventory service.
 *
 * **Configuration:**
 * - LOG_LEVEL: Set log level (error, warn, info, debug) - defaults to 'info',
 *   or 'silent' when NODE_ENV is 'test'
 * - NODE_ENV: 'development' uses pretty-printing, anything else uses JSON
 *
 * **Usage:**
 * ```typescript
 * import { logger } from '../shared/logger';
 *
 * logger.warn({
 *   msg: 'Version conflict, retrying',
 *   recordId: 'sku-123',
 *   attempt: 2,
 * });
 * ```
 */

const nodeEnv = process.env['NODE_ENV'] || 'development';
const isDevelopment = nodeEnv === 'development';
const logLevel = process.env['LOG_LEVEL'] || (nodeEnv === 'test' ? 'silent' : 'info');

export const logger = pino({
  level: logLevel,
  // Pretty output only for local development; JSON everywhere else
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    env: nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});
