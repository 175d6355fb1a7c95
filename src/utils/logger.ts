/**
 * Logger Utility
 * Winston-based structured logging with context support
 */

import winston from 'winston';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, service, ...meta }) => {
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${service || 'showwatch'}] ${level}: ${message}${metaStr}`;
});

// Create the base logger
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  defaultMeta: { service: 'showwatch' },
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })
  ),
  transports: [
    new winston.transports.Console({
      format: combine(
        colorize(),
        consoleFormat
      ),
    }),
  ],
});

// Add file transports in production
if (process.env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: combine(
        timestamp(),
        winston.format.json()
      ),
    })
  );

  logger.add(
    new winston.transports.File({
      filename: 'logs/showwatch.log',
      format: combine(
        timestamp(),
        winston.format.json()
      ),
    })
  );
}

/**
 * Log extractor operations with timing
 */
export function logExtractorOperation(
  extractor: string,
  movieId: string,
  startTime: number,
  success: boolean,
  meta?: Record<string, unknown>
): void {
  const duration = Date.now() - startTime;
  const level = success ? 'info' : 'error';

  logger.log(level, `[${extractor}] extract ${movieId}`, {
    extractor,
    movieId,
    duration,
    success,
    ...meta,
  });
}

/**
 * Log alert delivery
 */
export function logAlertDelivery(
  channel: string,
  movieId: string,
  success: boolean,
  messageId?: string,
  error?: string
): void {
  const level = success ? 'info' : 'error';

  logger.log(level, `Alert delivery via ${channel}`, {
    channel,
    movieId,
    success,
    messageId,
    error,
  });
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export { logger };
