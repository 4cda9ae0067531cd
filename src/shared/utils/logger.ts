import winston from 'winston';
import { AppConfig, config } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

// ============================================================================
// Winston Logger Configuration
// ============================================================================

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = 'blokus-engine';
  }

  // Handle Error objects specially
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  return info;
});

/**
 * Format for structured JSON logging.
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output (used in development).
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${metaStr}`;
  })
);

/**
 * Build a logger for the given configuration.
 *
 * Under test the logger is silent unless LOG_LEVEL was set explicitly, so
 * engine chatter does not drown Jest output.
 */
export function createLogger(appConfig: Readonly<AppConfig>): winston.Logger {
  return winston.createLogger({
    level: appConfig.logging.level,
    silent: appConfig.isTest && !appConfig.logging.levelExplicit,
    defaultMeta: {
      service: 'blokus-engine',
      environment: appConfig.nodeEnv,
    },
    transports: [
      new winston.transports.Console({
        format: appConfig.logging.format === 'json' ? jsonFormat : consoleFormat,
      }),
    ],
  });
}

const logger = createLogger(config);

export { logger };
