import winston from 'winston';
import { config } from '../config';

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = 'uttt';
  }
  if (!info.environment) {
    info.environment = config.nodeEnv;
  }

  // Engine errors carry a code and context; keep them in the entry.
  const error: unknown = info.error;
  if (error instanceof Error) {
    info.error = {
      name: error.name,
      message: error.message,
      ...('toJSON' in error && typeof error.toJSON === 'function' ? { details: error.toJSON() } : {}),
    };
  }

  return info;
});

/**
 * Format for structured JSON logging (file transport, and the console when
 * LOG_FORMAT=json).
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
 * Format for human-readable console output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, environment: _env, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  })
);

/**
 * Create the Winston logger instance.
 *
 * Console output goes to stderr so that boards and series results printed by
 * the CLI stay on stdout.
 */
const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: 'uttt',
    environment: config.nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ],
});

if (config.logging.file) {
  logger.add(
    new winston.transports.File({
      filename: config.logging.file,
      format: jsonFormat,
    })
  );
}

export { logger };
