import path from 'path';
import winston from 'winston';
import { env } from './environment';

const MAX_LOG_FILE_BYTES = 5 * 1024 * 1024;

const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Human-readable lines for local runs; production consoles stay JSON for log shippers
const consoleFormat =
  env.NODE_ENV === 'production'
    ? jsonFormat
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
          const scope = typeof component === 'string' ? ` (${component})` : '';
          const metaStr = Object.keys(meta).length ? `\n${JSON.stringify(meta, null, 2)}` : '';
          return `${timestamp} [${level}]${scope}: ${message}${metaStr}`;
        })
      );

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: jsonFormat,
  defaultMeta: { service: 'store-api' },
  silent: env.NODE_ENV === 'test',
  transports: [new winston.transports.Console({ format: consoleFormat })],
});

if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: path.join(env.LOG_DIR, 'error.log'),
      level: 'error',
      maxsize: MAX_LOG_FILE_BYTES,
      maxFiles: 5,
    })
  );

  logger.add(
    new winston.transports.File({
      filename: path.join(env.LOG_DIR, 'combined.log'),
      maxsize: MAX_LOG_FILE_BYTES,
      maxFiles: 5,
    })
  );
}

/**
 * Logger tagged with the component that writes the entry
 */
export const componentLogger = (component: string): winston.Logger => logger.child({ component });
