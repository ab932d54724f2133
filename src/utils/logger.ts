import winston from 'winston';
import type { AppConfig } from '../types/index.js';

const { combine, timestamp, json, printf, colorize } = winston.format;

const logLevel = process.env.LOG_LEVEL || 'info';
const logFormat = process.env.LOG_FORMAT || 'json';

function buildConsoleFormat(format: string) {
  return format === 'json'
    ? combine(timestamp(), json())
    : combine(
        colorize(),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        printf(({ level, message, timestamp, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${timestamp} [${level}]: ${message}${metaStr}`;
        })
      );
}

const consoleTransport = new winston.transports.Console({
  format: buildConsoleFormat(logFormat),
});

export const logger = winston.createLogger({
  level: logLevel === 'silent' ? 'error' : logLevel,
  silent: logLevel === 'silent',
  format: combine(timestamp(), json()),
  defaultMeta: { service: 'agreement-reminders' },
  transports: [consoleTransport],
});

/**
 * Apply the logging section of the loaded config.
 * Called once by the CLI entry points after the config is read.
 */
export function configureLogging(options: AppConfig['logging']): void {
  if (logLevel !== 'silent') {
    logger.level = options.level;
  }
  consoleTransport.format = buildConsoleFormat(options.format);

  if (options.file) {
    logger.add(
      new winston.transports.File({
        filename: options.file,
        format: combine(timestamp(), json()),
      })
    );
  }
}

export function createChildLogger(context: Record<string, unknown>) {
  return logger.child(context);
}
