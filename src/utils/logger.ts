import winston from 'winston';
import path from 'path';
import { EntityKind } from '../database/models';

const isProduction = process.env.NODE_ENV === 'production';
const logDir = process.env.LOG_DIR || 'logs';

// Tests stay quiet unless asked otherwise
const silent = process.env.NODE_ENV === 'test' && !process.env.VERBOSE_TESTS;

const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

// "[EntityStore:channel]" for store loggers, "[Main]" for the rest
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, service, entity, ...meta }) => {
    const scope = [service, entity].filter((part) => typeof part === 'string').join(':');
    const label = scope ? ` [${scope}]` : '';
    const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}${label} ${message}${extra}`;
  }),
);

const rotatingFile = (filename: string, level?: string) =>
  new winston.transports.File({
    filename: path.resolve(logDir, filename),
    level,
    maxsize: 5242880, // 5MB
    maxFiles: 5,
    tailable: true,
  });

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: jsonFormat,
  defaultMeta: { service: 'pipeline-config' },
  transports: [
    new winston.transports.Console({
      format: isProduction ? jsonFormat : consoleFormat,
      silent,
    }),
  ],
});

if (isProduction) {
  logger.add(rotatingFile('store.log'));
  logger.add(rotatingFile('error.log', 'error'));
}

export type Logger = winston.Logger;

export const createLogger = (service?: string): Logger => {
  return logger.child({ service });
};

/**
 * Logger for one entity kind's repository; every line carries the kind
 */
export const createEntityLogger = (entity: EntityKind): Logger => {
  return logger.child({ service: 'EntityStore', entity });
};

export default logger;
