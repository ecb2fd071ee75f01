import winston from 'winston';
import { appConfig } from '../config';
import { CatalogProviderId } from '../types/catalog';

const fileRotation = {
  ...(appConfig.logging.maxSizeBytes !== undefined ? { maxsize: appConfig.logging.maxSizeBytes } : {}),
  ...(appConfig.logging.maxFiles !== undefined ? { maxFiles: appConfig.logging.maxFiles } : {}),
};

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    )
  }),
];

if (appConfig.logging.toFile) {
  transports.push(
    new winston.transports.File({ filename: 'logs/error.log', level: 'error', ...fileRotation }),
    new winston.transports.File({ filename: 'logs/combined.log', ...fileRotation })
  );
}

// Create winston logger instance
const logger = winston.createLogger({
  level: appConfig.logging.level.toLowerCase(),
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const metaString = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
      return `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)} ${metaString}`;
    })
  ),
  transports,
});

type LogMeta = Record<string, unknown>;

/** Who emits a line: a catalog provider, the resolver façade or the CLI. */
export type LogScope = CatalogProviderId | 'resolver' | 'cli';

export interface ScopedLog {
  info(event: string, meta?: LogMeta): void;
  warn(event: string, meta?: LogMeta): void;
  debug(event: string, meta?: LogMeta): void;
  error(event: string, error?: unknown, meta?: LogMeta): void;
}

const errorFields = (error: unknown): LogMeta => {
  if (error instanceof Error) return { error: error.message, stack: error.stack };
  return error === undefined ? {} : { error: String(error) };
};

// Every line carries its scope as metadata, so event names stay short.
export function scopedLog(scope: LogScope): ScopedLog {
  const child = logger.child({ scope });
  return {
    info: (event, meta = {}) => child.info(`📀 ${event}`, meta),
    warn: (event, meta = {}) => child.warn(`📀 ${event}`, meta),
    debug: (event, meta = {}) => child.debug(`📀 ${event}`, meta),
    error: (event, error, meta = {}) => child.error(`📀 ${event}`, { ...meta, ...errorFields(error) }),
  };
}

export { logger };
