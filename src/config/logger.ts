/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - LOGGING CONFIGURATION
 * ============================================================================
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { config } from './config';

export type LogMeta = Record<string, unknown>;

/**
 * Ensure log directory exists
 */
function ensureLogDirectory(): void {
  if (!fs.existsSync(config.logging.file.path)) {
    fs.mkdirSync(config.logging.file.path, { recursive: true });
  }
}

/**
 * Custom log format for development
 */
const developmentFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, component, stack, ...meta }) => {
    const componentStr = component ? ` [${String(component)}]` : '';
    let log = `${String(timestamp)} ${level}${componentStr}: ${String(message)}`;

    if (stack) {
      log += `\n${String(stack)}`;
    }

    const { service: _service, environment: _environment, ...rest } = meta;
    if (Object.keys(rest).length > 0) {
      log += `\n${JSON.stringify(rest, null, 2)}`;
    }

    return log;
  })
);

/**
 * Custom log format for production
 */
const productionFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.printf((info) => {
    const { timestamp, ...entry } = info;
    return JSON.stringify({
      '@timestamp': timestamp,
      ...entry,
    });
  })
);

/**
 * Create transports based on environment
 */
function createTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      level: config.logging.level,
      format: config.isDevelopment ? developmentFormat : productionFormat,
    }),
  ];

  if (config.logging.file.enabled) {
    ensureLogDirectory();

    transports.push(
      new DailyRotateFile({
        filename: path.join(config.logging.file.path, 'combined-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        maxSize: config.logging.file.maxSize,
        maxFiles: config.logging.file.maxFiles,
        level: config.logging.level,
        format: productionFormat,
      }),
      new DailyRotateFile({
        filename: path.join(config.logging.file.path, 'error-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        maxSize: config.logging.file.maxSize,
        maxFiles: config.logging.file.maxFiles,
        level: 'error',
        format: productionFormat,
      })
    );
  }

  return transports;
}

const winstonLogger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: 'telehealth-scheduler',
    environment: config.env,
  },
  transports: createTransports(),
  exitOnError: false,
});

/**
 * Thin wrapper that keeps call sites to `(message, meta)` and lets modules
 * stamp their own `component`.
 */
export class EnhancedLogger {
  constructor(private readonly winston: winston.Logger) {}

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.winston.error(message, meta);
  }

  /**
   * Logger bound to a component name
   */
  child(component: string): EnhancedLogger {
    return new EnhancedLogger(this.winston.child({ component }));
  }
}

export const logger = new EnhancedLogger(winstonLogger);

/**
 * Extract a loggable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default logger;
