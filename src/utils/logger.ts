import winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';

/**
 * Logger interface for structured logging
 */
export interface Logger {
  error: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Options for logger creation
 */
export interface LoggerOptions {
  level?: LogLevel;
  /** Directory for JSON log files. Console only when omitted. */
  logDir?: string;
  /** Silences every transport (used by tests) */
  silent?: boolean;
}

/**
 * Creates a Winston logger instance with structured logging
 * @param serviceName - Name of the service/module using the logger
 * @param options - Level, log directory and silencing
 * @returns Logger instance
 */
export function createLogger(
  serviceName: string,
  options: LoggerOptions = {}
): Logger {
  const logFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  );

  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf((info: winston.Logform.TransformableInfo) => {
          const { timestamp, level, message, ...meta } = info;
          const metaStr = Object.keys(meta).length
            ? JSON.stringify(meta)
            : '';
          return `${timestamp} [${level}] ${message} ${metaStr}`;
        })
      ),
    }),
  ];

  if (options.logDir) {
    if (!fs.existsSync(options.logDir)) {
      fs.mkdirSync(options.logDir, { recursive: true });
    }

    const dateStr = new Date().toISOString().split('T')[0]; // YYYY-MM-DD

    transports.push(
      new winston.transports.File({
        filename: path.join(options.logDir, `${serviceName}-${dateStr}.log`),
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 7,
        format: logFormat,
      }),
      new winston.transports.File({
        filename: path.join(options.logDir, `${serviceName}-errors-${dateStr}.log`),
        level: 'error',
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 30,
        format: logFormat,
      })
    );
  }

  const logger = winston.createLogger({
    level: options.level ?? 'info',
    format: logFormat,
    defaultMeta: { service: serviceName },
    silent: options.silent === true,
    transports,
  });

  return {
    error: (message: string, meta?: Record<string, unknown>) => {
      logger.error(message, meta);
    },
    warn: (message: string, meta?: Record<string, unknown>) => {
      logger.warn(message, meta);
    },
    info: (message: string, meta?: Record<string, unknown>) => {
      logger.info(message, meta);
    },
    debug: (message: string, meta?: Record<string, unknown>) => {
      logger.debug(message, meta);
    },
  };
}
