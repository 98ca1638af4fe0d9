/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output, optional log
 * rotation, and per-package namespaces.
 *
 * The console transport writes to stderr: stdout is reserved for the
 * human-readable progress report and inventory. File transports are added
 * once configuration is loaded, see `enableFileLogging`.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export interface LogContext {
  artifact?: string;
  sourceId?: string;
  group?: string;
  [key: string]: unknown;
}

interface LoggerConfig {
  level: string;
  enableConsole: boolean;
  maxFiles: string;
  maxSize: string;
}

const defaultConfig: LoggerConfig = {
  level: process.env.LOG_LEVEL || 'warn',
  enableConsole: process.env.LOG_CONSOLE !== 'false',
  maxFiles: process.env.LOG_MAX_FILES || '14d',
  maxSize: process.env.LOG_MAX_SIZE || '20m',
};

const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Human-readable console format for interactive runs
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? ' ' + metaStr : ''}`;
  })
);

const transports: winston.transport[] = [];

if (defaultConfig.enableConsole) {
  transports.push(
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
      level: defaultConfig.level,
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    })
  );
}

const winstonLogger = winston.createLogger({
  level: 'debug',
  format: structuredFormat,
  defaultMeta: { service: 'model-bootstrap' },
  transports,
  exitOnError: false,
  // winston warns on a logger with no transports
  silent: transports.length === 0,
});

let fileLogDir: string | null = null;

/**
 * Add the daily-rotating error and combined file transports under `logDir`.
 * Only the first call takes effect.
 */
export function enableFileLogging(logDir: string): void {
  if (fileLogDir !== null) {
    return;
  }
  fileLogDir = logDir;
  fs.mkdirSync(logDir, { recursive: true });

  winstonLogger.add(
    new DailyRotateFile({
      filename: path.join(logDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      format: structuredFormat,
      maxSize: defaultConfig.maxSize,
      maxFiles: defaultConfig.maxFiles,
      zippedArchive: true,
    })
  );

  winstonLogger.add(
    new DailyRotateFile({
      filename: path.join(logDir, 'combined-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'debug',
      format: structuredFormat,
      maxSize: defaultConfig.maxSize,
      maxFiles: defaultConfig.maxFiles,
      zippedArchive: true,
    })
  );
  winstonLogger.silent = false;
}

class Logger {
  private context: LogContext = {};
  private namespace: string = 'model-bootstrap';

  constructor(namespace?: string) {
    if (namespace) {
      this.namespace = namespace;
    }
  }

  private mergeContext(additionalContext?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...this.context,
      ...additionalContext,
    };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...logContext,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error) {
      winstonLogger.error(message, { ...logContext, error });
    } else {
      winstonLogger.error(message, logContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.mergeContext(context));
  }

  /**
   * Create a child logger with persistent context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.namespace);
    childLogger.context = { ...this.context, ...context };
    return childLogger;
  }
}

/**
 * Change the console threshold at runtime (file transports keep their own)
 */
export function setLogLevel(level: string): void {
  for (const transport of winstonLogger.transports) {
    if (transport instanceof winston.transports.Console) {
      transport.level = level;
    }
  }
}

/**
 * Factory for package-specific loggers
 */
export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

export { Logger };

export { winstonLogger };
