import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';

export interface LoggerOptions {
  /** Run log the entries are also appended to */
  logFile?: string;
}

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'pgpassword'];

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO, options: LoggerOptions = {}) {
    const fileTransports = options.logFile
      ? [
          new winston.transports.File({
            filename: options.logFile,
            format: winston.format.printf((info) => {
              const { timestamp, level, message, stack, ...meta } = info;
              const suffix = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
              const trace = typeof stack === 'string' ? `\n${stack}` : '';
              return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${suffix}${trace}`;
            }),
          }),
        ]
      : [];

    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss,SSS' }),
        winston.format.errors({ stack: true })
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
        }),
        ...fileTransports,
      ],
    });
  }

  /**
   * Sanitize metadata to remove sensitive information
   */
  private sanitizeMeta(meta: LogMeta): LogMeta {
    const sanitized: LogMeta = { ...meta };

    for (const [key, value] of Object.entries(sanitized)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive));

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
      } else if (Array.isArray(value)) {
        sanitized[key] = value.map((item: unknown) =>
          typeof item === 'object' && item !== null ? this.sanitizeMeta({ ...item }) : item
        );
      } else if (typeof value === 'object' && value !== null) {
        sanitized[key] = this.sanitizeMeta({ ...value });
      }
    }

    return sanitized;
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta && this.sanitizeMeta(meta));
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta && this.sanitizeMeta(meta));
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta: LogMeta = {
      ...(meta && this.sanitizeMeta(meta)),
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          ...('code' in error && { code: error.code }),
          ...('exitCode' in error && { exitCode: error.exitCode }),
        },
        // Printed after the line by the file format, with any "Caused by" chain
        stack: error.stack,
      }),
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta && this.sanitizeMeta(meta));
  }

  logDumpComplete(host: string, databaseName: string, fileSize: number, duration: number): void {
    this.info(`Backup created: ${databaseName} (${fileSize} bytes)`, {
      operation: 'dump_complete',
      host,
      databaseName,
      fileSize,
      duration,
    });
  }

  logDumpError(host: string, databaseName: string, error: Error, meta?: LogMeta): void {
    this.error(`Failed to backup ${databaseName}`, error, {
      operation: 'dump_error',
      host,
      databaseName,
      ...meta,
    });
  }

  logRetentionCleanup(deletedCount: number, retentionDays: number): void {
    this.info('Retention cleanup completed', {
      operation: 'retention_cleanup',
      deletedCount,
      retentionDays,
    });
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Starting with configuration', {
      operation: 'startup',
      config: this.sanitizeMeta(config),
    });
  }

  logScheduledExecution(cronExpression: string): void {
    this.info('Scheduled backup execution triggered', {
      operation: 'scheduled_execution',
      cronExpression,
    });
  }

  async close(): Promise<void> {
    await new Promise<void>((resolve) => {
      this.winston.on('finish', () => resolve());
      this.winston.end();
    });
  }

  /**
   * Parse a LOG_LEVEL value, falling back to INFO for unknown levels
   */
  static parseLevel(value: string | undefined): LogLevel {
    const level = Object.values(LogLevel).find((candidate) => candidate === value?.toLowerCase());
    return level ?? LogLevel.INFO;
  }
}
