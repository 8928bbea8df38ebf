export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Specialized logging methods for backup operations
  logDumpComplete(host: string, databaseName: string, fileSize: number, duration: number): void;
  logDumpError(host: string, databaseName: string, error: Error, meta?: LogMeta): void;
  logRetentionCleanup(deletedCount: number, retentionDays: number): void;
  logConfigurationStart(config: LogMeta): void;
  logScheduledExecution(cronExpression: string): void;

  /** Flush and release file transports */
  close(): Promise<void>;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
