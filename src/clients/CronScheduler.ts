import * as cron from 'node-cron';
import { BackupManager } from '../interfaces/BackupManager';
import { CronScheduler as ICronScheduler, CronSchedulerConfig } from '../interfaces/CronScheduler';
import { Logger } from '../interfaces/Logger';
import { isError } from '../utils/errors';

/**
 * Custom error classes for cron scheduling operations
 */
export class CronSchedulerError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CronSchedulerError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class CronValidationError extends CronSchedulerError {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(message, 'validation');
    this.name = 'CronValidationError';
  }
}

/**
 * CronScheduler implementation using node-cron library.
 * A tick that fires while the previous run is still going is skipped.
 */
export class CronScheduler implements ICronScheduler {
  private task: cron.ScheduledTask | null = null;
  private isBackupRunning = false;

  constructor(
    private readonly config: CronSchedulerConfig,
    private readonly backupManager: BackupManager,
    private readonly logger: Logger
  ) {}

  start(): void {
    if (this.task) {
      this.logger.warn('CronScheduler is already running');
      return;
    }

    if (!this.validateCronExpression(this.config.cronExpression)) {
      throw new CronValidationError(
        `Invalid cron expression: ${this.config.cronExpression}`,
        this.config.cronExpression
      );
    }

    this.logger.info(
      `Starting cron scheduler with expression: ${this.config.cronExpression} (timezone: ${this.config.timezone ?? 'local'})`
    );

    try {
      this.task = cron.schedule(
        this.config.cronExpression,
        () => this.executeScheduledBackup(),
        {
          scheduled: false,
          ...(this.config.timezone && { timezone: this.config.timezone }),
        }
      );
      this.task.start();
    } catch (error) {
      const startError = new CronSchedulerError(
        `Failed to start cron scheduler: ${this.formatError(error)}`,
        'start',
        isError(error) ? error : undefined
      );
      this.logger.error(startError.message, startError);
      throw startError;
    }

    this.logger.info('CronScheduler started successfully');

    if (this.config.runOnInit) {
      this.logger.info('Running initial backup due to runOnInit configuration');
      setImmediate(() => {
        void this.executeScheduledBackup();
      });
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.warn('CronScheduler is not running');
      return;
    }

    this.logger.info('Stopping cron scheduler...');
    this.task.stop();
    this.task = null;
    this.logger.info('CronScheduler stopped successfully');
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  /**
   * Whether a backup started by this scheduler is still in progress
   */
  isBusy(): boolean {
    return this.isBackupRunning;
  }

  validateCronExpression(expression: string): boolean {
    return cron.validate(expression);
  }

  /**
   * Execute a scheduled backup with overlap prevention. Never rejects.
   */
  async executeScheduledBackup(): Promise<void> {
    if (this.isBackupRunning) {
      this.logger.warn('Backup is already running, skipping this scheduled execution');
      return;
    }

    this.isBackupRunning = true;
    const startTime = Date.now();
    this.logger.logScheduledExecution(this.config.cronExpression);

    try {
      const summary = await this.backupManager.executeBackup();
      this.logger.info(
        `Scheduled backup finished in ${Date.now() - startTime}ms: ${summary.totalSuccess} succeeded, ${summary.totalFail} failed`,
        { timestamp: summary.timestamp }
      );
    } catch (error) {
      this.logger.error(
        `Scheduled backup execution failed after ${Date.now() - startTime}ms: ${this.formatError(error)}`,
        isError(error) ? error : undefined,
        { cronExpression: this.config.cronExpression }
      );
    } finally {
      this.isBackupRunning = false;
    }
  }

  /**
   * Format error for consistent logging
   */
  private formatError(error: unknown): string {
    if (isError(error)) {
      return `${error.name}: ${error.message}`;
    }
    return String(error);
  }
}
