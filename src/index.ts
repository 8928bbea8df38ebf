#!/usr/bin/env node
import { join } from 'path';
import { parseArgs } from 'util';
import { ArchiveManager } from './clients/ArchiveManager';
import { BackupManager } from './clients/BackupManager';
import { CronScheduler } from './clients/CronScheduler';
import { Logger } from './clients/Logger';
import { PostgreSQLClient } from './clients/PostgreSQLClient';
import { ProcessRunner } from './clients/ProcessRunner';
import { RestoreManager } from './clients/RestoreManager';
import { RetentionManager } from './clients/RetentionManager';
import { ConfigError, ConfigurationManager } from './config/ConfigurationManager';
import { FleetConfig } from './interfaces/BackupConfig';
import { BackupRunSummary } from './interfaces/BackupManager';
import { CronSchedulerConfig } from './interfaces/CronScheduler';
import { ProcessRunner as IProcessRunner } from './interfaces/ProcessRunner';
import { errorMessage } from './utils/errors';
import { formatTimestamp, runLogFileName } from './utils/naming';

export const USAGE = 'Usage: pg-fleet-backup [--restore | --schedule] [--override] <config-file>';

export enum ExitCode {
  SUCCESS = 0,
  USAGE_OR_CONFIG = 1,
  FATAL = 2,
  PARTIAL_FAILURE = 3,
}

export type RunMode = 'backup' | 'restore' | 'schedule';

export interface CommandLine {
  configPath: string;
  mode: RunMode;
  override: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseOptions(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        restore: { type: 'boolean', default: false },
        schedule: { type: 'boolean', default: false },
        override: { type: 'boolean', default: false },
      },
    });
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

export function parseCommandLine(argv: string[]): CommandLine {
  const { values, positionals } = parseOptions(argv);

  if (positionals.length !== 1) {
    throw new UsageError(positionals.length === 0 ? 'Missing configuration file' : 'Too many arguments');
  }
  if (values.restore && values.schedule) {
    throw new UsageError('--restore and --schedule cannot be combined');
  }

  return {
    configPath: positionals[0],
    mode: values.restore ? 'restore' : values.schedule ? 'schedule' : 'backup',
    override: values.override === true,
  };
}

export function schedulerConfig(config: FleetConfig, cronExpression: string): CronSchedulerConfig {
  return {
    cronExpression,
    ...(config.backupTimezone && { timezone: config.backupTimezone }),
    ...(config.backupRunOnStart && { runOnInit: true }),
  };
}

/**
 * Main application class that loads the configuration and drives backup, restore or
 * scheduled backup runs
 */
export class FleetBackupApplication {
  private logger: Logger;
  private config: FleetConfig | null = null;
  private cronScheduler: CronScheduler | null = null;

  constructor(
    private readonly commandLine: CommandLine,
    private readonly processRunner: IProcessRunner = new ProcessRunner()
  ) {
    this.logger = new Logger();
  }

  /**
   * Load and validate the configuration
   * @throws ConfigError
   */
  initialize(): FleetConfig {
    const config = ConfigurationManager.loadConfiguration(this.commandLine.configPath, {
      override: this.commandLine.override,
    });

    this.logger = new Logger(Logger.parseLevel(config.logLevel));
    this.config = config;
    return config;
  }

  async run(): Promise<ExitCode> {
    const config = this.requireConfig();

    switch (this.commandLine.mode) {
      case 'restore':
        return this.runRestore(config);
      case 'schedule':
        return this.runScheduled(config);
      default: {
        const summary = await this.runBackup(config);
        return summary.totalFail > 0 ? ExitCode.PARTIAL_FAILURE : ExitCode.SUCCESS;
      }
    }
  }

  /**
   * One backup pass with its own run log
   */
  async runBackup(config: FleetConfig): Promise<BackupRunSummary> {
    const runDate = new Date();
    const runLogger = new Logger(Logger.parseLevel(config.logLevel), {
      logFile: join(config.logRoot, runLogFileName('backup', formatTimestamp(runDate))),
    });

    try {
      runLogger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));
      this.warnAboutIgnoredDatabases(config, runLogger);

      if (config.servers.length === 0) {
        runLogger.error(`No servers found in ${config.configPath}`);
        return {
          timestamp: formatTimestamp(runDate),
          servers: [],
          totalSuccess: 0,
          totalFail: 0,
          retention: { deletedCount: 0, totalCount: 0, deletedPaths: [], errors: [] },
        };
      }

      const backupManager = new BackupManager(
        this.processRunner,
        new ArchiveManager(config.backupRoot, runLogger),
        new RetentionManager(config, runLogger),
        config,
        runLogger,
        { now: () => runDate }
      );
      return await backupManager.executeBackup();
    } finally {
      await runLogger.close();
    }
  }

  private async runRestore(config: FleetConfig): Promise<ExitCode> {
    if (!config.restore) {
      this.logger.error('RESTORE_HOST is required for --restore');
      return ExitCode.USAGE_OR_CONFIG;
    }

    const runDate = new Date();
    const runLogger = new Logger(Logger.parseLevel(config.logLevel), {
      logFile: join(config.logRoot, runLogFileName('restore', formatTimestamp(runDate))),
    });

    try {
      runLogger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

      const restoreManager = new RestoreManager(
        this.processRunner,
        new PostgreSQLClient(config.restore, runLogger),
        config.restore,
        runLogger,
        {
          logRoot: config.logRoot,
          now: () => runDate,
          ...(config.commandTimeoutMinutes && { commandTimeoutMinutes: config.commandTimeoutMinutes }),
        }
      );

      if (!(await restoreManager.validateConfiguration())) {
        return ExitCode.FATAL;
      }

      const summary = await restoreManager.executeRestore();
      return summary.dumpCount === 0 || summary.failCount > 0
        ? ExitCode.PARTIAL_FAILURE
        : ExitCode.SUCCESS;
    } finally {
      await runLogger.close();
    }
  }

  private async runScheduled(config: FleetConfig): Promise<ExitCode> {
    if (!config.backupSchedule) {
      this.logger.error('BACKUP_SCHEDULE is required for --schedule');
      return ExitCode.USAGE_OR_CONFIG;
    }

    this.cronScheduler = new CronScheduler(
      schedulerConfig(config, config.backupSchedule),
      { executeBackup: () => this.runBackup(config) },
      this.logger
    );
    this.cronScheduler.start();
    this.logger.info('Service is now running and will execute backups according to the configured schedule');

    await this.waitForShutdownSignal();
    return ExitCode.SUCCESS;
  }

  /**
   * Resolve on SIGINT/SIGTERM once the scheduler is stopped and any running backup has finished
   */
  private waitForShutdownSignal(): Promise<void> {
    return new Promise((resolve) => {
      const signals = ['SIGTERM', 'SIGINT'] as const;

      const onSignal = (signal: NodeJS.Signals): void => {
        this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
        signals.forEach((name) => process.off(name, onSignal));
        this.cronScheduler?.stop();

        const waitForIdle = (): void => {
          if (this.cronScheduler?.isBusy()) {
            setTimeout(waitForIdle, 1000);
            return;
          }
          this.logger.info('Shutdown completed');
          resolve();
        };
        waitForIdle();
      };

      signals.forEach((name) => process.on(name, onSignal));
    });
  }

  private warnAboutIgnoredDatabases(config: FleetConfig, logger: Logger): void {
    if (config.ignoredDatabaseKeys.length > 0) {
      logger.warn(
        `Database enumeration stopped at DB_${config.databases.length + 1}_NAME; ignoring ${config.ignoredDatabaseKeys.join(', ')}`
      );
    }
  }

  private requireConfig(): FleetConfig {
    if (!this.config) {
      throw new Error('Application not initialized. Call initialize() first.');
    }
    return this.config;
  }

  async shutdown(): Promise<void> {
    await this.logger.close();
  }
}

/**
 * Application entry point
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  processRunner?: IProcessRunner
): Promise<ExitCode> {
  let commandLine: CommandLine;
  try {
    commandLine = parseCommandLine(argv);
  } catch (error) {
    console.error(`${errorMessage(error)}\n${USAGE}`);
    return ExitCode.USAGE_OR_CONFIG;
  }

  const app = new FleetBackupApplication(commandLine, processRunner);
  try {
    app.initialize();
    return await app.run();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      return ExitCode.USAGE_OR_CONFIG;
    }
    console.error('Fatal error:', error);
    return ExitCode.FATAL;
  } finally {
    await app.shutdown();
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('Fatal error starting application:', error);
      process.exitCode = ExitCode.FATAL;
    }
  );
}
