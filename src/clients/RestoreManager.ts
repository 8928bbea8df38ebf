import { promises as fs } from 'fs';
import { basename, join } from 'path';
import { RestoreTarget } from '../interfaces/BackupConfig';
import { OperationStatus } from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';
import { PostgreSQLClient } from '../interfaces/PostgreSQLClient';
import { ProcessResult, ProcessRunner } from '../interfaces/ProcessRunner';
import {
  CreateDatabaseStatus,
  RestoreManager as IRestoreManager,
  RestoreOutcome,
  RestoreRunSummary,
} from '../interfaces/RestoreManager';
import { errorMessage, isError } from '../utils/errors';
import { DUMP_EXTENSION, formatTimestamp, parseDumpFileName, serverLogFileName } from '../utils/naming';

/** pg_restore reports this when the only errors came from dropping missing objects */
export const IGNORED_ERRORS_MARKER = 'errors ignored on restore';

const ALREADY_EXISTS_MARKER = 'already exists';

export class RestoreError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RestoreError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * One database whose restore did not succeed
 */
export class RestoreFailure extends RestoreError {
  constructor(
    message: string,
    public readonly databaseName: string,
    public readonly exitCode: number | null,
    public readonly diagnostics: string
  ) {
    super(message, 'restore');
    this.name = 'RestoreFailure';
  }
}

export function classifyRestore(result: Pick<ProcessResult, 'exitCode' | 'output'>): OperationStatus {
  return result.exitCode === 0 || result.output.includes(IGNORED_ERRORS_MARKER)
    ? 'succeeded'
    : 'failed';
}

/**
 * Every `.dump` file below `root`, sorted by path
 */
export async function findDumpFiles(root: string): Promise<string[]> {
  const found: string[] = [];

  const walk = async (directory: string): Promise<void> => {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    for (const entry of entries) {
      const path = join(directory, entry.name);
      if (entry.isDirectory()) {
        await walk(path);
      } else if (entry.isFile() && entry.name.endsWith(DUMP_EXTENSION)) {
        found.push(path);
      }
    }
  };

  await walk(root);
  return found.sort();
}

export interface RestoreManagerOptions {
  now?: () => Date;
  logRoot: string;
  commandTimeoutMinutes?: number;
}

/**
 * Restores every dump found under the restore directory into the restore server,
 * creating each database first when needed
 */
export class RestoreManager implements IRestoreManager {
  private readonly now: () => Date;

  constructor(
    private readonly processRunner: ProcessRunner,
    private readonly postgresClient: PostgreSQLClient,
    private readonly target: RestoreTarget,
    private readonly logger: Logger,
    private readonly options: RestoreManagerOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async validateConfiguration(): Promise<boolean> {
    try {
      const stats = await fs.stat(this.target.directory);
      if (!stats.isDirectory()) {
        this.logger.error(`Restore path is not a directory: ${this.target.directory}`);
        return false;
      }
    } catch (error) {
      this.logger.error(
        `Restore directory not found: ${this.target.directory}`,
        isError(error) ? error : undefined
      );
      return false;
    }

    this.logger.info(`Testing connection to ${this.target.host}:${this.target.port}...`);
    const connected = await this.postgresClient.testConnection();
    if (!connected) {
      this.logger.error(`Cannot connect to restore server ${this.target.host}:${this.target.port}`);
      return false;
    }

    return true;
  }

  async executeRestore(): Promise<RestoreRunSummary> {
    const timestamp = formatTimestamp(this.now());
    const logFile = join(this.options.logRoot, serverLogFileName('restore', this.target.host, timestamp));

    const dumpFiles = await findDumpFiles(this.target.directory);
    const summary: RestoreRunSummary = {
      timestamp,
      directory: this.target.directory,
      dumpCount: dumpFiles.length,
      successCount: 0,
      failCount: 0,
      failedDatabases: [],
      outcomes: [],
    };

    if (dumpFiles.length === 0) {
      this.logger.error(`No ${DUMP_EXTENSION} files found in ${this.target.directory}`);
      return summary;
    }

    for (const [position, dumpFile] of dumpFiles.entries()) {
      const { databaseName, timestamp } = parseDumpFileName(basename(dumpFile));
      this.logger.info(`(${position + 1}/${dumpFiles.length}) Restoring database: ${databaseName}`, {
        dumpFile,
        ...(timestamp && { dumpedAt: timestamp.toISOString() }),
      });

      const outcome = await this.restoreDatabase(dumpFile, databaseName, logFile);
      summary.outcomes.push(outcome);

      if (outcome.status === 'succeeded') {
        summary.successCount++;
        this.logger.info(`Database ${databaseName} restored successfully`);
      } else {
        summary.failCount++;
        summary.failedDatabases.push(databaseName);
        const failure = new RestoreFailure(
          `Failed to restore database ${databaseName}`,
          databaseName,
          outcome.exitCode,
          outcome.diagnostics
        );
        this.logger.error(failure.message, failure, {
          diagnostics: outcome.diagnostics.trim().slice(-2000),
        });
      }
    }

    this.logSummary(summary, logFile);
    return summary;
  }

  private async restoreDatabase(
    dumpFile: string,
    databaseName: string,
    logFile: string
  ): Promise<RestoreOutcome> {
    const createStatus = await this.ensureDatabase(databaseName, logFile);

    let result: ProcessResult;
    try {
      result = await this.processRunner.run(
        this.postgresClient.restoreCommand(databaseName, dumpFile),
        { logFile, signal: this.commandSignal() }
      );
    } catch (error) {
      return {
        dumpFile,
        databaseName,
        createStatus,
        exitCode: null,
        diagnostics: errorMessage(error),
        status: 'failed',
      };
    }

    return {
      dumpFile,
      databaseName,
      createStatus,
      exitCode: result.exitCode,
      diagnostics: result.output,
      status: classifyRestore(result),
    };
  }

  /**
   * createdb; an existing database is fine, anything else is a warning and the restore
   * still runs so pg_restore reports the authoritative failure
   */
  private async ensureDatabase(databaseName: string, logFile: string): Promise<CreateDatabaseStatus> {
    try {
      const result = await this.processRunner.run(
        this.postgresClient.createDatabaseCommand(databaseName),
        { logFile, signal: this.commandSignal() }
      );

      if (result.exitCode === 0) {
        return 'created';
      }
      if (result.output.includes(ALREADY_EXISTS_MARKER)) {
        return 'exists';
      }

      this.logger.warn(`Failed to create database ${databaseName}`, {
        exitCode: result.exitCode,
        diagnostics: result.output.trim(),
      });
    } catch (error) {
      this.logger.warn(`Failed to create database ${databaseName}`, {
        error: errorMessage(error),
      });
    }
    return 'failed';
  }

  private commandSignal(): AbortSignal | undefined {
    const minutes = this.options.commandTimeoutMinutes;
    return minutes ? AbortSignal.timeout(minutes * 60 * 1000) : undefined;
  }

  private logSummary(summary: RestoreRunSummary, logFile: string): void {
    this.logger.info('=== PostgreSQL Restore Summary ===');
    this.logger.info(`Success: ${summary.successCount} | Fail: ${summary.failCount}`);
    if (summary.failedDatabases.length > 0) {
      this.logger.info(`Failed databases: ${summary.failedDatabases.join(', ')}`);
    }
    this.logger.info(`Detailed log saved at: ${logFile}`);
    this.logger.info('=== PostgreSQL Restore Finished ===');
  }
}
