import { promises as fs } from 'fs';
import { join } from 'path';
import { ArchiveManager } from '../interfaces/ArchiveManager';
import { DatabaseCredential, FleetConfig, ServerTarget } from '../interfaces/BackupConfig';
import {
  BackupManager as IBackupManager,
  BackupRunSummary,
  DumpArtifact,
  DumpOutcome,
  OperationStatus,
  ServerSummary,
} from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';
import { ProcessRunner } from '../interfaces/ProcessRunner';
import { RetentionManager } from '../interfaces/RetentionManager';
import { errorMessage, hasErrorCode, isError } from '../utils/errors';
import {
  dumpFileName,
  formatTimestamp,
  runLogFileName,
  serverLogFileName,
  tempDirName,
} from '../utils/naming';
import { PostgreSQLClient } from './PostgreSQLClient';

/**
 * A single database dump that did not produce a usable artifact
 */
export class DumpFailure extends Error {
  constructor(
    message: string,
    public readonly databaseName: string,
    public readonly exitCode: number | null,
    public readonly diagnostics: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'DumpFailure';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * A dump counts only when pg_dump exited 0 and left a non-empty file behind
 */
export function classifyDump(outcome: Pick<DumpOutcome, 'exitCode' | 'artifact'>): OperationStatus {
  return outcome.exitCode === 0 && outcome.artifact !== null && outcome.artifact.sizeBytes > 0
    ? 'succeeded'
    : 'failed';
}

export interface BackupManagerOptions {
  /** Clock used for the run timestamp */
  now?: () => Date;
}

/**
 * Backs up every configured server, one database at a time, then seals each server's
 * dumps into an archive and prunes expired files
 */
export class BackupManager implements IBackupManager {
  private readonly now: () => Date;

  constructor(
    private readonly processRunner: ProcessRunner,
    private readonly archiveManager: ArchiveManager,
    private readonly retentionManager: RetentionManager,
    private readonly config: FleetConfig,
    private readonly logger: Logger,
    options: BackupManagerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async executeBackup(): Promise<BackupRunSummary> {
    const runDate = this.now();
    const timestamp = formatTimestamp(runDate);

    await fs.mkdir(this.config.backupRoot, { recursive: true });
    await fs.mkdir(this.config.logRoot, { recursive: true });

    this.logger.info(`=== PostgreSQL Backup Started using ${this.config.configPath} ===`);

    const servers: ServerSummary[] = [];
    for (const server of this.config.servers) {
      servers.push(await this.backupServer(server, timestamp));
    }

    this.logger.info('Cleaning up old backups/logs...');
    const activeLogs = [
      join(this.config.logRoot, runLogFileName('backup', timestamp)),
      ...this.config.servers.map((server) =>
        join(this.config.logRoot, serverLogFileName('backup', server.host, timestamp))
      ),
    ];
    const retention = await this.retentionManager.cleanupExpiredFiles(runDate, activeLogs);

    const summary: BackupRunSummary = {
      timestamp,
      servers,
      totalSuccess: servers.reduce((sum, server) => sum + server.successCount, 0),
      totalFail: servers.reduce((sum, server) => sum + server.failCount, 0),
      retention,
    };

    this.logSummary(summary);
    return summary;
  }

  private async backupServer(server: ServerTarget, timestamp: string): Promise<ServerSummary> {
    const tempDir = join(this.config.backupRoot, tempDirName(server.host, timestamp));
    const serverLog = join(this.config.logRoot, serverLogFileName('backup', server.host, timestamp));
    const client = new PostgreSQLClient({ host: server.host, port: server.port }, this.logger);

    this.logger.info(`Backing up server: ${server.host}`, { port: server.port });
    await fs.mkdir(tempDir, { recursive: true });

    let successCount = 0;
    const failedDatabases: string[] = [];

    for (const database of this.config.databases) {
      const outcome = await this.dumpDatabase(client, server, database, tempDir, serverLog, timestamp);

      if (classifyDump(outcome) === 'succeeded' && outcome.artifact) {
        successCount++;
        this.logger.logDumpComplete(server.host, database.name, outcome.artifact.sizeBytes, outcome.durationMs);
        continue;
      }

      failedDatabases.push(database.name);
      this.logger.logDumpError(
        server.host,
        database.name,
        new DumpFailure(
          `Failed to backup ${database.name} (rc=${outcome.exitCode ?? 'none'})`,
          database.name,
          outcome.exitCode,
          outcome.diagnostics,
          outcome.error
        ),
        { serverLog, diagnostics: outcome.diagnostics.trim().slice(-2000) }
      );
      await this.removePartialArtifact(outcome);
    }

    const archive = await this.archiveManager.seal({
      server,
      sourceDir: tempDir,
      successCount,
      timestamp,
    });

    return {
      host: server.host,
      label: server.label,
      successCount,
      failCount: failedDatabases.length,
      failedDatabases,
      archive,
    };
  }

  private async dumpDatabase(
    client: PostgreSQLClient,
    server: ServerTarget,
    database: DatabaseCredential,
    tempDir: string,
    logFile: string,
    timestamp: string
  ): Promise<DumpOutcome> {
    const artifactPath = join(tempDir, dumpFileName(database.name, timestamp));
    const command = client.dumpCommand(database, artifactPath);

    try {
      const result = await this.processRunner.run(command, {
        logFile,
        signal: this.commandSignal(),
      });

      return {
        server,
        database,
        exitCode: result.exitCode,
        artifact: await this.inspectArtifact(database.name, artifactPath, timestamp),
        diagnostics: result.output,
        durationMs: result.durationMs,
        ...(result.error && { error: result.error }),
      };
    } catch (error) {
      return {
        server,
        database,
        exitCode: null,
        artifact: await this.inspectArtifact(database.name, artifactPath, timestamp),
        diagnostics: '',
        durationMs: 0,
        error: isError(error) ? error : new Error(String(error)),
      };
    }
  }

  private async inspectArtifact(
    databaseName: string,
    path: string,
    timestamp: string
  ): Promise<DumpArtifact | null> {
    try {
      const stats = await fs.stat(path);
      return { databaseName, path, sizeBytes: stats.size, timestamp };
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        this.logger.warn(`Could not inspect backup file ${path}`, {
          error: errorMessage(error),
        });
      }
      return null;
    }
  }

  /**
   * Failed dumps must not end up in the archive
   */
  private async removePartialArtifact(outcome: DumpOutcome): Promise<void> {
    if (!outcome.artifact) {
      return;
    }
    try {
      await fs.unlink(outcome.artifact.path);
      this.logger.debug(`Cleaned up partial backup file: ${outcome.artifact.path}`);
    } catch (error) {
      this.logger.warn(`Failed to cleanup partial backup file ${outcome.artifact.path}`, {
        error: errorMessage(error),
      });
    }
  }

  private commandSignal(): AbortSignal | undefined {
    const minutes = this.config.commandTimeoutMinutes;
    return minutes ? AbortSignal.timeout(minutes * 60 * 1000) : undefined;
  }

  private logSummary(summary: BackupRunSummary): void {
    this.logger.info('=== Backup Summary ===');
    for (const server of summary.servers) {
      this.logger.info(` - ${server.host} → Success: ${server.successCount}, Fail: ${server.failCount}`);
    }
    this.logger.info(`Total → Success: ${summary.totalSuccess}, Fail: ${summary.totalFail}`);
    this.logger.info('=== Backup Finished ===');
  }
}
