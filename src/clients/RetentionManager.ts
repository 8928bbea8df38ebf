import { promises as fs } from 'fs';
import { join, resolve } from 'path';
import { FleetConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import {
  RetentionManager as IRetentionManager,
  RetentionResult,
} from '../interfaces/RetentionManager';
import { isError } from '../utils/errors';
import { ARCHIVE_PATTERN, LOG_PATTERN } from '../utils/naming';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Custom error classes for retention management operations
 */
export class RetentionError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RetentionError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * A best-effort deletion that did not succeed. Logged, never fatal.
 */
export class CleanupFailure extends RetentionError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: Error
  ) {
    super(message, 'deletion', cause);
    this.name = 'CleanupFailure';
  }
}

interface CandidateFile {
  path: string;
  kind: 'backup' | 'log';
}

/**
 * Deletes archives and logs whose modification time is older than the retention window.
 * Age-based only; the number of files kept is not bounded.
 */
export class RetentionManager implements IRetentionManager {
  private readonly retentionDays: number;
  private readonly scanTargets: ReadonlyArray<{
    directory: string;
    pattern: RegExp;
    kind: CandidateFile['kind'];
  }>;

  constructor(
    config: Pick<FleetConfig, 'backupRoot' | 'logRoot' | 'retentionDays'>,
    private readonly logger: Logger
  ) {
    this.retentionDays = config.retentionDays;
    this.scanTargets = [
      { directory: config.backupRoot, pattern: ARCHIVE_PATTERN, kind: 'backup' },
      { directory: config.logRoot, pattern: LOG_PATTERN, kind: 'log' },
    ];
  }

  async cleanupExpiredFiles(now: Date, protectedPaths: string[] = []): Promise<RetentionResult> {
    const result: RetentionResult = {
      deletedCount: 0,
      totalCount: 0,
      deletedPaths: [],
      errors: [],
    };
    const protectedSet = new Set(protectedPaths.map((path) => resolve(path)));

    this.logger.info(
      `Deleting backups and logs older than: ${this.cutoff(now).toISOString()}`,
      { retentionDays: this.retentionDays }
    );

    for (const target of this.scanTargets) {
      let candidates: CandidateFile[];
      try {
        candidates = await this.listCandidates(target.directory, target.pattern, target.kind);
      } catch (error) {
        const listingError = new RetentionError(
          `Failed to list ${target.directory} for cleanup: ${this.formatError(error)}`,
          'listing',
          isError(error) ? error : undefined
        );
        result.errors.push(listingError.message);
        this.logger.error(listingError.message, listingError);
        continue;
      }

      for (const candidate of candidates) {
        if (protectedSet.has(resolve(candidate.path))) {
          continue;
        }

        let lastModified: Date;
        try {
          lastModified = (await fs.stat(candidate.path)).mtime;
        } catch (error) {
          const failure = new RetentionError(
            `Failed to inspect ${candidate.kind} ${candidate.path}: ${this.formatError(error)}`,
            'inspection',
            isError(error) ? error : undefined
          );
          result.errors.push(failure.message);
          this.logger.error(failure.message, failure);
          continue;
        }
        result.totalCount++;

        if (!this.isExpired(lastModified, now)) {
          this.logger.debug(`Keeping ${candidate.kind}: ${candidate.path}`);
          continue;
        }

        try {
          await fs.unlink(candidate.path);
          result.deletedCount++;
          result.deletedPaths.push(candidate.path);
          this.logger.info(`Removing old ${candidate.kind} ${candidate.path}`, {
            lastModified: lastModified.toISOString(),
          });
        } catch (error) {
          const failure = new CleanupFailure(
            `Failed to remove ${candidate.kind} ${candidate.path}: ${this.formatError(error)}`,
            candidate.path,
            isError(error) ? error : undefined
          );
          result.errors.push(failure.message);
          this.logger.error(failure.message, failure);
        }
      }
    }

    this.logger.logRetentionCleanup(result.deletedCount, this.retentionDays);
    if (result.errors.length > 0) {
      this.logger.warn(
        `Retention cleanup had ${result.errors.length} errors. Some files may not have been deleted.`
      );
    }

    return result;
  }

  /**
   * Strictly older than `now - retentionDays`
   */
  isExpired(lastModified: Date, now: Date): boolean {
    return lastModified.getTime() < this.cutoff(now).getTime();
  }

  private cutoff(now: Date): Date {
    return new Date(now.getTime() - this.retentionDays * DAY_MS);
  }

  private async listCandidates(
    directory: string,
    pattern: RegExp,
    kind: CandidateFile['kind']
  ): Promise<CandidateFile[]> {
    const entries = await fs.readdir(directory, { withFileTypes: true });

    return entries
      .filter((entry) => entry.isFile() && pattern.test(entry.name))
      .map((entry) => ({ path: join(directory, entry.name), kind }))
      .sort((a, b) => a.path.localeCompare(b.path));
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
