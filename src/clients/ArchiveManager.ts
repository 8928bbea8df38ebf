import { promises as fs } from 'fs';
import { join } from 'path';
import * as tar from 'tar';
import {
  ArchiveManager as IArchiveManager,
  ArchiveResult,
  SealRequest,
} from '../interfaces/ArchiveManager';
import { Logger } from '../interfaces/Logger';
import { errorMessage, hasErrorCode, isError } from '../utils/errors';
import { archiveFileName } from '../utils/naming';
import { CleanupFailure } from './RetentionManager';

export class CompressionFailure extends Error {
  constructor(
    message: string,
    public readonly archivePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CompressionFailure';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Seals a server's temporary dump directory into `postgres_<label>_<timestamp>.tar.gz`
 * and removes the directory afterwards, whatever the compression outcome.
 */
export class ArchiveManager implements IArchiveManager {
  constructor(
    private readonly backupRoot: string,
    private readonly logger: Logger
  ) {}

  async seal(request: SealRequest): Promise<ArchiveResult> {
    let result: ArchiveResult;

    if (request.successCount > 0) {
      result = await this.compress(request);
    } else {
      this.logger.warn(`No successful backups for ${request.server.host}`, {
        host: request.server.host,
      });
      result = { status: 'skipped' };
    }

    await this.removeDirectory(request.sourceDir);
    return result;
  }

  private async compress(request: SealRequest): Promise<ArchiveResult> {
    const archivePath = join(this.backupRoot, archiveFileName(request.server.label, request.timestamp));

    try {
      const entries = (await fs.readdir(request.sourceDir)).sort();
      await tar.create({ gzip: { level: 9 }, file: archivePath, cwd: request.sourceDir, portable: true }, entries);

      const stats = await fs.stat(archivePath);
      this.logger.info(`Compressed: ${archivePath}`, {
        host: request.server.host,
        files: entries.length,
        sizeBytes: stats.size,
      });
      return { status: 'sealed', archivePath, sizeBytes: stats.size };
    } catch (error) {
      const failure = new CompressionFailure(
        `Compression failed for ${request.server.host}: ${errorMessage(error)}`,
        archivePath,
        isError(error) ? error : undefined
      );
      this.logger.error(failure.message, failure, { host: request.server.host });
      await this.removePartialArchive(archivePath);
      return { status: 'failed', archivePath, error: failure.message };
    }
  }

  private async removePartialArchive(archivePath: string): Promise<void> {
    try {
      await fs.unlink(archivePath);
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        this.reportCleanupFailure(archivePath, error);
      }
    }
  }

  private async removeDirectory(directory: string): Promise<void> {
    try {
      await fs.rm(directory, { recursive: true, force: true });
      this.logger.debug(`Removed temporary directory ${directory}`);
    } catch (error) {
      this.reportCleanupFailure(directory, error);
    }
  }

  private reportCleanupFailure(path: string, error: unknown): void {
    const failure = new CleanupFailure(
      `Failed to remove ${path}: ${errorMessage(error)}`,
      path,
      isError(error) ? error : undefined
    );
    this.logger.warn(failure.message, { path });
  }
}
