import { ServerTarget } from './BackupConfig';

export interface SealRequest {
  server: ServerTarget;

  /** Temporary directory holding the server's dumps */
  sourceDir: string;

  successCount: number;
  timestamp: string;
}

export type ArchiveStatus = 'sealed' | 'skipped' | 'failed';

export interface ArchiveResult {
  status: ArchiveStatus;
  archivePath?: string;
  sizeBytes?: number;
  error?: string;
}

/**
 * Packages one server's dumps into a single archive
 */
export interface ArchiveManager {
  seal(request: SealRequest): Promise<ArchiveResult>;
}
