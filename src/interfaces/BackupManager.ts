import { DatabaseCredential, ServerTarget } from './BackupConfig';
import { ArchiveResult } from './ArchiveManager';
import { RetentionResult } from './RetentionManager';

/**
 * A dump file produced by pg_dump
 */
export interface DumpArtifact {
  databaseName: string;
  path: string;
  sizeBytes: number;
  timestamp: string;
}

/**
 * Everything known about one pg_dump invocation
 */
export interface DumpOutcome {
  server: ServerTarget;
  database: DatabaseCredential;
  exitCode: number | null;

  /** Null when the output file is missing */
  artifact: DumpArtifact | null;

  diagnostics: string;
  durationMs: number;
  error?: Error;
}

export type OperationStatus = 'succeeded' | 'failed';

export interface ServerSummary {
  host: string;
  label: string;
  successCount: number;
  failCount: number;
  failedDatabases: string[];
  archive: ArchiveResult;
}

export interface BackupRunSummary {
  timestamp: string;
  servers: ServerSummary[];
  totalSuccess: number;
  totalFail: number;
  retention: RetentionResult;
}

/**
 * Interface for the backup orchestration manager
 */
export interface BackupManager {
  /** Back up every configured server, seal archives and prune old files */
  executeBackup(): Promise<BackupRunSummary>;
}
