import { OperationStatus } from './BackupManager';

export type CreateDatabaseStatus = 'created' | 'exists' | 'failed';

export interface RestoreOutcome {
  dumpFile: string;
  databaseName: string;
  createStatus: CreateDatabaseStatus;
  exitCode: number | null;
  diagnostics: string;
  status: OperationStatus;
}

export interface RestoreRunSummary {
  timestamp: string;
  directory: string;
  dumpCount: number;
  successCount: number;
  failCount: number;
  failedDatabases: string[];
  outcomes: RestoreOutcome[];
}

export interface RestoreManager {
  /** Check the restore endpoint and directory before any work starts */
  validateConfiguration(): Promise<boolean>;

  executeRestore(): Promise<RestoreRunSummary>;
}
