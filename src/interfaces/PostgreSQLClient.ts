import { DatabaseCredential } from './BackupConfig';
import { CommandSpec } from './ProcessRunner';

export interface PostgreSQLEndpoint {
  host: string;
  port: number;
  user?: string;
  password?: string;
}

export interface PostgreSQLClient {
  testConnection(): Promise<boolean>;
  dumpCommand(database: DatabaseCredential, outputPath: string): CommandSpec;
  restoreCommand(databaseName: string, dumpPath: string): CommandSpec;
  createDatabaseCommand(databaseName: string): CommandSpec;
}
