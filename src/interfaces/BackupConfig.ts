/**
 * A PostgreSQL server to back up, derived from a `SERVER_*` connection string
 */
export interface ServerTarget {
  /** Configuration key the server was read from, e.g. SERVER_1 */
  key: string;

  /** Connection string as written in the configuration */
  uri: string;

  host: string;
  port: number;

  /** Last dotted component of the host, used in archive names */
  label: string;
}

/**
 * One `DB_<n>_*` entry. Indices are contiguous from 1.
 */
export interface DatabaseCredential {
  index: number;
  name: string;
  user?: string;
  password?: string;
}

/**
 * Server that dumps are restored into
 */
export interface RestoreTarget {
  host: string;
  port: number;
  user: string;
  password?: string;
  directory: string;
}

export interface FleetConfig {
  configPath: string;
  servers: readonly ServerTarget[];
  databases: readonly DatabaseCredential[];

  /** Numbered DB_<n>_NAME keys that sit past the first gap and are never enumerated */
  ignoredDatabaseKeys: readonly string[];

  backupRoot: string;
  logRoot: string;
  retentionDays: number;
  logLevel: string;

  backupSchedule?: string; // cron format
  backupTimezone?: string;
  backupRunOnStart?: boolean;
  commandTimeoutMinutes?: number;
  restore?: RestoreTarget;
}
