/**
 * File and directory names shared by the backup and restore runs
 */

export const DUMP_EXTENSION = '.dump';
export const ARCHIVE_PATTERN = /^postgres_.+\.tar\.gz$/;
export const LOG_PATTERN = /\.log$/;

const DUMP_NAME_PATTERN = /^(.+)_(\d{4}-\d{2}-\d{2})_(\d{2}-\d{2}-\d{2})\.dump$/;

/**
 * Format date to YYYY-MM-DD_HH-MM-SS format (local time)
 */
export function formatTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');

  return `${year}-${month}-${day}_${hours}-${minutes}-${seconds}`;
}

export function dumpFileName(databaseName: string, timestamp: string): string {
  return `${databaseName}_${timestamp}${DUMP_EXTENSION}`;
}

export function archiveFileName(label: string, timestamp: string): string {
  return `postgres_${label}_${timestamp}.tar.gz`;
}

export function tempDirName(host: string, timestamp: string): string {
  return `tmp_backup_${host}_${timestamp}`;
}

export function runLogFileName(kind: 'backup' | 'restore', timestamp: string): string {
  return `${kind}_run_${timestamp}.log`;
}

export function serverLogFileName(kind: 'backup' | 'restore', host: string, timestamp: string): string {
  return `${kind}_${host}_${timestamp}.log`;
}

export interface ParsedDumpName {
  databaseName: string;

  /** Null when the name does not carry a timestamp */
  timestamp: Date | null;
}

/**
 * Recover the database name from `<name>_<YYYY-MM-DD>_<HH-MM-SS>.dump`.
 * Names that do not match fall back to the file name without its extension.
 */
export function parseDumpFileName(fileName: string): ParsedDumpName {
  const match = DUMP_NAME_PATTERN.exec(fileName);

  if (!match) {
    const extensionStart = fileName.lastIndexOf('.');
    return {
      databaseName: extensionStart > 0 ? fileName.substring(0, extensionStart) : fileName,
      timestamp: null,
    };
  }

  const [, databaseName, datePart, timePart] = match;
  const date = new Date(`${datePart}T${timePart.replace(/-/g, ':')}`);

  return {
    databaseName,
    timestamp: isNaN(date.getTime()) ? null : date,
  };
}
