/**
 * Result of a retention cleanup operation
 */
export interface RetentionResult {
  /** Number of files that were deleted */
  deletedCount: number;

  /** Number of candidate files inspected */
  totalCount: number;

  deletedPaths: string[];

  /** Any errors encountered during listing or deletion */
  errors: string[];
}

/**
 * Interface for age-based pruning of archives and logs
 */
export interface RetentionManager {
  /**
   * Delete archives and log files last modified before `now - retentionDays`
   * @param protectedPaths files that are never deleted, such as the active run logs
   */
  cleanupExpiredFiles(now: Date, protectedPaths?: string[]): Promise<RetentionResult>;

  /** Whether a file with this modification time falls outside the retention window */
  isExpired(lastModified: Date, now: Date): boolean;
}
