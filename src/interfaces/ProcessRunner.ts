/**
 * An external program invocation. Arguments are passed as-is, never through a shell.
 */
export interface CommandSpec {
  program: string;
  args: string[];

  /** Variables added to the child's environment (e.g. PGPASSWORD) */
  env?: Record<string, string>;
}

export interface RunOptions {
  /** Log file the merged output is appended to */
  logFile: string;

  /** Aborting kills the child; the result then carries the abort error */
  signal?: AbortSignal;
}

export interface ProcessResult {
  /** Exit code, or null when the process could not start or was killed by a signal */
  exitCode: number | null;

  /** Tail of the merged stdout/stderr */
  output: string;

  durationMs: number;

  /** Spawn or abort error, if any */
  error?: Error;
}

/**
 * Runs a command to completion while streaming its output into a log file
 */
export interface ProcessRunner {
  run(command: CommandSpec, options: RunOptions): Promise<ProcessResult>;
}
