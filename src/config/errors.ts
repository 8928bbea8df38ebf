/**
 * Raised when the configuration is missing, unreadable or invalid.
 * Aborts the run before any backup or restore is attempted.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}
