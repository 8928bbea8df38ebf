import { join } from 'path';
import {
  DatabaseCredential,
  FleetConfig,
  RestoreTarget,
  ServerTarget,
} from '../interfaces/BackupConfig';
import { LogLevel } from '../interfaces/Logger';
import { isError } from '../utils/errors';
import { ConfigError } from './errors';
import { Environment, EnvFileOptions, loadEnvFile } from './EnvFileLoader';

export { ConfigError };

const DEFAULT_BACKUP_ROOT = './postgres_backup';
const DEFAULT_RETENTION_DAYS = 7;
const DEFAULT_PORT = 5432;
const DEFAULT_RESTORE_USER = 'postgres';

export class ConfigurationManager {
  /**
   * Load an env file and build the fleet configuration from it
   * @throws ConfigError when the file cannot be read or a value is invalid
   */
  static loadConfiguration(configPath: string, options: EnvFileOptions = {}): FleetConfig {
    const { environment } = loadEnvFile(configPath, options);
    return ConfigurationManager.fromEnvironment(configPath, environment);
  }

  static fromEnvironment(configPath: string, env: Environment): FleetConfig {
    const servers = ConfigurationManager.parseServers(env);
    const { databases, ignoredKeys } = ConfigurationManager.parseDatabases(env);

    const backupRoot = env['BACKUP_ROOT'] || DEFAULT_BACKUP_ROOT;
    const logRoot = env['LOG_ROOT'] || join(backupRoot, 'pg_logs');

    const logLevel = (env['LOG_LEVEL'] || LogLevel.INFO).toLowerCase();
    if (!Object.values<string>(LogLevel).includes(logLevel)) {
      throw new ConfigError(
        `LOG_LEVEL must be one of: ${Object.values(LogLevel).join(', ')}`,
        'LOG_LEVEL'
      );
    }

    const config: FleetConfig = {
      configPath,
      servers,
      databases,
      ignoredDatabaseKeys: ignoredKeys,
      backupRoot,
      logRoot,
      retentionDays:
        ConfigurationManager.parseInteger(env, 'RETENTION_DAYS', 0) ?? DEFAULT_RETENTION_DAYS,
      logLevel,
    };

    // Add optional properties only if they exist
    if (env['BACKUP_SCHEDULE']) {
      config.backupSchedule = env['BACKUP_SCHEDULE'];
    }
    if (env['BACKUP_TIMEZONE']) {
      config.backupTimezone = env['BACKUP_TIMEZONE'];
    }
    if (ConfigurationManager.parseBoolean(env, 'BACKUP_RUN_ON_START')) {
      config.backupRunOnStart = true;
    }
    const timeout = ConfigurationManager.parseInteger(env, 'COMMAND_TIMEOUT_MINUTES', 1);
    if (timeout !== undefined) {
      config.commandTimeoutMinutes = timeout;
    }
    const restore = ConfigurationManager.parseRestoreTarget(env, backupRoot);
    if (restore) {
      config.restore = restore;
    }

    return config;
  }

  /**
   * Every non-blank SERVER_* value, in environment order
   */
  static parseServers(env: Environment): ServerTarget[] {
    return Object.entries(env)
      .filter(([key, value]) => key.startsWith('SERVER_') && value.trim())
      .map(([key, value]) => ConfigurationManager.parseServer(key, value.trim()));
  }

  static parseServer(key: string, uri: string): ServerTarget {
    // Bare "host" or "host:port" entries are accepted as well as full URIs
    const candidate = uri.includes('://') ? uri : `postgresql://${uri}`;

    let url: URL;
    try {
      url = new URL(candidate);
    } catch (error) {
      throw new ConfigError(
        `${key} is not a valid connection string: ${uri}`,
        key,
        isError(error) ? error : undefined
      );
    }

    const host = url.hostname.replace(/^\[|\]$/g, '');
    if (!host) {
      throw new ConfigError(`${key} does not name a host: ${uri}`, key);
    }

    const segments = host.split('.');
    return {
      key,
      uri,
      host,
      port: url.port ? Number(url.port) : DEFAULT_PORT,
      label: segments[segments.length - 1],
    };
  }

  /**
   * Enumerate DB_1_*, DB_2_*, … and stop at the first missing DB_<n>_NAME.
   * Numbered names past that gap are returned as ignored keys, never as credentials.
   */
  static parseDatabases(env: Environment): {
    databases: DatabaseCredential[];
    ignoredKeys: string[];
  } {
    const databases: DatabaseCredential[] = [];

    for (let index = 1; ; index++) {
      const name = env[`DB_${index}_NAME`];
      if (!name) {
        break;
      }

      const credential: DatabaseCredential = { index, name };
      const user = env[`DB_${index}_USER`];
      const password = env[`DB_${index}_PASS`];
      if (user) {
        credential.user = user;
      }
      if (password) {
        credential.password = password;
      }
      databases.push(credential);
    }

    const ignoredKeys = Object.keys(env)
      .filter((key) => {
        const match = /^DB_(\d+)_NAME$/.exec(key);
        return match !== null && Number(match[1]) > databases.length + 1;
      })
      .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));

    return { databases, ignoredKeys };
  }

  static parseRestoreTarget(env: Environment, backupRoot: string): RestoreTarget | undefined {
    const host = env['RESTORE_HOST'];
    if (!host) {
      return undefined;
    }

    const target: RestoreTarget = {
      host,
      port: ConfigurationManager.parseInteger(env, 'RESTORE_PORT', 1) ?? DEFAULT_PORT,
      user: env['RESTORE_USER'] || DEFAULT_RESTORE_USER,
      directory: env['RESTORE_DIR'] || backupRoot,
    };
    if (env['RESTORE_PASS']) {
      target.password = env['RESTORE_PASS'];
    }
    return target;
  }

  /**
   * Configuration with credentials replaced, suitable for logging
   */
  static sanitizeForLogging(config: FleetConfig): Record<string, unknown> {
    return {
      ...config,
      databases: config.databases.map((database) => ({
        ...database,
        ...(database.password !== undefined && { password: '[REDACTED]' }),
      })),
      ...(config.restore && {
        restore: {
          ...config.restore,
          ...(config.restore.password !== undefined && { password: '[REDACTED]' }),
        },
      }),
    };
  }

  private static parseBoolean(env: Environment, key: string): boolean {
    const raw = (env[key] ?? '').trim().toLowerCase();
    if (raw === '' || raw === 'false' || raw === '0' || raw === 'no') {
      return false;
    }
    if (raw === 'true' || raw === '1' || raw === 'yes') {
      return true;
    }
    throw new ConfigError(`${key} must be true or false`, key);
  }

  private static parseInteger(env: Environment, key: string, minimum: number): number | undefined {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
      return undefined;
    }

    const parsed = Number(raw.trim());
    if (!Number.isInteger(parsed) || parsed < minimum) {
      throw new ConfigError(
        `${key} must be an integer greater than or equal to ${minimum}`,
        key
      );
    }
    return parsed;
  }
}
