import { Client } from 'pg';
import { DatabaseCredential } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import {
  PostgreSQLClient as IPostgreSQLClient,
  PostgreSQLEndpoint,
} from '../interfaces/PostgreSQLClient';
import { CommandSpec } from '../interfaces/ProcessRunner';
import { errorMessage, isError } from '../utils/errors';

/**
 * Builds pg_dump, pg_restore and createdb invocations for one server and checks that the
 * server accepts connections. The tool flags are fixed: archives produced here must stay
 * readable by the restore side.
 */
export class PostgreSQLClient implements IPostgreSQLClient {
  constructor(
    private readonly endpoint: PostgreSQLEndpoint,
    private readonly logger?: Logger
  ) {}

  /**
   * Test connection to the server's maintenance database
   */
  async testConnection(database = 'postgres'): Promise<boolean> {
    const client = new Client({
      host: this.endpoint.host,
      port: this.endpoint.port,
      user: this.endpoint.user,
      password: this.endpoint.password,
      database,
    });

    try {
      await client.connect();
      await client.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger?.error(
        `PostgreSQL connection test failed for ${this.endpoint.host}:${this.endpoint.port}`,
        isError(error) ? error : new Error(String(error))
      );
      return false;
    } finally {
      await client.end().catch((cleanupError: unknown) => {
        this.logger?.warn('Failed to close database connection during cleanup', {
          error: errorMessage(cleanupError),
        });
      });
    }
  }

  /**
   * Custom-format, maximum-compression dump of one database
   */
  dumpCommand(database: DatabaseCredential, outputPath: string): CommandSpec {
    return {
      program: 'pg_dump',
      args: [
        ...this.connectionArgs(database.user),
        '-F',
        'c',
        '-Z',
        '9',
        '-f',
        outputPath,
        database.name,
      ],
      ...this.passwordEnv(database.password),
    };
  }

  /**
   * Restore that drops existing objects first and ignores ownership and ACLs
   */
  restoreCommand(databaseName: string, dumpPath: string): CommandSpec {
    return {
      program: 'pg_restore',
      args: [
        ...this.connectionArgs(this.endpoint.user),
        '-d',
        databaseName,
        '--clean',
        '--if-exists',
        '--no-owner',
        '--no-acl',
        dumpPath,
      ],
      ...this.passwordEnv(this.endpoint.password),
    };
  }

  createDatabaseCommand(databaseName: string): CommandSpec {
    return {
      program: 'createdb',
      args: [...this.connectionArgs(this.endpoint.user), databaseName],
      ...this.passwordEnv(this.endpoint.password),
    };
  }

  private connectionArgs(user: string | undefined): string[] {
    const args = ['-h', this.endpoint.host, '-p', String(this.endpoint.port)];
    if (user) {
      args.push('-U', user);
    }
    return args;
  }

  private passwordEnv(password: string | undefined): Pick<CommandSpec, 'env'> {
    return password ? { env: { PGPASSWORD: password } } : {};
  }
}
