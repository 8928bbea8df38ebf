import { promises as fs } from 'fs';
import { join } from 'path';
import { PostgreSQLClient } from '../src/clients/PostgreSQLClient';
import {
  classifyRestore,
  findDumpFiles,
  RestoreFailure,
  RestoreManager,
} from '../src/clients/RestoreManager';
import { RestoreTarget } from '../src/interfaces/BackupConfig';
import { parseDumpFileName } from '../src/utils/naming';
import { argAfter, createMockLogger, FakeProcessRunner, makeTempDir } from './helpers';

const RUN_DATE = new Date(2024, 4, 6, 7, 8, 9);
const TIMESTAMP = '2024-05-06_07-08-09';
const DUMP_TS = '2024-05-01_02-00-00';

describe('classifyRestore', () => {
  it('should accept exit code 0', () => {
    expect(classifyRestore({ exitCode: 0, output: '' })).toBe('succeeded');
  });

  it('should accept a non-zero exit when pg_restore only reports ignored errors', () => {
    expect(
      classifyRestore({ exitCode: 2, output: 'pg_restore: warning: errors ignored on restore: 2\n' })
    ).toBe('succeeded');
  });

  it('should reject a non-zero exit without the marker', () => {
    expect(classifyRestore({ exitCode: 2, output: 'pg_restore: error: connection refused' })).toBe('failed');
    expect(classifyRestore({ exitCode: null, output: '' })).toBe('failed');
  });
});

describe('parseDumpFileName', () => {
  it('should recover the database name and timestamp', () => {
    expect(parseDumpFileName('customer_data_2024-01-02_03-04-05.dump')).toEqual({
      databaseName: 'customer_data',
      timestamp: new Date(2024, 0, 2, 3, 4, 5),
    });
  });

  it('should fall back to the name without its extension', () => {
    expect(parseDumpFileName('weird.dump')).toEqual({ databaseName: 'weird', timestamp: null });
    expect(parseDumpFileName('.dump')).toEqual({ databaseName: '.dump', timestamp: null });
  });
});

describe('findDumpFiles', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('find-dumps');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should find dump files recursively in sorted order', async () => {
    await fs.mkdir(join(root, 'nested', 'deeper'), { recursive: true });
    await fs.writeFile(join(root, 'zeta.dump'), 'x');
    await fs.writeFile(join(root, 'notes.txt'), 'x');
    await fs.writeFile(join(root, 'nested', 'alpha.dump'), 'x');
    await fs.writeFile(join(root, 'nested', 'deeper', 'beta.dump'), 'x');

    expect(await findDumpFiles(root)).toEqual([
      join(root, 'nested', 'alpha.dump'),
      join(root, 'nested', 'deeper', 'beta.dump'),
      join(root, 'zeta.dump'),
    ]);
  });
});

describe('RestoreManager', () => {
  let restoreDir: string;
  let logRoot: string;
  let target: RestoreTarget;
  let postgresClient: PostgreSQLClient;
  let mockLogger: ReturnType<typeof createMockLogger>;

  const createManager = (runner: FakeProcessRunner) =>
    new RestoreManager(runner, postgresClient, target, mockLogger, {
      logRoot,
      now: () => RUN_DATE,
    });

  beforeEach(async () => {
    restoreDir = await makeTempDir('restore-manager');
    logRoot = join(restoreDir, 'pg_logs');
    target = {
      host: 'restore.internal',
      port: 5432,
      user: 'postgres',
      password: 'test-secret',
      directory: restoreDir,
    };
    postgresClient = new PostgreSQLClient(target);
    mockLogger = createMockLogger();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(restoreDir, { recursive: true, force: true });
  });

  describe('validateConfiguration', () => {
    it('should pass when the directory exists and the server accepts connections', async () => {
      jest.spyOn(postgresClient, 'testConnection').mockResolvedValue(true);

      await expect(createManager(new FakeProcessRunner(async () => ({}))).validateConfiguration())
        .resolves.toBe(true);
    });

    it('should fail when the restore directory is missing', async () => {
      const testConnection = jest.spyOn(postgresClient, 'testConnection').mockResolvedValue(true);
      target.directory = join(restoreDir, 'missing');

      await expect(createManager(new FakeProcessRunner(async () => ({}))).validateConfiguration())
        .resolves.toBe(false);
      expect(testConnection).not.toHaveBeenCalled();
    });

    it('should fail when the restore path is a file', async () => {
      const file = join(restoreDir, 'alpha.dump');
      await fs.writeFile(file, 'x');
      target.directory = file;

      await expect(createManager(new FakeProcessRunner(async () => ({}))).validateConfiguration())
        .resolves.toBe(false);
      expect(mockLogger.error).toHaveBeenCalledWith(`Restore path is not a directory: ${file}`);
    });

    it('should fail when the server cannot be reached', async () => {
      jest.spyOn(postgresClient, 'testConnection').mockResolvedValue(false);

      await expect(createManager(new FakeProcessRunner(async () => ({}))).validateConfiguration())
        .resolves.toBe(false);
      expect(mockLogger.error).toHaveBeenCalledWith('Cannot connect to restore server restore.internal:5432');
    });
  });

  describe('executeRestore', () => {
    it('should create and restore every database and collect the failures', async () => {
      for (const name of ['alpha', 'beta', 'gamma']) {
        await fs.writeFile(join(restoreDir, `${name}_${DUMP_TS}.dump`), 'PGDMP');
      }

      const runner = new FakeProcessRunner(async (command) => {
        const database = command.program === 'createdb'
          ? command.args[command.args.length - 1]
          : argAfter(command, '-d');

        if (command.program === 'createdb') {
          if (database === 'alpha') return {};
          if (database === 'beta') {
            return {
              exitCode: 1,
              output: 'createdb: error: database creation failed: ERROR:  database "beta" already exists\n',
            };
          }
          return { exitCode: 1, output: 'createdb: error: permission denied to create database\n' };
        }

        if (database === 'alpha') return {};
        if (database === 'beta') {
          return { exitCode: 1, output: 'pg_restore: warning: errors ignored on restore: 3\n' };
        }
        return { exitCode: 1, output: 'pg_restore: error: could not execute query\n' };
      });

      const summary = await createManager(runner).executeRestore();

      expect(summary).toMatchObject({
        timestamp: TIMESTAMP,
        directory: restoreDir,
        dumpCount: 3,
        successCount: 2,
        failCount: 1,
        failedDatabases: ['gamma'],
      });
      expect(summary.outcomes.map((outcome) => [outcome.databaseName, outcome.createStatus, outcome.status]))
        .toEqual([
          ['alpha', 'created', 'succeeded'],
          ['beta', 'exists', 'succeeded'],
          ['gamma', 'failed', 'failed'],
        ]);

      expect(runner.calls.map((call) => call.command.program)).toEqual([
        'createdb', 'pg_restore',
        'createdb', 'pg_restore',
        'createdb', 'pg_restore',
      ]);
      expect(runner.calls[1].command.args[runner.calls[1].command.args.length - 1]).toBe(
        join(restoreDir, `alpha_${DUMP_TS}.dump`)
      );
      const logFile = join(logRoot, `restore_restore.internal_${TIMESTAMP}.log`);
      expect(runner.calls.every((call) => call.options.logFile === logFile)).toBe(true);

      expect(mockLogger.info).toHaveBeenCalledWith('(1/3) Restoring database: alpha', {
        dumpFile: join(restoreDir, `alpha_${DUMP_TS}.dump`),
        dumpedAt: new Date(2024, 4, 1, 2, 0, 0).toISOString(),
      });
      expect(mockLogger.warn).toHaveBeenCalledWith('Failed to create database gamma', {
        exitCode: 1,
        diagnostics: 'createdb: error: permission denied to create database',
      });
      expect(mockLogger.error).toHaveBeenCalledWith(
        'Failed to restore database gamma',
        expect.any(RestoreFailure),
        { diagnostics: 'pg_restore: error: could not execute query' }
      );
      expect(mockLogger.info).toHaveBeenCalledWith('Success: 2 | Fail: 1');
      expect(mockLogger.info).toHaveBeenCalledWith('Failed databases: gamma');
      expect(mockLogger.info).toHaveBeenCalledWith(`Detailed log saved at: ${logFile}`);
    });

    it('should treat a runner error as a failed restore', async () => {
      await fs.writeFile(join(restoreDir, `alpha_${DUMP_TS}.dump`), 'PGDMP');
      const runner = new FakeProcessRunner(async (command) => {
        if (command.program === 'pg_restore') {
          throw new Error('log directory is not writable');
        }
        return {};
      });

      const summary = await createManager(runner).executeRestore();

      expect(summary.failedDatabases).toEqual(['alpha']);
      expect(summary.outcomes[0]).toMatchObject({
        exitCode: null,
        diagnostics: 'log directory is not writable',
        status: 'failed',
      });
    });

    it('should log a dump without a timestamp in its name by path only', async () => {
      const dumpFile = join(restoreDir, 'legacy.dump');
      await fs.writeFile(dumpFile, 'PGDMP');

      await createManager(new FakeProcessRunner(async () => ({}))).executeRestore();

      expect(mockLogger.info).toHaveBeenCalledWith('(1/1) Restoring database: legacy', { dumpFile });
    });

    it('should report an empty directory without running anything', async () => {
      const runner = new FakeProcessRunner(async () => ({}));

      const summary = await createManager(runner).executeRestore();

      expect(summary.dumpCount).toBe(0);
      expect(runner.calls).toHaveLength(0);
      expect(mockLogger.error).toHaveBeenCalledWith(`No .dump files found in ${restoreDir}`);
    });
  });
});
