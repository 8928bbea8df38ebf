import { promises as fs } from 'fs';
import { join } from 'path';
import { BackupManager, classifyDump, DumpFailure } from '../src/clients/BackupManager';
import { ArchiveManager } from '../src/interfaces/ArchiveManager';
import { FleetConfig, ServerTarget } from '../src/interfaces/BackupConfig';
import { RetentionManager } from '../src/interfaces/RetentionManager';
import { argAfter, createMockLogger, FakeProcessRunner, makeTempDir } from './helpers';

const RUN_DATE = new Date(2024, 0, 2, 3, 4, 5);
const TIMESTAMP = '2024-01-02_03-04-05';

function server(host: string): ServerTarget {
  const segments = host.split('.');
  return {
    key: `SERVER_${host}`,
    uri: `postgresql://${host}`,
    host,
    port: 5432,
    label: segments[segments.length - 1],
  };
}

describe('classifyDump', () => {
  const artifact = { databaseName: 'alpha', path: '/tmp/alpha.dump', timestamp: TIMESTAMP };

  it('should require exit code 0 and a non-empty file', () => {
    expect(classifyDump({ exitCode: 0, artifact: { ...artifact, sizeBytes: 10 } })).toBe('succeeded');
    expect(classifyDump({ exitCode: 0, artifact: { ...artifact, sizeBytes: 0 } })).toBe('failed');
    expect(classifyDump({ exitCode: 0, artifact: null })).toBe('failed');
    expect(classifyDump({ exitCode: 1, artifact: { ...artifact, sizeBytes: 10 } })).toBe('failed');
    expect(classifyDump({ exitCode: null, artifact: { ...artifact, sizeBytes: 10 } })).toBe('failed');
  });
});

describe('BackupManager', () => {
  let backupRoot: string;
  let config: FleetConfig;
  let mockArchiveManager: jest.Mocked<ArchiveManager>;
  let mockRetentionManager: jest.Mocked<RetentionManager>;
  let mockLogger: ReturnType<typeof createMockLogger>;

  const writeDump = async (path: string, content: string): Promise<void> => {
    await fs.writeFile(path, content);
  };

  const createManager = (runner: FakeProcessRunner, overrides: Partial<FleetConfig> = {}) =>
    new BackupManager(
      runner,
      mockArchiveManager,
      mockRetentionManager,
      { ...config, ...overrides },
      mockLogger,
      { now: () => RUN_DATE }
    );

  beforeEach(async () => {
    jest.clearAllMocks();
    backupRoot = await makeTempDir('backup-manager');

    config = {
      configPath: '/etc/fleet/fleet.env',
      servers: [server('db1.example.com'), server('db2.example.org')],
      databases: [
        { index: 1, name: 'alpha', user: 'backup', password: 'test-secret' },
        { index: 2, name: 'beta' },
      ],
      ignoredDatabaseKeys: [],
      backupRoot,
      logRoot: join(backupRoot, 'pg_logs'),
      retentionDays: 7,
      logLevel: 'info',
    };

    mockArchiveManager = {
      seal: jest.fn().mockResolvedValue({ status: 'sealed', archivePath: '/archive.tar.gz', sizeBytes: 10 }),
    };
    mockRetentionManager = {
      cleanupExpiredFiles: jest
        .fn()
        .mockResolvedValue({ deletedCount: 0, totalCount: 0, deletedPaths: [], errors: [] }),
      isExpired: jest.fn(),
    };
    mockLogger = createMockLogger();
  });

  afterEach(async () => {
    await fs.rm(backupRoot, { recursive: true, force: true });
  });

  it('should dump every database on every server and seal each server', async () => {
    const runner = new FakeProcessRunner(async (command) => {
      await writeDump(argAfter(command, '-f'), 'PGDMP');
      return {};
    });

    const summary = await createManager(runner).executeBackup();

    expect(summary.timestamp).toBe(TIMESTAMP);
    expect(summary.totalSuccess).toBe(4);
    expect(summary.totalFail).toBe(0);
    expect(runner.calls.map((call) => call.command.args[call.command.args.length - 1])).toEqual([
      'alpha',
      'beta',
      'alpha',
      'beta',
    ]);

    const db1TempDir = join(backupRoot, `tmp_backup_db1.example.com_${TIMESTAMP}`);
    expect(argAfter(runner.calls[0].command, '-f')).toBe(join(db1TempDir, `alpha_${TIMESTAMP}.dump`));
    expect(runner.calls[0].options.logFile).toBe(
      join(backupRoot, 'pg_logs', `backup_db1.example.com_${TIMESTAMP}.log`)
    );
    expect(runner.calls[0].command.env).toEqual({ PGPASSWORD: 'test-secret' });
    expect(runner.calls[1].command.env).toBeUndefined();

    expect(mockArchiveManager.seal).toHaveBeenCalledTimes(2);
    expect(mockArchiveManager.seal).toHaveBeenNthCalledWith(1, {
      server: config.servers[0],
      sourceDir: db1TempDir,
      successCount: 2,
      timestamp: TIMESTAMP,
    });
    expect(summary.servers.map((entry) => [entry.host, entry.successCount, entry.failCount])).toEqual([
      ['db1.example.com', 2, 0],
      ['db2.example.org', 2, 0],
    ]);
    expect(mockLogger.logDumpComplete).toHaveBeenCalledWith('db1.example.com', 'alpha', 5, 1);
  });

  it('should count a zero-byte dump as a failure and remove it', async () => {
    const runner = new FakeProcessRunner(async (command) => {
      const database = command.args[command.args.length - 1];
      await writeDump(argAfter(command, '-f'), database === 'beta' ? '' : 'PGDMP');
      return {};
    });

    const summary = await createManager(runner, { servers: [server('db1.example.com')] }).executeBackup();

    expect(summary.servers[0]).toMatchObject({
      successCount: 1,
      failCount: 1,
      failedDatabases: ['beta'],
    });
    const betaPath = argAfter(runner.calls[1].command, '-f');
    await expect(fs.access(betaPath)).rejects.toThrow();
    expect(mockLogger.logDumpError).toHaveBeenCalledWith(
      'db1.example.com',
      'beta',
      expect.any(DumpFailure),
      expect.objectContaining({
        serverLog: join(backupRoot, 'pg_logs', `backup_db1.example.com_${TIMESTAMP}.log`),
      })
    );
    expect(mockLogger.logDumpError.mock.calls[0][2].message).toBe('Failed to backup beta (rc=0)');
  });

  it('should continue with the remaining databases after a failure', async () => {
    const runner = new FakeProcessRunner(async (command) => {
      const database = command.args[command.args.length - 1];
      const host = argAfter(command, '-h');
      if (host === 'db1.example.com' && database === 'alpha') {
        await writeDump(argAfter(command, '-f'), 'partial');
        return { exitCode: 1, output: 'pg_dump: error: connection to server failed' };
      }
      if (host === 'db2.example.org' && database === 'beta') {
        throw new Error('runner crashed');
      }
      await writeDump(argAfter(command, '-f'), 'PGDMP');
      return {};
    });

    const summary = await createManager(runner).executeBackup();

    expect(runner.calls).toHaveLength(4);
    expect(summary.servers.map((entry) => entry.failedDatabases)).toEqual([['alpha'], ['beta']]);
    expect(summary.totalSuccess).toBe(2);
    expect(summary.totalFail).toBe(2);
    await expect(fs.access(argAfter(runner.calls[0].command, '-f'))).rejects.toThrow();

    const messages = mockLogger.logDumpError.mock.calls.map((call) => call[2].message);
    expect(messages).toEqual(['Failed to backup alpha (rc=1)', 'Failed to backup beta (rc=none)']);
    expect(mockLogger.logDumpError.mock.calls[0][3]).toMatchObject({
      diagnostics: 'pg_dump: error: connection to server failed',
    });
  });

  it('should report zero counts for a server when no databases are configured', async () => {
    const runner = new FakeProcessRunner(async () => ({}));

    const summary = await createManager(runner, {
      servers: [server('db1.example.com')],
      databases: [],
    }).executeBackup();

    expect(runner.calls).toHaveLength(0);
    expect(summary.servers[0]).toMatchObject({ successCount: 0, failCount: 0, failedDatabases: [] });
    expect(mockArchiveManager.seal).toHaveBeenCalledWith(
      expect.objectContaining({ successCount: 0 })
    );
  });

  it('should prune with the run date and protect the logs of the current run', async () => {
    const runner = new FakeProcessRunner(async (command) => {
      await writeDump(argAfter(command, '-f'), 'PGDMP');
      return {};
    });

    await createManager(runner).executeBackup();

    const logRoot = join(backupRoot, 'pg_logs');
    expect(mockRetentionManager.cleanupExpiredFiles).toHaveBeenCalledWith(RUN_DATE, [
      join(logRoot, `backup_run_${TIMESTAMP}.log`),
      join(logRoot, `backup_db1.example.com_${TIMESTAMP}.log`),
      join(logRoot, `backup_db2.example.org_${TIMESTAMP}.log`),
    ]);
  });

  it('should pass a timeout signal when a command timeout is configured', async () => {
    const runner = new FakeProcessRunner(async (command) => {
      await writeDump(argAfter(command, '-f'), 'PGDMP');
      return {};
    });

    await createManager(runner, { servers: [server('db1.example.com')], commandTimeoutMinutes: 5 })
      .executeBackup();

    expect(runner.calls[0].options.signal).toBeInstanceOf(AbortSignal);
  });

  it('should count a dump cut short by the command timeout as failed', async () => {
    const timeout = jest
      .spyOn(AbortSignal, 'timeout')
      .mockImplementation(() => AbortSignal.abort(new Error('The operation timed out')));
    const runner = new FakeProcessRunner(async (command, options) => {
      await writeDump(argAfter(command, '-f'), 'PGD');
      if (options.signal?.aborted) {
        return { exitCode: null, error: new Error('The operation was aborted') };
      }
      return {};
    });

    try {
      const summary = await createManager(runner, {
        servers: [server('db1.example.com')],
        commandTimeoutMinutes: 5,
      }).executeBackup();

      expect(timeout).toHaveBeenCalledWith(5 * 60 * 1000);
      expect(summary.servers[0]).toMatchObject({
        successCount: 0,
        failCount: 2,
        failedDatabases: ['alpha', 'beta'],
      });
      const tempDir = join(backupRoot, `tmp_backup_db1.example.com_${TIMESTAMP}`);
      await expect(fs.access(join(tempDir, `alpha_${TIMESTAMP}.dump`))).rejects.toThrow();
    } finally {
      timeout.mockRestore();
    }
  });

  it('should log the summary', async () => {
    const runner = new FakeProcessRunner(async (command) => {
      await writeDump(argAfter(command, '-f'), 'PGDMP');
      return {};
    });

    await createManager(runner).executeBackup();

    const infoMessages = mockLogger.info.mock.calls.map((call) => call[0]);
    expect(infoMessages).toEqual(
      expect.arrayContaining([
        '=== PostgreSQL Backup Started using /etc/fleet/fleet.env ===',
        ' - db1.example.com → Success: 2, Fail: 0',
        ' - db2.example.org → Success: 2, Fail: 0',
        'Total → Success: 4, Fail: 0',
        '=== Backup Finished ===',
      ])
    );
  });
});
