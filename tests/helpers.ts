import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger } from '../src/interfaces/Logger';
import { CommandSpec, ProcessResult, ProcessRunner, RunOptions } from '../src/interfaces/ProcessRunner';

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    logDumpComplete: jest.fn(),
    logDumpError: jest.fn(),
    logRetentionCleanup: jest.fn(),
    logConfigurationStart: jest.fn(),
    logScheduledExecution: jest.fn(),
    close: jest.fn().mockResolvedValue(undefined),
  };
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), `${prefix}-`));
}

export interface RecordedCommand {
  command: CommandSpec;
  options: RunOptions;
}

type CommandHandler = (command: CommandSpec, options: RunOptions) => Promise<Partial<ProcessResult>>;

/**
 * In-process stand-in for the external tools. Each call is recorded and answered by the
 * handler, which may also write the files the real tool would produce.
 */
export class FakeProcessRunner implements ProcessRunner {
  readonly calls: RecordedCommand[] = [];

  constructor(private readonly handler: CommandHandler) {}

  async run(command: CommandSpec, options: RunOptions): Promise<ProcessResult> {
    this.calls.push({ command, options });
    const result = await this.handler(command, options);
    return {
      exitCode: 0,
      output: '',
      durationMs: 1,
      ...result,
    };
  }
}

/**
 * Value following a flag in an argument list, e.g. the path after `-f`
 */
export function argAfter(command: CommandSpec, flag: string): string {
  const index = command.args.indexOf(flag);
  if (index === -1 || index + 1 >= command.args.length) {
    throw new Error(`${flag} not found in ${command.args.join(' ')}`);
  }
  return command.args[index + 1];
}
