import { spawn } from 'child_process';
import { createWriteStream, promises as fs } from 'fs';
import { dirname } from 'path';
import { finished } from 'stream/promises';
import { StringDecoder } from 'string_decoder';
import {
  CommandSpec,
  ProcessResult,
  ProcessRunner as IProcessRunner,
  RunOptions,
} from '../interfaces/ProcessRunner';
import { isError } from '../utils/errors';

const DEFAULT_CAPTURE_LIMIT = 256 * 1024;
const SAFE_ARGUMENT = /^[\w@%+=:,./-]+$/;

/**
 * Render a command the way it would be typed in a shell
 */
export function formatCommand(command: CommandSpec): string {
  return [command.program, ...command.args]
    .map((arg) => (SAFE_ARGUMENT.test(arg) ? arg : `"${arg.replace(/(["\\$`])/g, '\\$1')}"`))
    .join(' ');
}

/**
 * Runs external tools one at a time. The caller awaits the returned promise until the
 * child exits; output is appended to the log file as it arrives.
 */
export class ProcessRunner implements IProcessRunner {
  constructor(private readonly captureLimit: number = DEFAULT_CAPTURE_LIMIT) {}

  async run(command: CommandSpec, options: RunOptions): Promise<ProcessResult> {
    await fs.mkdir(dirname(options.logFile), { recursive: true });

    const startTime = Date.now();
    const log = createWriteStream(options.logFile, { flags: 'a' });
    let logError: Error | undefined;
    log.on('error', (error) => {
      logError = error;
    });

    let captured = '';
    const capture = (text: string): void => {
      captured += text;
      if (captured.length > this.captureLimit) {
        captured = captured.slice(-this.captureLimit);
      }
    };

    // One decoder per stream: a multi-byte character may be split across chunks
    const stdoutDecoder = new StringDecoder('utf8');
    const stderrDecoder = new StringDecoder('utf8');
    const recorder = (decoder: StringDecoder) => (chunk: Buffer | string): void => {
      log.write(chunk);
      capture(typeof chunk === 'string' ? chunk : decoder.write(chunk));
    };

    log.write(`\n=== Running: ${formatCommand(command)} ===\n`);

    const { exitCode, error } = await new Promise<{ exitCode: number | null; error?: Error }>(
      (resolve) => {
        const child = spawn(command.program, command.args, {
          env: { ...process.env, ...command.env },
          stdio: ['ignore', 'pipe', 'pipe'],
          signal: options.signal,
        });

        let childError: Error | undefined;

        child.stdout.on('data', recorder(stdoutDecoder));
        child.stderr.on('data', recorder(stderrDecoder));

        child.on('error', (spawnError) => {
          childError = spawnError;
          // A child that never started emits no further events we can rely on
          if (child.pid === undefined) {
            resolve({ exitCode: null, error: spawnError });
          }
        });

        child.on('close', (code) => {
          resolve({ exitCode: code, error: childError });
        });
      }
    );

    capture(stdoutDecoder.end() + stderrDecoder.end());

    if (error) {
      log.write(`=== Failed: ${error.message} ===\n`);
    }

    log.end();
    await finished(log).catch((closeError: unknown) => {
      logError = logError ?? (isError(closeError) ? closeError : new Error(String(closeError)));
    });

    if (logError) {
      throw logError;
    }

    return {
      exitCode,
      output: captured,
      durationMs: Date.now() - startTime,
      ...(error && { error }),
    };
  }
}
