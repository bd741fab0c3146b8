/**
 * External command execution
 *
 * A `CommandRunner` is created once and passed to every component that shells out
 * (kind, kubectl, helm). Non-zero exits come back as data; `runChecked` turns them
 * into failures with the command line and stderr attached.
 */

import {
  execFile,
  spawn as spawnChild,
  type ExecFileOptionsWithStringEncoding,
  type SpawnOptions,
} from 'node:child_process';
import { promisify } from 'node:util';
import type { Logger } from 'pino';
import { LIMITS } from '@/config/constants';
import { cancelledFailure } from '@/lib/errors';
import { Success, Failure, type Result } from '@/types';

const execFileAsync = promisify(execFile);

/** Exit code reported when the binary could not be started */
export const EXIT_NOT_FOUND = 127;
/** Exit code reported when the command hit its timeout */
export const EXIT_TIMEOUT = 124;
/** Exit code reported when the command was aborted through its signal */
export const EXIT_CANCELLED = 130;

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CommandResult {
  /** Printable command line */
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut?: boolean;
  cancelled?: boolean;
}

/**
 * Handle on a long-running child process (e.g. `kubectl port-forward`).
 */
export interface BackgroundProcess {
  readonly command: string;
  /** Resolves with the exit code once the process ends (null when killed by a signal) */
  readonly exited: Promise<number | null>;
  /** Output captured so far */
  output(): string;
  stop(): void;
}

export interface CommandRunner {
  run(file: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
  spawn(file: string, args: readonly string[], options?: Omit<RunOptions, 'timeoutMs'>): BackgroundProcess;
}

/**
 * Render a command for logs. Arguments with whitespace or quotes are single-quoted.
 */
export function formatCommand(file: string, args: readonly string[]): string {
  const quote = (value: string): string =>
    /[\s'"]/.test(value) ? `'${value.replace(/'/g, "'\\''")}'` : value;
  return [file, ...args].map(quote).join(' ');
}

interface ExecFailure {
  code?: number | string | null;
  killed?: boolean;
  name?: string;
  message?: string;
  stdout?: string | Buffer;
  stderr?: string | Buffer;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return typeof error === 'object' && error !== null;
}

function asText(value: string | Buffer | undefined): string {
  if (typeof value === 'string') return value;
  return value ? value.toString('utf8') : '';
}

function toCommandResult(command: string, error: unknown): CommandResult {
  if (!isExecFailure(error)) {
    return { command, exitCode: 1, stdout: '', stderr: String(error) };
  }

  const stdout = asText(error.stdout);
  const stderr = asText(error.stderr) || (error.message ?? '');

  if (error.name === 'AbortError') {
    return { command, exitCode: EXIT_CANCELLED, stdout, stderr, cancelled: true };
  }
  if (error.code === 'ENOENT' || error.code === 'EACCES') {
    return { command, exitCode: EXIT_NOT_FOUND, stdout, stderr };
  }
  if (error.killed) {
    return { command, exitCode: EXIT_TIMEOUT, stdout, stderr, timedOut: true };
  }
  return {
    command,
    exitCode: typeof error.code === 'number' ? error.code : 1,
    stdout,
    stderr,
  };
}

/**
 * Create the default runner backed by `execFile` (no shell involved).
 */
export function createCommandRunner(logger: Logger): CommandRunner {
  return {
    async run(file, args, options = {}): Promise<CommandResult> {
      const command = formatCommand(file, args);
      logger.debug({ command, cwd: options.cwd }, 'Running command');

      try {
        const execOptions: ExecFileOptionsWithStringEncoding = {
          encoding: 'utf8',
          maxBuffer: LIMITS.MAX_COMMAND_BUFFER,
        };
        if (options.cwd) execOptions.cwd = options.cwd;
        if (options.env) execOptions.env = options.env;
        if (options.timeoutMs) execOptions.timeout = options.timeoutMs;
        if (options.signal) execOptions.signal = options.signal;

        const { stdout, stderr } = await execFileAsync(file, [...args], execOptions);
        logger.debug({ command, exitCode: 0 }, 'Command completed');
        return { command, exitCode: 0, stdout, stderr };
      } catch (error) {
        const result = toCommandResult(command, error);
        logger.debug(
          { command, exitCode: result.exitCode, stderr: result.stderr.trim() },
          'Command failed',
        );
        return result;
      }
    },

    spawn(file, args, options = {}): BackgroundProcess {
      const command = formatCommand(file, args);
      logger.debug({ command }, 'Starting background command');

      const spawnOptions: SpawnOptions = { stdio: ['ignore', 'pipe', 'pipe'] };
      if (options.cwd) spawnOptions.cwd = options.cwd;
      if (options.env) spawnOptions.env = options.env;
      if (options.signal) spawnOptions.signal = options.signal;

      const child = spawnChild(file, [...args], spawnOptions);

      const chunks: string[] = [];
      child.stdout?.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));
      child.stderr?.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));

      const exited = new Promise<number | null>((resolve) => {
        child.once('error', (error) => {
          logger.warn({ command, error: error.message }, 'Background command failed to run');
          resolve(null);
        });
        child.once('exit', (code) => {
          logger.debug({ command, exitCode: code }, 'Background command exited');
          resolve(code);
        });
      });

      return {
        command,
        exited,
        output: () => chunks.join(''),
        stop: () => {
          if (child.exitCode === null && !child.killed) {
            child.kill('SIGTERM');
          }
        },
      };
    },
  };
}

/**
 * Run a command and convert a non-zero exit into a failure.
 */
export async function runChecked(
  runner: CommandRunner,
  file: string,
  args: readonly string[],
  description: string,
  options?: RunOptions,
): Promise<Result<CommandResult>> {
  const result = await runner.run(file, args, options);

  if (result.cancelled) {
    return cancelledFailure(description, options?.signal);
  }

  if (result.exitCode !== 0) {
    const output = result.stderr.trim() || result.stdout.trim() || `exit code ${result.exitCode}`;
    return Failure(`${description}: ${output}`, {
      message: description,
      hint:
        result.exitCode === EXIT_NOT_FOUND
          ? `${file} is not installed or not on PATH`
          : result.timedOut
            ? 'The command timed out'
            : `Command exited with code ${result.exitCode}`,
      resolution: `Try running it manually: ${result.command}`,
      details: {
        command: result.command,
        exitCode: result.exitCode,
        stderr: result.stderr,
        stdout: result.stdout,
      },
    });
  }

  return Success(result);
}
