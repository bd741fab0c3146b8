/**
 * kubectl wrapper bound to a context and kubeconfig
 */

import type { Logger } from 'pino';
import type { z } from 'zod';
import {
  runChecked,
  type BackgroundProcess,
  type CommandResult,
  type CommandRunner,
  type RunOptions,
} from '@/infra/process/runner';
import { Success, Failure, type Result } from '@/types';

export interface KubectlOptions {
  context?: string;
  kubeconfig?: string;
  /** Binary name or path, default `kubectl` */
  binary?: string;
}

/**
 * Render a duration for `--timeout` flags, rounded up to whole seconds.
 */
export function formatTimeout(ms: number): string {
  return `${Math.max(1, Math.ceil(ms / 1000))}s`;
}

export class Kubectl {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly options: KubectlOptions;

  constructor(runner: CommandRunner, logger: Logger, options: KubectlOptions = {}) {
    this.runner = runner;
    this.logger = logger;
    this.options = options;
  }

  get binary(): string {
    return this.options.binary ?? 'kubectl';
  }

  get context(): string | undefined {
    return this.options.context;
  }

  /**
   * Prefix arguments with the bound context and kubeconfig.
   */
  buildArgs(args: readonly string[]): string[] {
    const prefix: string[] = [];
    if (this.options.context) {
      prefix.push('--context', this.options.context);
    }
    if (this.options.kubeconfig) {
      prefix.push('--kubeconfig', this.options.kubeconfig);
    }
    return [...prefix, ...args];
  }

  /**
   * Run and fail on a non-zero exit.
   */
  run(args: readonly string[], options?: RunOptions): Promise<Result<CommandResult>> {
    return runChecked(this.runner, this.binary, this.buildArgs(args), `kubectl ${args[0] ?? ''}`.trim(), options);
  }

  /**
   * Run and return the raw result, whatever the exit code.
   */
  exec(args: readonly string[], options?: RunOptions): Promise<CommandResult> {
    return this.runner.run(this.binary, this.buildArgs(args), options);
  }

  /**
   * Trimmed stdout of a successful run.
   */
  async output(args: readonly string[], options?: RunOptions): Promise<Result<string>> {
    const result = await this.run(args, options);
    return result.ok ? Success(result.value.stdout.trim()) : result;
  }

  /**
   * Run with `-o json` and validate the output.
   */
  async getJson<T>(
    args: readonly string[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options?: RunOptions,
  ): Promise<Result<T>> {
    const result = await this.run([...args, '-o', 'json'], options);
    if (!result.ok) {
      return result;
    }

    let body: unknown;
    try {
      body = JSON.parse(result.value.stdout);
    } catch {
      return Failure(`kubectl ${args.join(' ')} returned invalid JSON`, {
        details: { stdout: result.value.stdout.slice(0, 512) },
      });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      this.logger.debug({ issues: parsed.error.issues }, 'Unexpected kubectl output');
      return Failure(`unexpected output from kubectl ${args.join(' ')}: ${parsed.error.message}`);
    }
    return Success(parsed.data);
  }

  spawn(args: readonly string[], options?: Omit<RunOptions, 'timeoutMs'>): BackgroundProcess {
    return this.runner.spawn(this.binary, this.buildArgs(args), options);
  }
}
