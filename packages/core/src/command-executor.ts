/**
 * @module command-executor
 * Runs external commands (docker, hook scripts) once or under a retry policy,
 * honouring dry-run.
 */

import { spawn } from 'node:child_process';
import type { CommandResult, CommandRunOptions, CommandRunner, RetryPolicy } from './types.js';
import { ImageForgeError } from './error-codes.js';
import { RetryExecutor, DEFAULT_RETRY_POLICY, type SleepFn } from './retry-engine.js';
import { silentLogger, type BuildLogger } from './logger.js';

// =====================================================================
// Default Runner
// =====================================================================

/**
 * Runner that spawns the process without a shell, mirrors its output to
 * the parent's stdout / stderr, and captures it for error reporting.
 */
export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: string[], options?: CommandRunOptions): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, {
        cwd: options?.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
        process.stdout.write(data);
      });
      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
        process.stderr.write(data);
      });

      proc.on('error', (err) => reject(err));
      proc.on('close', (code) => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });
    });
  }
}

// =====================================================================
// Executor
// =====================================================================

export interface ExecuteOptions {
  /** Re-invoke on failure under the executor's retry policy */
  retry?: boolean;
  cwd?: string;
  /** Message used for the error raised on failure */
  errorMessage?: string;
}

export interface CommandExecutorOptions {
  runner?: CommandRunner;
  logger?: BuildLogger;
  isDryRun?: boolean;
  retryPolicy?: RetryPolicy;
  sleep?: SleepFn;
}

/**
 * Executes external commands. Every failure is raised as an
 * {@link ImageForgeError}: `COMMAND_FAILED` for a single failed invocation,
 * `RETRY_EXHAUSTED` once the retry policy gives up.
 */
export class CommandExecutor {
  readonly isDryRun: boolean;
  readonly retryPolicy: RetryPolicy;
  private readonly runner: CommandRunner;
  private readonly logger: BuildLogger;
  private readonly retryExecutor: RetryExecutor;

  constructor(options?: CommandExecutorOptions) {
    this.runner = options?.runner ?? new SpawnCommandRunner();
    this.logger = options?.logger ?? silentLogger;
    this.isDryRun = options?.isDryRun ?? false;
    this.retryPolicy = options?.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.retryExecutor = new RetryExecutor(options?.sleep, (attempt, delayMs) => {
      this.logger.warn(`Attempt ${attempt.attempt} failed: ${attempt.error ?? 'unknown error'}. Retrying in ${delayMs}ms`);
    });
  }

  /**
   * Run a command. In dry-run mode the command line is echoed and treated as
   * successful without invoking the runner.
   */
  async execute(command: string, args: string[], options?: ExecuteOptions): Promise<CommandResult> {
    const commandLine = formatCommandLine(command, args);
    if (this.isDryRun) {
      this.logger.command(commandLine);
      return { exitCode: 0, stdout: '', stderr: '' };
    }

    if (!options?.retry) {
      return this.invoke(command, args, commandLine, options);
    }

    const result = await this.retryExecutor.execute(
      () => this.invoke(command, args, commandLine, options),
      this.retryPolicy,
    );
    if (result.passed && result.value) {
      return result.value;
    }

    throw new ImageForgeError(
      'RETRY_EXHAUSTED',
      `${options.errorMessage ?? `Command failed: ${commandLine}`} (gave up after ${result.attempts.length} attempts)`,
      { command: commandLine, attempts: result.attempts },
      { cause: result.finalError },
    );
  }

  /** Shorthand for {@link execute} with retry enabled. */
  executeWithRetry(command: string, args: string[], options?: Omit<ExecuteOptions, 'retry'>): Promise<CommandResult> {
    return this.execute(command, args, { ...options, retry: true });
  }

  private async invoke(
    command: string,
    args: string[],
    commandLine: string,
    options?: ExecuteOptions,
  ): Promise<CommandResult> {
    this.logger.command(commandLine);

    let result: CommandResult;
    try {
      result = await this.runner.run(command, args, { cwd: options?.cwd });
    } catch (err) {
      throw new ImageForgeError(
        'COMMAND_FAILED',
        `${options?.errorMessage ?? `Failed to start: ${commandLine}`}: ${err instanceof Error ? err.message : String(err)}`,
        { command: commandLine },
        { cause: err },
      );
    }

    if (result.exitCode !== 0) {
      throw new ImageForgeError(
        'COMMAND_FAILED',
        `${options?.errorMessage ?? `Command failed: ${commandLine}`} (exit code ${result.exitCode})`,
        { command: commandLine, exitCode: result.exitCode, stderr: result.stderr.trim() },
      );
    }

    return result;
  }
}

/** Render a command and its arguments as a single display line. */
export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (part === '' || /\s/.test(part) ? `"${part}"` : part))
    .join(' ');
}
