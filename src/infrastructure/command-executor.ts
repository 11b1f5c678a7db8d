/**
 * Command Executor - Utility for executing external commands
 * Every invocation carries a timeout and an optional abort signal; output is
 * captured and, when requested, echoed to the operator unfiltered.
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import type { Logger } from 'pino';
import { errorMessage } from '../lib/errors';

export interface CommandOptions {
  cwd?: string;
  /** Merged over the parent environment */
  env?: Record<string, string>;
  timeout?: number;
  signal?: AbortSignal;
  /** Echo collaborator stdout/stderr to ours while capturing it */
  echo?: boolean;
  maxBuffer?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  aborted: boolean;
  /** Set when the program could not be started at all (ENOENT, EACCES) */
  startError?: string;
}

/**
 * Seam used by every collaborator client; tests substitute a fake.
 */
export interface CommandRunner {
  execute(command: string, args?: string[], options?: CommandOptions): Promise<CommandResult>;
}

const KILL_GRACE_MS = 5000;

/**
 * Keeps the last `limit` bytes written to it. Older chunks are dropped
 * first, so the final lines of long output survive.
 */
export class OutputTail {
  private chunks: Buffer[] = [];
  private bytes = 0;

  constructor(private readonly limit: number) {}

  push(data: Buffer): void {
    this.chunks.push(data);
    this.bytes += data.length;

    while (this.bytes > this.limit && this.chunks.length > 1) {
      const head = this.chunks.shift();
      if (!head) break;
      this.bytes -= head.length;
    }

    const [only] = this.chunks;
    if (only && this.bytes > this.limit) {
      this.chunks = [only.subarray(only.length - this.limit)];
      this.bytes = this.limit;
    }
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString();
  }
}

export class CommandExecutor implements CommandRunner {
  constructor(
    private readonly logger: Logger,
    private readonly defaultTimeout = 120000,
  ) {}

  /**
   * Execute a command with arguments. Resolves with the exit status; rejects
   * only when the process cannot be started at all.
   */
  async execute(
    command: string,
    args: string[] = [],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const {
      cwd = process.cwd(),
      env = {},
      timeout = this.defaultTimeout,
      signal,
      echo = false,
      maxBuffer = 10 * 1024 * 1024, // 10MB
    } = options;

    this.logger.debug({ command, args, cwd, timeout }, 'Executing command');

    return new Promise((resolve, reject) => {
      const stdout = new OutputTail(maxBuffer);
      const stderr = new OutputTail(maxBuffer);
      let timedOut = false;
      let aborted = false;
      let timeoutHandle: NodeJS.Timeout | undefined;
      let killHandle: NodeJS.Timeout | undefined;

      const spawnOptions: SpawnOptions = {
        cwd,
        env: { ...process.env, ...env },
        shell: false,
        stdio: ['inherit', 'pipe', 'pipe'],
      };

      const child = spawn(command, args, spawnOptions);

      const terminate = (): void => {
        child.kill('SIGTERM');
        killHandle = setTimeout(() => {
          if (child.exitCode === null) {
            child.kill('SIGKILL');
          }
        }, KILL_GRACE_MS);
      };

      const onAbort = (): void => {
        aborted = true;
        terminate();
      };

      if (timeout > 0) {
        timeoutHandle = setTimeout(() => {
          timedOut = true;
          terminate();
        }, timeout);
      }

      if (signal) {
        if (signal.aborted) {
          onAbort();
        } else {
          signal.addEventListener('abort', onAbort, { once: true });
        }
      }

      const cleanup = (): void => {
        clearTimeout(timeoutHandle);
        clearTimeout(killHandle);
        signal?.removeEventListener('abort', onAbort);
      };

      child.stdout?.on('data', (data: Buffer) => {
        if (echo) process.stdout.write(data);
        stdout.push(data);
      });

      child.stderr?.on('data', (data: Buffer) => {
        if (echo) process.stderr.write(data);
        stderr.push(data);
      });

      child.on('close', (code: number | null) => {
        cleanup();

        const exitCode = code ?? -1;

        this.logger.debug({ command, exitCode, timedOut, aborted }, 'Command completed');

        resolve({
          stdout: stdout.toString().trim(),
          stderr: stderr.toString().trim(),
          exitCode,
          timedOut,
          aborted,
        });
      });

      child.on('error', (error: Error) => {
        cleanup();

        this.logger.error({ command, error: error.message }, 'Command execution failed');

        reject(error);
      });
    });
  }
}

/**
 * Execute through `runner`, mapping a start failure to a result with exit
 * code -1 so clients report it like any other failed invocation.
 */
export async function executeCommand(
  runner: CommandRunner,
  command: string,
  args: string[],
  options: CommandOptions = {},
): Promise<CommandResult> {
  try {
    return await runner.execute(command, args, options);
  } catch (error) {
    return {
      stdout: '',
      stderr: '',
      exitCode: -1,
      timedOut: false,
      aborted: false,
      startError: errorMessage(error),
    };
  }
}

/**
 * Render a command for log lines and fatal messages
 */
export function describeCommand(command: string, args: string[] = []): string {
  return [command, ...args].join(' ');
}

/**
 * Short reason for a non-zero result: timeout, abort or the last stderr line
 */
export function failureReason(result: CommandResult): string {
  if (result.startError) return result.startError;
  if (result.timedOut) return 'timed out';
  if (result.aborted) return 'aborted';
  const lastLine = result.stderr.split('\n').filter((line) => line.trim()).pop();
  return lastLine ?? `exit code ${result.exitCode}`;
}
