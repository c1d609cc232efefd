/**
 * @hoist/exec - Streaming Command Executor
 *
 * Runs a composed command line through `sh -c`, echoing stdout and stderr
 * line by line while the command is still running. Remote commands are plain
 * local `ssh ...` invocations, so this is the only place a process is spawned.
 */

import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { ExecutionError } from '@hoist/shared';
import type { CommandResult, LogWriteError } from '@hoist/shared';
import type { LoggerLike } from '@hoist/logger';

// ============================================================================
// Types
// ============================================================================

/**
 * Resolves with the captured output when the command exits 0, rejects with an
 * ExecutionError otherwise. Pipelines depend on this, not on the class below.
 */
export interface CommandRunner {
  execute(command: string, description: string): Promise<CommandResult>;
}

export interface ExecutorOptions {
  shell?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Reports a log write that already failed; such a failure fails the command. */
  logFailure?: () => LogWriteError | undefined;
}

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

// Heuristic: stderr is full of progress output, only lines mentioning an
// error count as errors.
const ERROR_LINE = /error/i;

export function isErrorLine(line: string): boolean {
  return ERROR_LINE.test(line);
}

// ============================================================================
// Executor
// ============================================================================

export class CommandExecutor implements CommandRunner {
  constructor(
    private readonly logger: LoggerLike,
    private readonly options: ExecutorOptions = {},
  ) {}

  async execute(command: string, description: string): Promise<CommandResult> {
    const { shell = '/bin/sh', cwd, env = process.env } = this.options;

    this.assertLogWritten();

    this.logger.info(`${description}...`);
    this.logger.info(`Executing: ${command}`);

    let stdout = '';
    let stderr = '';

    const child = spawn(shell, ['-c', command], {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const exited = new Promise<ExitStatus>((resolve, reject) => {
      child.once('error', reject);
      child.once('close', (code, signal) => resolve({ code, signal }));
    });

    const stdoutDrained = drainLines(child.stdout, (line) => {
      this.logger.info(line);
      stdout += `${line}\n`;
    });

    const stderrDrained = drainLines(child.stderr, (line) => {
      if (isErrorLine(line)) {
        this.logger.error(line);
        stderr += `${line}\n`;
      } else {
        this.logger.info(line);
        stdout += `${line}\n`;
      }
    });

    let status: ExitStatus;
    try {
      [status] = await Promise.all([exited, stdoutDrained, stderrDrained]);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExecutionError(`Failed to start command: ${reason}`, null, { command });
    }

    if (status.code === 0) {
      this.assertLogWritten();
      return { stdout, stderr };
    }

    if (status.code === null) {
      throw new ExecutionError(`Command terminated by signal ${status.signal ?? 'unknown'}`, null, {
        command,
        stderr,
      });
    }

    throw new ExecutionError(`Command failed with exit code ${status.code}`, status.code, {
      command,
      stderr,
    });
  }

  private assertLogWritten(): void {
    const failure = this.options.logFailure?.();
    if (failure) {
      throw failure;
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function drainLines(stream: Readable, onLine: (line: string) => void): Promise<void> {
  return new Promise((resolve, reject) => {
    const reader = createInterface({ input: stream, crlfDelay: Infinity });
    reader.on('line', onLine);
    reader.once('close', () => resolve());
    stream.once('error', reject);
  });
}
