/**
 * Child process runner for the git, cdk and docker compose CLIs
 */

import { spawn } from 'node:child_process';
import { Failure, Success, type Result } from '@/types';
import { extractErrorMessage } from '@/lib/errors';

export interface CommandOptions {
  cwd?: string;
  /** Merged over the current environment */
  env?: Record<string, string>;
  /** `inherit` streams output to the terminal and leaves stdout/stderr empty */
  stdio?: 'pipe' | 'inherit';
}

export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs a command to completion. A non-zero exit is a successful Result with
 * that exit code; only a process that cannot start is a failure.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<Result<CommandOutput>>;

export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve) => {
    const stdio = options.stdio ?? 'pipe';
    let stdout = '';
    let stderr = '';

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: stdio === 'inherit' ? 'inherit' : ['ignore', 'pipe', 'pipe'],
    });

    child.stdout?.setEncoding('utf8').on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.setEncoding('utf8').on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.once('error', (error) => {
      const notFound = 'code' in error && error.code === 'ENOENT';
      resolve(
        Failure(`Failed to run ${command}: ${extractErrorMessage(error)}`, {
          message: notFound ? `${command} is not installed or not on PATH` : extractErrorMessage(error),
          ...(notFound ? { resolution: `Install ${command} and make sure it is on PATH.` } : {}),
        }),
      );
    });

    child.once('close', (code, signal) => {
      resolve(Success({ exitCode: code ?? (signal ? 128 : 1), stdout, stderr }));
    });
  });
