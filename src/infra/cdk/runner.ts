/**
 * Infrastructure commands delegated to the CDK CLI
 */

import path from 'node:path';
import type { Logger } from 'pino';
import { Failure, Success, type Result } from '@/types';
import { ECR_STACK_NAME } from '@/config/constants';
import { ERROR_MESSAGES } from '@/lib/errors';
import { runCommand, type CommandRunner } from '@/infra/process/run-command';

export type CdkAction =
  | { kind: 'bootstrap' }
  | { kind: 'deploy'; ecrOnly?: boolean }
  | { kind: 'diff' }
  | { kind: 'destroy'; force?: boolean };

/**
 * Argument vector for an action; the profile goes after the stack selection
 */
export function cdkArguments(action: CdkAction, profile?: string): string[] {
  const profileArgs = profile ? ['--profile', profile] : [];

  switch (action.kind) {
    case 'bootstrap':
      return ['bootstrap', ...profileArgs];
    case 'deploy':
      return [
        'deploy',
        action.ecrOnly ? ECR_STACK_NAME : '--all',
        ...profileArgs,
        '--require-approval',
        'never',
      ];
    case 'diff':
      return ['diff', '--all', ...profileArgs];
    case 'destroy':
      return ['destroy', '--all', ...profileArgs, ...(action.force ? ['--force'] : [])];
  }
}

export interface CdkRunOptions {
  projectRoot: string;
  cdkDir: string;
  profile?: string;
  logger: Logger;
  runner?: CommandRunner;
}

/** Installs the CDK app's Python dependencies before the first bootstrap */
export const CDK_DEPENDENCY_INSTALL = ['install', '-r', 'requirements.txt', '-q'];

async function runStep(
  run: CommandRunner,
  command: string,
  args: string[],
  cwd: string,
  label: string,
): Promise<Result<void>> {
  const result = await run(command, args, { cwd, stdio: 'inherit' });
  if (!result.ok) {
    return result;
  }

  if (result.value.exitCode !== 0) {
    return Failure(ERROR_MESSAGES.COMMAND_FAILED(label, result.value.exitCode));
  }
  return Success(undefined);
}

/**
 * Run `cdk <action>` in the CDK app directory with the terminal attached
 */
export async function runCdk(action: CdkAction, options: CdkRunOptions): Promise<Result<void>> {
  const args = cdkArguments(action, options.profile);
  const cwd = path.resolve(options.projectRoot, options.cdkDir);
  const run = options.runner ?? runCommand;

  if (action.kind === 'bootstrap') {
    options.logger.info({ cwd }, 'Installing CDK app dependencies');
    const installed = await runStep(run, 'pip', CDK_DEPENDENCY_INSTALL, cwd, 'pip install');
    if (!installed.ok) return installed;
  }

  options.logger.info({ args, cwd }, 'Running cdk');
  return runStep(run, 'cdk', args, cwd, `cdk ${action.kind}`);
}
