import type { Logger } from 'pino';
import { Failure, Success, type Result } from '@/types';
import { ERROR_MESSAGES } from '@/lib/errors';
import { runCommand, type CommandRunner } from '@/infra/process/run-command';

export type LocalStackAction = 'up' | 'down';

export function composeArguments(action: LocalStackAction): string[] {
  return action === 'up' ? ['compose', 'up', '--build'] : ['compose', 'down'];
}

/**
 * Start or stop the docker compose stack in the project root
 */
export async function runLocalStack(
  action: LocalStackAction,
  options: { projectRoot: string; logger: Logger; runner?: CommandRunner },
): Promise<Result<void>> {
  const args = composeArguments(action);
  const run = options.runner ?? runCommand;

  options.logger.info({ args, cwd: options.projectRoot }, 'Running docker compose');
  const result = await run('docker', args, { cwd: options.projectRoot, stdio: 'inherit' });
  if (!result.ok) return result;

  if (result.value.exitCode !== 0) {
    return Failure(ERROR_MESSAGES.COMMAND_FAILED(`docker ${args.join(' ')}`, result.value.exitCode));
  }
  return Success(undefined);
}
