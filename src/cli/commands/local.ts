import type { Command } from 'commander';
import { runLocalStack } from '@/workflows/local-stack';
import { handleResultError, handleUsageError } from '../error-formatting';
import { openSession, type CliDependencies } from '../dependencies';
import { CLI_NAME } from './component-argument';

export function registerLocalCommand(program: Command, deps: CliDependencies): void {
  program
    .command('local')
    .description('Start (up) or stop (down) the local docker compose stack')
    .argument('[action]', 'up or down', 'up')
    .action(async (action: string) => {
      if (action !== 'up' && action !== 'down') {
        handleUsageError(`${CLI_NAME} local [up|down]`, `Unknown action: ${action}`);
      }

      const session = openSession(program, deps);
      const result = await runLocalStack(action, {
        projectRoot: session.config.projectRoot,
        logger: session.logger,
        runner: deps.runCommand,
      });
      if (!result.ok) handleResultError(result, `Local stack ${action} failed`);
    });
}
