import type { Command } from 'commander';
import { updateServices } from '@/workflows/update-services';
import { handleResultError } from '../error-formatting';
import { openSession, type CliDependencies } from '../dependencies';
import { requireSelection } from './component-argument';

export function registerUpdateCommand(program: Command, deps: CliDependencies): void {
  program
    .command('update')
    .description('Rebuild, push and force-redeploy services, then wait until they are stable')
    .argument('[component]', 'frontend, backend or all (default: all)')
    .action(async (component: string | undefined) => {
      const selection = requireSelection('update', component);
      const session = openSession(program, deps);
      const ctx = deps.createWorkflowContext(session.config, session.logger, session.progress);

      const result = await updateServices(selection, ctx);
      if (!result.ok) handleResultError(result, 'Update failed');
    });
}
