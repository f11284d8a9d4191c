import type { Command } from 'commander';
import { buildImages } from '@/workflows/build-images';
import { pushImages } from '@/workflows/push-images';
import { handleResultError } from '../error-formatting';
import { openSession, type CliDependencies } from '../dependencies';
import { requireSelection } from './component-argument';

export function registerImageCommands(program: Command, deps: CliDependencies): void {
  program
    .command('build')
    .description('Build the local images (modernizer-<component>:latest, linux/amd64)')
    .argument('[component]', 'frontend, backend or all')
    .action(async (component: string | undefined) => {
      const selection = requireSelection('build', component);
      const session = openSession(program, deps);
      const ctx = deps.createWorkflowContext(session.config, session.logger, session.progress);

      const result = await buildImages(selection, ctx);
      if (!result.ok) handleResultError(result, 'Build failed');

      for (const tag of result.value) {
        console.log(`✅ Built ${tag}`);
      }
    });

  program
    .command('push')
    .description('Build, tag and push images to their registry repositories')
    .argument('[component]', 'frontend, backend or all')
    .action(async (component: string | undefined) => {
      const selection = requireSelection('push', component);
      const session = openSession(program, deps);
      const ctx = deps.createWorkflowContext(session.config, session.logger, session.progress);

      const result = await pushImages(selection, ctx);
      if (!result.ok) handleResultError(result, 'Push failed');

      for (const pushed of result.value) {
        console.log(`✅ Pushed ${pushed.image} (${pushed.digest})`);
      }
    });
}
