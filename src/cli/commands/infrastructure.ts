import type { Command } from 'commander';
import { runCdk, type CdkAction } from '@/infra/cdk/runner';
import { handleResultError } from '../error-formatting';
import { openSession, type CliDependencies } from '../dependencies';

export function registerInfrastructureCommands(program: Command, deps: CliDependencies): void {
  const run = async (action: CdkAction): Promise<void> => {
    const session = openSession(program, deps);
    const result = await runCdk(action, {
      projectRoot: session.config.projectRoot,
      cdkDir: session.config.cdkDir,
      ...(session.config.profile ? { profile: session.config.profile } : {}),
      logger: session.logger,
      runner: deps.runCommand,
    });
    if (!result.ok) handleResultError(result, `cdk ${action.kind} failed`);
  };

  program
    .command('bootstrap')
    .description('Bootstrap CDK in the target account and region')
    .action(() => run({ kind: 'bootstrap' }));

  program
    .command('deploy')
    .description('Deploy all stacks')
    .option('--ecr-only', 'deploy only the image repositories (before the first push)')
    .action((options: { ecrOnly?: boolean }) =>
      run({ kind: 'deploy', ecrOnly: options.ecrOnly ?? false }),
    );

  program
    .command('diff')
    .description('Show pending infrastructure changes')
    .action(() => run({ kind: 'diff' }));

  program
    .command('destroy')
    .description('Destroy all stacks')
    .option('--force', 'skip the CDK confirmation prompt')
    .action((options: { force?: boolean }) =>
      run({ kind: 'destroy', force: options.force ?? false }),
    );
}
