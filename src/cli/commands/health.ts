import type { Command } from 'commander';
import { checkHealth, type DependencyStatus } from '@/lib/health-checks';
import { openSession, type CliDependencies } from '../dependencies';

function describe(label: string, status: DependencyStatus): string {
  return status.available
    ? `✅ ${label}: ${status.version ?? 'available'}`
    : `❌ ${label}: ${status.error ?? 'unavailable'}`;
}

export function registerHealthCommand(program: Command, deps: CliDependencies): void {
  program
    .command('health')
    .description('Check that Docker and AWS credentials are usable')
    .action(async () => {
      const session = openSession(program, deps);
      const ctx = deps.createWorkflowContext(session.config, session.logger, session.progress);

      const report = await checkHealth(
        { docker: ctx.docker, identity: ctx.identity },
        session.logger,
        { dockerTimeout: session.config.dockerTimeout },
      );

      console.log(describe('Docker', report.docker));
      console.log(describe('AWS account', report.aws));

      if (!report.healthy) {
        process.exit(1);
      }
    });
}
