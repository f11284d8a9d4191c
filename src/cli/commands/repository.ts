import type { Command } from 'commander';
import { runTool, ALL_TOOLS } from '@/tools';
import { inspectRepository } from '@/workflows/inspect-repository';
import { handleGenericError, handleResultError } from '../error-formatting';
import { openSession, type CliDependencies } from '../dependencies';
import { resolveGitCredential } from './credentials';
import { parsePositiveInt } from './logs';

export function registerRepositoryCommands(program: Command, deps: CliDependencies): void {
  program
    .command('inspect-repo')
    .description(
      'Clone a repository, print its tech stack and file list as JSON, then delete the clone',
    )
    .argument('<url>', 'repository URL')
    .option('--branch <branch>', 'branch to clone', 'main')
    .option('--token <token>', 'personal access token (or MODERNIZER_GIT_TOKEN)')
    .option('--ssh-key-file <path>', 'private key file for SSH clones')
    .option('--max-files <n>', 'maximum files to list', parsePositiveInt)
    .action(
      async (
        url: string,
        options: { branch: string; token?: string; sshKeyFile?: string; maxFiles?: number },
      ) => {
        const credential = resolveGitCredential(options);
        if (!credential.ok) handleResultError(credential, 'Inspection not started');

        const session = openSession(program, deps);
        const report = await inspectRepository(
          {
            url,
            ...credential.value,
            branch: options.branch,
            ...(options.maxFiles ? { maxFiles: options.maxFiles } : {}),
          },
          { logger: session.logger, runCommand: deps.runCommand },
        );
        if (!report.ok) handleResultError(report, 'Inspection failed');

        console.log(JSON.stringify(report.value, null, 2));
      },
    );

  program
    .command('run-tool')
    .description(
      `Run one repository tool with JSON arguments (${ALL_TOOLS.map((t) => t.name).join(', ')})`,
    )
    .argument('<name>', 'tool name')
    .argument('[json]', 'tool arguments as a JSON object', '{}')
    .action(async (name: string, json: string) => {
      let args: unknown;
      try {
        args = JSON.parse(json);
      } catch (error) {
        handleGenericError('Tool arguments are not valid JSON', error);
      }

      const session = openSession(program, deps);
      const result = await runTool(name, args, {
        logger: session.logger,
        runCommand: deps.runCommand,
      });
      if (!result.ok) handleResultError(result, `${name} failed`);

      console.log(JSON.stringify(result.value, null, 2));
    });
}
