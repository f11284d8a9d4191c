/**
 * Command tree of the modernizer-ops CLI
 */

import { Command, Option } from 'commander';
import { LOG_LEVELS } from '@/config/constants';
import { defaultDependencies, type CliDependencies } from './dependencies';
import { registerAnalyzerCommands } from './commands/analyzer';
import { CLI_NAME } from './commands/component-argument';
import { registerHealthCommand } from './commands/health';
import { registerImageCommands } from './commands/images';
import { registerInfrastructureCommands } from './commands/infrastructure';
import { registerLocalCommand } from './commands/local';
import { registerLogsCommand } from './commands/logs';
import { registerRepositoryCommands } from './commands/repository';
import { registerUpdateCommand } from './commands/update';

export function createProgram(
  version: string,
  overrides: Partial<CliDependencies> = {},
): Command {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Build, push, deploy and operate the Modernization Analyzer services')
    .version(version)
    .option('--region <region>', 'AWS region (default: AWS_REGION or us-east-1)')
    .option('--profile <name>', 'AWS named profile (default: AWS_PROFILE)')
    .option('--project-root <path>', 'directory holding frontend/, backend/ and cdk/')
    .addOption(new Option('--log-level <level>', 'log level for stderr logs').choices(LOG_LEVELS))
    .option('--docker-socket <path>', 'Docker socket path (default: auto-detected)')
    .option('-q, --quiet', 'suppress progress lines')
    .addHelpText(
      'after',
      `
Examples:
  $ ${CLI_NAME} deploy --ecr-only       Create the image repositories
  $ ${CLI_NAME} push                    Build and push both images
  $ ${CLI_NAME} deploy                  Deploy all stacks
  $ ${CLI_NAME} update backend          Rebuild and redeploy the backend only
  $ ${CLI_NAME} logs frontend --follow  Follow the frontend logs

Environment Variables:
  AWS_REGION                       Region (default: us-east-1)
  AWS_PROFILE                      Named profile
  DEFAULT_MODEL_ID                 Analyzer default model
  BACKEND_URL                      Analyzer backend (default: http://localhost:8000)
  MODERNIZER_PROJECT_ROOT          Project root (default: current directory)
  MODERNIZER_PARAMETER_PREFIX      Parameter store prefix (default: /modernizer)
  MODERNIZER_WAIT_TIMEOUT_SECONDS  Stability wait per service (default: 600)
  LOG_LEVEL                        Log level (default: info)
`,
    );

  registerImageCommands(program, deps);
  registerInfrastructureCommands(program, deps);
  registerUpdateCommand(program, deps);
  registerLogsCommand(program, deps);
  registerLocalCommand(program, deps);
  registerHealthCommand(program, deps);
  registerAnalyzerCommands(program, deps);
  registerRepositoryCommands(program, deps);

  return program;
}
