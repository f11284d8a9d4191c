/**
 * Factories the commands use to reach Docker, AWS, the analyzer backend and
 * child processes. Tests replace them with in-process fakes.
 */

import type { Command } from 'commander';
import type { Logger } from 'pino';
import { resolveRuntimeConfig, type CliOverrides, type RuntimeConfig } from '@/config/runtime';
import { createAwsClients } from '@/infra/aws/clients';
import { createLogTailer, type LogTailer } from '@/infra/aws/log-tailer';
import { createAnalyzerClient, type AnalyzerClient } from '@/infra/analyzer/client';
import { runCommand, type CommandRunner } from '@/infra/process/run-command';
import { createLogger } from '@/lib/logger';
import { createStreamReporter, silentReporter, type ProgressReporter } from '@/lib/progress';
import { createWorkflowContext } from '@/workflows/context';
import type { WorkflowContext } from '@/workflows/types';
import { handleResultError } from './error-formatting';

export interface CliDependencies {
  createWorkflowContext: (
    config: RuntimeConfig,
    logger: Logger,
    progress: ProgressReporter,
  ) => WorkflowContext;
  createLogTailer: (config: RuntimeConfig, logger: Logger) => LogTailer;
  createAnalyzerClient: (config: RuntimeConfig, logger: Logger) => AnalyzerClient;
  createLogger: (config: RuntimeConfig) => Logger;
  runCommand: CommandRunner;
  progress: ProgressReporter;
}

export const defaultDependencies: CliDependencies = {
  createWorkflowContext,
  createLogTailer: (config, logger) =>
    createLogTailer(
      createAwsClients({
        region: config.region,
        ...(config.profile ? { profile: config.profile } : {}),
      }).logs,
      logger.child({ component: 'logs' }),
    ),
  createAnalyzerClient: (config, logger) =>
    createAnalyzerClient({
      backendUrl: config.backendUrl,
      logger: logger.child({ component: 'analyzer' }),
    }),
  createLogger: (config) => createLogger({ name: 'cli', level: config.logLevel }),
  runCommand,
  progress: createStreamReporter(process.stdout),
};

/**
 * Per-invocation state shared by every command action
 */
export interface CommandSession {
  config: RuntimeConfig;
  logger: Logger;
  progress: ProgressReporter;
  deps: CliDependencies;
}

export interface GlobalOptions {
  region?: string;
  profile?: string;
  projectRoot?: string;
  logLevel?: string;
  dockerSocket?: string;
  quiet?: boolean;
}

/**
 * Resolve configuration from the root program's flags; exits on invalid input
 */
export function openSession(program: Command, deps: CliDependencies): CommandSession {
  const options = program.opts<GlobalOptions>();
  const overrides: CliOverrides = {
    ...(options.region ? { region: options.region } : {}),
    ...(options.profile ? { profile: options.profile } : {}),
    ...(options.projectRoot ? { projectRoot: options.projectRoot } : {}),
    ...(options.logLevel ? { logLevel: options.logLevel } : {}),
    ...(options.dockerSocket ? { dockerSocket: options.dockerSocket } : {}),
    ...(options.quiet ? { quiet: true } : {}),
  };

  const config = resolveRuntimeConfig(overrides);
  if (!config.ok) {
    handleResultError(config, 'Configuration error');
  }

  const logger = deps.createLogger(config.value);
  logger.debug(
    { region: config.value.region, projectRoot: config.value.projectRoot },
    'Resolved configuration',
  );

  return {
    config: config.value,
    logger,
    progress: config.value.quiet ? silentReporter : deps.progress,
    deps,
  };
}
