import type { Logger } from 'pino';
import type { RuntimeConfig } from '@/config/runtime';
import type { DockerClient } from '@/infra/docker/client';
import type { Identity } from '@/infra/aws/identity';
import type { Orchestrator } from '@/infra/aws/orchestrator';
import type { ParameterStore } from '@/infra/aws/parameter-store';
import type { Registry } from '@/infra/aws/registry';
import type { CommandRunner } from '@/infra/process/run-command';
import type { ProgressReporter } from '@/lib/progress';

/**
 * Everything a deployment workflow talks to
 */
export interface WorkflowContext {
  config: Pick<
    RuntimeConfig,
    'region' | 'projectRoot' | 'parameterPrefix' | 'waitTimeoutSeconds'
  >;
  docker: DockerClient;
  parameterStore: ParameterStore;
  identity: Identity;
  registry: Registry;
  orchestrator: Orchestrator;
  logger: Logger;
  progress: ProgressReporter;
  runCommand?: CommandRunner;
}
