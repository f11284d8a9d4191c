import type { Logger } from 'pino';
import type { RuntimeConfig } from '@/config/runtime';
import { createAwsClients } from '@/infra/aws/clients';
import { createIdentity } from '@/infra/aws/identity';
import { createOrchestrator } from '@/infra/aws/orchestrator';
import { createParameterStore } from '@/infra/aws/parameter-store';
import { createRegistry } from '@/infra/aws/registry';
import { createDockerClient } from '@/infra/docker/client';
import { runCommand } from '@/infra/process/run-command';
import type { ProgressReporter } from '@/lib/progress';
import type { WorkflowContext } from './types';

/**
 * Wire the real Docker and AWS clients for a run
 */
export function createWorkflowContext(
  config: RuntimeConfig,
  logger: Logger,
  progress: ProgressReporter,
): WorkflowContext {
  const aws = createAwsClients({
    region: config.region,
    ...(config.profile ? { profile: config.profile } : {}),
  });

  return {
    config,
    docker: createDockerClient(logger.child({ component: 'docker' }), {
      socketPath: config.dockerSocket,
    }),
    parameterStore: createParameterStore(aws.ssm, logger.child({ component: 'ssm' })),
    identity: createIdentity(aws.sts, logger.child({ component: 'sts' })),
    registry: createRegistry(aws.ecr, logger.child({ component: 'ecr' })),
    orchestrator: createOrchestrator(aws.ecs, logger.child({ component: 'ecs' })),
    logger,
    progress,
    runCommand,
  };
}
