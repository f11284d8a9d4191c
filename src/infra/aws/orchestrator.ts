/**
 * ECS service redeploys and stability waits
 */

import { UpdateServiceCommand, waitUntilServicesStable, type ECSClient } from '@aws-sdk/client-ecs';
import type { Logger } from 'pino';
import { Success, type Result } from '@/types';
import { createTimer } from '@/lib/logger';
import { awsFailure } from './failure';

export interface Orchestrator {
  /** Start a fresh deployment with the current task definition; returns the service name */
  forceNewDeployment: (cluster: string, service: string) => Promise<Result<string>>;
  /** Block until the service has one deployment with running == desired */
  waitForStable: (cluster: string, service: string, timeoutSeconds: number) => Promise<Result<void>>;
}

export function createOrchestrator(client: ECSClient, logger: Logger): Orchestrator {
  return {
    async forceNewDeployment(cluster: string, service: string): Promise<Result<string>> {
      try {
        const response = await client.send(
          new UpdateServiceCommand({ cluster, service, forceNewDeployment: true }),
        );
        const serviceName = response.service?.serviceName ?? service;
        logger.info({ cluster, service: serviceName }, 'Forced new deployment');
        return Success(serviceName);
      } catch (error) {
        return awsFailure(logger, `Failed to redeploy ${service}`, error, { cluster, service });
      }
    },

    async waitForStable(
      cluster: string,
      service: string,
      timeoutSeconds: number,
    ): Promise<Result<void>> {
      const timer = createTimer(logger, 'wait-services-stable', { cluster, service });
      try {
        await waitUntilServicesStable(
          { client, maxWaitTime: timeoutSeconds },
          { cluster, services: [service] },
        );
        timer.end();
        return Success(undefined);
      } catch (error) {
        timer.error(error);
        return awsFailure(logger, `Service ${service} did not stabilize`, error, {
          cluster,
          service,
          timeoutSeconds,
        });
      }
    },
  };
}
