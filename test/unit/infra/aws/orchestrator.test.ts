import { describe, it, expect, beforeEach, afterAll } from '@jest/globals';
import { mockClient } from 'aws-sdk-client-mock';
import {
  DescribeServicesCommand,
  ECSClient,
  ServiceNotFoundException,
  UpdateServiceCommand,
} from '@aws-sdk/client-ecs';
import { createOrchestrator } from '@/infra/aws/orchestrator';
import { createTestLogger } from '../../../__support__/utilities/logger';

const ecsMock = mockClient(ECSClient);

describe('Orchestrator', () => {
  const orchestrator = createOrchestrator(new ECSClient({ region: 'us-east-1' }), createTestLogger());

  beforeEach(() => {
    ecsMock.reset();
  });

  afterAll(() => {
    ecsMock.restore();
  });

  describe('forceNewDeployment', () => {
    it('should force a new deployment of the service', async () => {
      ecsMock
        .on(UpdateServiceCommand)
        .resolves({ service: { serviceName: 'modernizer-backend-svc' } });

      const result = await orchestrator.forceNewDeployment(
        'modernizer-cluster',
        'modernizer-backend-svc',
      );

      expect(result).toEqual({ ok: true, value: 'modernizer-backend-svc' });
      const calls = ecsMock.commandCalls(UpdateServiceCommand);
      expect(calls).toHaveLength(1);
      expect(calls[0]?.args[0].input).toEqual({
        cluster: 'modernizer-cluster',
        service: 'modernizer-backend-svc',
        forceNewDeployment: true,
      });
    });

    it('should report a missing service', async () => {
      ecsMock
        .on(UpdateServiceCommand)
        .rejects(new ServiceNotFoundException({ message: 'Service not found.', $metadata: {} }));

      const result = await orchestrator.forceNewDeployment('modernizer-cluster', 'ghost-svc');

      expect(result).toMatchObject({
        ok: false,
        error: 'Failed to redeploy ghost-svc: Service not found.',
        guidance: { message: 'ECS service not found or inactive' },
      });
    });
  });

  describe('waitForStable', () => {
    it('should succeed once the service has settled', async () => {
      ecsMock.on(DescribeServicesCommand).resolves({
        services: [
          {
            serviceName: 'modernizer-frontend-svc',
            status: 'ACTIVE',
            deployments: [{ status: 'PRIMARY' }],
            runningCount: 1,
            desiredCount: 1,
          },
        ],
        failures: [],
      });

      const result = await orchestrator.waitForStable(
        'modernizer-cluster',
        'modernizer-frontend-svc',
        600,
      );

      expect(result).toEqual({ ok: true, value: undefined });
      expect(ecsMock.commandCalls(DescribeServicesCommand)[0]?.args[0].input).toEqual({
        cluster: 'modernizer-cluster',
        services: ['modernizer-frontend-svc'],
      });
    });

    it('should fail when the service is missing', async () => {
      ecsMock.on(DescribeServicesCommand).resolves({
        services: [],
        failures: [{ arn: 'arn:aws:ecs:us-east-1:111122223333:service/ghost-svc', reason: 'MISSING' }],
      });

      const result = await orchestrator.waitForStable('modernizer-cluster', 'ghost-svc', 600);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.startsWith('Service ghost-svc did not stabilize: ')).toBe(true);
    });
  });
});
