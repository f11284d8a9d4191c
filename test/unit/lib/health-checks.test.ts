import { describe, it, expect, jest } from '@jest/globals';
import { checkDockerHealth, checkHealth } from '@/lib/health-checks';
import { Failure, Success, type Result } from '@/types';
import type { DockerClient } from '@/infra/docker/client';
import type { Identity } from '@/infra/aws/identity';
import { createTestLogger } from '../../__support__/utilities/logger';

function dockerReturning(version: () => Promise<Result<string>>): DockerClient {
  return {
    buildImage: jest.fn<DockerClient['buildImage']>(),
    tagImage: jest.fn<DockerClient['tagImage']>(),
    pushImage: jest.fn<DockerClient['pushImage']>(),
    version,
  };
}

describe('health checks', () => {
  const logger = createTestLogger();

  it('should be healthy when Docker and AWS both answer', async () => {
    const identity: Identity = { getAccountId: async () => Success('111122223333') };

    const report = await checkHealth(
      { docker: dockerReturning(async () => Success('24.0.7')), identity },
      logger,
    );

    expect(report).toEqual({
      docker: { available: true, version: '24.0.7' },
      aws: { available: true, version: '111122223333' },
      healthy: true,
    });
  });

  it('should be unhealthy when either dependency fails', async () => {
    const identity: Identity = {
      getAccountId: async () => Failure('Failed to resolve AWS account: Could not load credentials'),
    };

    const report = await checkHealth(
      { docker: dockerReturning(async () => Success('24.0.7')), identity },
      logger,
    );

    expect(report.healthy).toBe(false);
    expect(report.aws).toEqual({
      available: false,
      error: 'Failed to resolve AWS account: Could not load credentials',
    });
  });

  it('should bound the Docker probe by its own timeout', async () => {
    const hanging = dockerReturning(() => new Promise<Result<string>>(() => undefined));
    const identity: Identity = { getAccountId: async () => Success('111122223333') };

    const report = await checkHealth({ docker: hanging, identity }, logger, {
      timeout: 5000,
      dockerTimeout: 10,
    });

    expect(report.docker).toEqual({ available: false, error: 'Docker connection timeout' });
    expect(report.aws).toEqual({ available: true, version: '111122223333' });
  });

  it('should time out a probe that never answers', async () => {
    const hanging = dockerReturning(() => new Promise<Result<string>>(() => undefined));

    const status = await checkDockerHealth(hanging, logger, { timeout: 10 });

    expect(status).toEqual({ available: false, error: 'Docker connection timeout' });
  });
});
