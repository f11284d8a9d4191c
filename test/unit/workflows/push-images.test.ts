import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { Failure, Success } from '@/types';
import * as deploymentConfig from '@/workflows/deployment-config';
import { pushImages } from '@/workflows/push-images';
import {
  BACKEND_REPOSITORY,
  FRONTEND_REPOSITORY,
  TEST_REGISTRY,
  createFakeWorkflowContext,
} from '../../__support__/mocks/workflow-context.mock';

describe('pushImages', () => {
  it('should build, tag and push the selected image', async () => {
    const ctx = createFakeWorkflowContext();

    const result = await pushImages('backend', ctx);

    expect(result).toEqual({
      ok: true,
      value: [{ image: `${BACKEND_REPOSITORY}:latest`, digest: 'sha256:modernizer-backend' }],
    });
    expect(ctx.events).toEqual([
      'account',
      'param /modernizer/backend-ecr-uri',
      `login ${TEST_REGISTRY}`,
      'build modernizer-backend:latest',
      `tag modernizer-backend:latest ${BACKEND_REPOSITORY}:latest`,
      `push ${BACKEND_REPOSITORY}:latest`,
    ]);
    expect(ctx.lines).toEqual([
      '🔐 Logging in to ECR...',
      '🔨 Building backend...',
      '⬆  Pushing backend...',
    ]);
  });

  it('should push with the registry credentials', async () => {
    const ctx = createFakeWorkflowContext();

    await pushImages('frontend', ctx);

    expect(ctx.docker.pushImage).toHaveBeenCalledWith(FRONTEND_REPOSITORY, 'latest', {
      username: 'AWS',
      password: 'test-secret',
      serveraddress: TEST_REGISTRY,
    });
  });

  it('should not need the service parameters', async () => {
    const ctx = createFakeWorkflowContext({
      '/modernizer/frontend-ecr-uri': FRONTEND_REPOSITORY,
      '/modernizer/backend-ecr-uri': BACKEND_REPOSITORY,
    });

    const result = await pushImages('all', ctx);

    expect(result.ok).toBe(true);
    expect(ctx.docker.pushImage).toHaveBeenCalledTimes(2);
  });

  it('should stop when the login fails', async () => {
    const ctx = createFakeWorkflowContext();
    ctx.registry.getLoginCredentials.mockResolvedValueOnce(
      Failure('Failed to log in to the registry: denied'),
    );

    const result = await pushImages('all', ctx);

    expect(result).toEqual({ ok: false, error: 'Failed to log in to the registry: denied' });
    expect(ctx.docker.buildImage).not.toHaveBeenCalled();
  });

  describe('with a repository missing from the resolved set', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should fail instead of skipping the component', async () => {
      jest.spyOn(deploymentConfig, 'resolveRepositories').mockResolvedValueOnce(Success({}));
      const ctx = createFakeWorkflowContext();

      const result = await pushImages('backend', ctx);

      expect(result).toEqual({ ok: false, error: 'No repository resolved for backend' });
      expect(ctx.docker.buildImage).not.toHaveBeenCalled();
      expect(ctx.docker.pushImage).not.toHaveBeenCalled();
    });
  });
});
