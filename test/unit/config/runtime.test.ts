import path from 'node:path';
import { describe, it, expect, beforeEach, afterAll } from '@jest/globals';
import { loadEnvironmentConfig, type EnvironmentConfig } from '@/config/config';
import { resolveRuntimeConfig } from '@/config/runtime';
import { parameterName } from '@/config/constants';

function environment(project: Partial<EnvironmentConfig['project']> = {}): EnvironmentConfig {
  return {
    aws: { region: 'us-east-1', profile: undefined },
    analyzer: {
      defaultModelId: 'anthropic.claude-3-5-sonnet-20241022-v2:0',
      backendUrl: 'http://localhost:8000',
    },
    project: { root: '/work/modernizer', cdkDir: 'cdk', parameterPrefix: '/modernizer', ...project },
    docker: { socketPath: '/var/run/docker.sock', timeout: 60000 },
    deploy: { waitTimeoutSeconds: 600 },
    logging: { level: 'info', quiet: false },
  };
}

describe('parameterName', () => {
  it('should join the prefix and the fixed key', () => {
    expect(parameterName('frontendRepository')).toBe('/modernizer/frontend-ecr-uri');
    expect(parameterName('backendRepository')).toBe('/modernizer/backend-ecr-uri');
    expect(parameterName('cluster')).toBe('/modernizer/cluster-name');
    expect(parameterName('frontendService')).toBe('/modernizer/frontend-service');
    expect(parameterName('backendService')).toBe('/modernizer/backend-service');
    expect(parameterName('cluster', '/staging')).toBe('/staging/cluster-name');
  });
});

describe('loadEnvironmentConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of [
      'AWS_REGION',
      'AWS_PROFILE',
      'DEFAULT_MODEL_ID',
      'BACKEND_URL',
      'MODERNIZER_CDK_DIR',
      'MODERNIZER_PARAMETER_PREFIX',
      'MODERNIZER_WAIT_TIMEOUT_SECONDS',
      'DOCKER_SOCKET',
    ]) {
      delete process.env[key];
    }
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should apply defaults when nothing is set', () => {
    const config = loadEnvironmentConfig();

    expect(config.aws).toEqual({ region: 'us-east-1', profile: undefined });
    expect(config.analyzer).toEqual({
      defaultModelId: 'anthropic.claude-3-5-sonnet-20241022-v2:0',
      backendUrl: 'http://localhost:8000',
    });
    expect(config.project.cdkDir).toBe('cdk');
    expect(config.project.parameterPrefix).toBe('/modernizer');
    expect(config.deploy.waitTimeoutSeconds).toBe(600);
  });

  it('should read the documented variables', () => {
    process.env.AWS_REGION = 'eu-central-1';
    process.env.AWS_PROFILE = 'modernizer-dev';
    process.env.DEFAULT_MODEL_ID = 'anthropic.claude-3-5-haiku-20241022-v1:0';
    process.env.BACKEND_URL = 'http://backend.internal:8000';
    process.env.MODERNIZER_WAIT_TIMEOUT_SECONDS = '900';
    process.env.DOCKER_SOCKET = '/tmp/docker.sock';

    const config = loadEnvironmentConfig();

    expect(config.aws).toEqual({ region: 'eu-central-1', profile: 'modernizer-dev' });
    expect(config.analyzer.defaultModelId).toBe('anthropic.claude-3-5-haiku-20241022-v1:0');
    expect(config.analyzer.backendUrl).toBe('http://backend.internal:8000');
    expect(config.deploy.waitTimeoutSeconds).toBe(900);
    expect(config.docker.socketPath).toBe('/tmp/docker.sock');
  });
});

describe('resolveRuntimeConfig', () => {
  it('should use environment values when no flags are given', () => {
    const result = resolveRuntimeConfig({}, environment());

    expect(result).toEqual({
      ok: true,
      value: {
        region: 'us-east-1',
        projectRoot: '/work/modernizer',
        cdkDir: 'cdk',
        parameterPrefix: '/modernizer',
        dockerSocket: '/var/run/docker.sock',
        dockerTimeout: 60000,
        waitTimeoutSeconds: 600,
        backendUrl: 'http://localhost:8000',
        defaultModelId: 'anthropic.claude-3-5-sonnet-20241022-v2:0',
        logLevel: 'info',
        quiet: false,
      },
    });
  });

  it('should let flags win over the environment', () => {
    const result = resolveRuntimeConfig(
      {
        region: 'eu-west-1',
        profile: 'ops',
        projectRoot: 'relative/checkout',
        logLevel: 'debug',
        dockerSocket: '/tmp/colima.sock',
        quiet: true,
      },
      environment(),
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.region).toBe('eu-west-1');
    expect(result.value.profile).toBe('ops');
    expect(result.value.projectRoot).toBe(path.resolve('relative/checkout'));
    expect(result.value.logLevel).toBe('debug');
    expect(result.value.dockerSocket).toBe('/tmp/colima.sock');
    expect(result.value.quiet).toBe(true);
  });

  it('should reject an unknown log level', () => {
    const result = resolveRuntimeConfig({ logLevel: 'loud' }, environment());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.startsWith('Invalid configuration: logLevel: Invalid enum value')).toBe(
      true,
    );
    expect(result.guidance?.hint).toBe('A CLI flag or environment variable has an unusable value');
  });

  it('should reject a parameter prefix with a trailing slash', () => {
    const result = resolveRuntimeConfig({}, environment({ parameterPrefix: '/modernizer/' }));

    expect(result).toMatchObject({
      ok: false,
      error:
        'Invalid configuration: parameterPrefix: parameter prefix must start with "/" and must not end with "/"',
    });
  });
});
