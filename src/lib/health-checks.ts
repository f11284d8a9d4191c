/**
 * Health checks for the two dependencies every deploy needs: the Docker
 * daemon and usable AWS credentials
 */

import type { Logger } from 'pino';
import type { Result } from '@/types';
import type { DockerClient } from '@/infra/docker/client';
import type { Identity } from '@/infra/aws/identity';
import { DEFAULT_TIMEOUTS } from '@/config/constants';

export interface DependencyStatus {
  available: boolean;
  version?: string;
  error?: string;
}

export interface HealthReport {
  docker: DependencyStatus;
  aws: DependencyStatus;
  healthy: boolean;
}

async function withTimeout<T>(
  probe: Promise<Result<T>>,
  timeoutMs: number,
  label: string,
): Promise<Result<T>> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<Result<T>>((resolve) => {
    timer = setTimeout(
      () => resolve({ ok: false, error: `${label} connection timeout` }),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([probe, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function toStatus(result: Result<string>): DependencyStatus {
  return result.ok
    ? { available: true, version: result.value }
    : { available: false, error: result.error };
}

export async function checkDockerHealth(
  docker: DockerClient,
  logger: Logger,
  options: { timeout?: number } = {},
): Promise<DependencyStatus> {
  const result = await withTimeout(
    docker.version(),
    options.timeout ?? DEFAULT_TIMEOUTS.healthCheck,
    'Docker',
  );
  if (!result.ok) logger.debug({ error: result.error }, 'Docker health check failed');
  return toStatus(result);
}

/**
 * AWS is available when the caller identity resolves; `version` carries the account id
 */
export async function checkAwsHealth(
  identity: Identity,
  logger: Logger,
  options: { timeout?: number } = {},
): Promise<DependencyStatus> {
  const result = await withTimeout(
    identity.getAccountId(),
    options.timeout ?? DEFAULT_TIMEOUTS.healthCheck,
    'AWS',
  );
  if (!result.ok) logger.debug({ error: result.error }, 'AWS health check failed');
  return toStatus(result);
}

/**
 * `dockerTimeout` bounds the daemon probe on its own; `timeout` covers the rest
 */
export async function checkHealth(
  deps: { docker: DockerClient; identity: Identity },
  logger: Logger,
  options: { timeout?: number; dockerTimeout?: number } = {},
): Promise<HealthReport> {
  const [docker, aws] = await Promise.all([
    checkDockerHealth(deps.docker, logger, { timeout: options.dockerTimeout ?? options.timeout }),
    checkAwsHealth(deps.identity, logger, options),
  ]);
  return { docker, aws, healthy: docker.available && aws.available };
}
