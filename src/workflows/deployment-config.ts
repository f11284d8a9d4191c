/**
 * Deployment configuration published to the parameter store by the stacks
 */

import { Success, type Result } from '@/types';
import { parameterName, type Component, type ParameterKey } from '@/config/constants';
import type { ParameterStore } from '@/infra/aws/parameter-store';

export interface ServiceTarget {
  /** Image repository URI, without tag */
  repository: string;
  /** ECS service name */
  service: string;
}

export interface DeploymentConfig {
  cluster: string;
  services: Record<Component, ServiceTarget>;
}

const REPOSITORY_KEYS: Record<Component, ParameterKey> = {
  frontend: 'frontendRepository',
  backend: 'backendRepository',
};

/**
 * Read all five parameters, one lookup at a time, stopping at the first failure
 */
export async function resolveDeploymentConfig(
  store: ParameterStore,
  prefix?: string,
): Promise<Result<DeploymentConfig>> {
  const lookup = (key: ParameterKey): Promise<Result<string>> =>
    store.getParameter(parameterName(key, prefix));

  const frontendRepository = await lookup('frontendRepository');
  if (!frontendRepository.ok) return frontendRepository;
  const backendRepository = await lookup('backendRepository');
  if (!backendRepository.ok) return backendRepository;
  const cluster = await lookup('cluster');
  if (!cluster.ok) return cluster;
  const frontendService = await lookup('frontendService');
  if (!frontendService.ok) return frontendService;
  const backendService = await lookup('backendService');
  if (!backendService.ok) return backendService;

  return Success({
    cluster: cluster.value,
    services: {
      frontend: { repository: frontendRepository.value, service: frontendService.value },
      backend: { repository: backendRepository.value, service: backendService.value },
    },
  });
}

/**
 * Read only the repository URIs of the given components
 *
 * Pushing works as soon as the registry stack exists, before the service
 * stack has published the cluster and service names.
 */
export async function resolveRepositories(
  store: ParameterStore,
  components: Component[],
  prefix?: string,
): Promise<Result<Partial<Record<Component, string>>>> {
  const repositories: Partial<Record<Component, string>> = {};

  for (const component of components) {
    const result = await store.getParameter(parameterName(REPOSITORY_KEYS[component], prefix));
    if (!result.ok) return result;
    repositories[component] = result.value;
  }

  return Success(repositories);
}

export function formatDeploymentSummary(config: DeploymentConfig): string[] {
  return [
    `  Cluster:          ${config.cluster}`,
    `  Frontend service: ${config.services.frontend.service}`,
    `  Backend service:  ${config.services.backend.service}`,
    `  Frontend ECR:     ${config.services.frontend.repository}`,
    `  Backend ECR:      ${config.services.backend.repository}`,
  ];
}
