/**
 * Rebuild, push and force-redeploy services, then wait for them to settle
 *
 * The first failing step ends the run; nothing after it executes.
 */

import type { Logger } from 'pino';
import { Success, type Result } from '@/types';
import { IMAGE_TAG, type Component, type ComponentSelection } from '@/config/constants';
import type { RegistryAuth } from '@/infra/docker/client';
import { buildComponentImage } from './build-images';
import { componentsFor } from './components';
import {
  formatDeploymentSummary,
  resolveDeploymentConfig,
  type DeploymentConfig,
} from './deployment-config';
import { loginToRegistry, resolveRegistryHost } from './registry-login';
import type { WorkflowContext } from './types';

export interface UpdateResult {
  selection: ComponentSelection;
  services: string[];
}

async function buildAndPush(
  component: Component,
  repository: string,
  auth: RegistryAuth,
  ctx: WorkflowContext,
): Promise<Result<void>> {
  ctx.progress.step('');
  const image = `${repository}:${IMAGE_TAG}`;

  const built = await buildComponentImage(component, image, ctx);
  if (!built.ok) return built;

  ctx.progress.step(`⬆  Pushing ${component}...`);
  const pushed = await ctx.docker.pushImage(repository, IMAGE_TAG, auth);
  if (!pushed.ok) return pushed;

  return Success(undefined);
}

async function forceRedeploy(
  cluster: string,
  service: string,
  ctx: WorkflowContext,
): Promise<Result<string>> {
  ctx.progress.step(`🚀 Forcing new deployment for ${service}...`);
  return ctx.orchestrator.forceNewDeployment(cluster, service);
}

async function waitForStable(
  cluster: string,
  service: string,
  ctx: WorkflowContext,
): Promise<Result<void>> {
  ctx.progress.step(`⏳ Waiting for ${service} to stabilize...`);
  const stable = await ctx.orchestrator.waitForStable(
    cluster,
    service,
    ctx.config.waitTimeoutSeconds,
  );
  if (!stable.ok) return stable;

  ctx.progress.step(`✅ ${service} is stable.`);
  return Success(undefined);
}

function logUpdatePlan(
  logger: Logger,
  deployment: DeploymentConfig,
  selection: ComponentSelection,
): void {
  const services = componentsFor(selection).map((c) => deployment.services[c].service);
  logger.info({ cluster: deployment.cluster, selection, services }, 'Updating services');
}

/**
 * All images are pushed before any service is redeployed, and every service
 * is redeployed before the first wait.
 */
export async function updateServices(
  selection: ComponentSelection,
  ctx: WorkflowContext,
): Promise<Result<UpdateResult>> {
  const components = componentsFor(selection);

  const host = await resolveRegistryHost(ctx);
  if (!host.ok) return host;

  ctx.progress.step('📦 Fetching deployment config from SSM...');
  const deployment = await resolveDeploymentConfig(ctx.parameterStore, ctx.config.parameterPrefix);
  if (!deployment.ok) return deployment;

  for (const line of formatDeploymentSummary(deployment.value)) {
    ctx.progress.step(line);
  }
  ctx.progress.step('');

  const auth = await loginToRegistry(host.value, ctx);
  if (!auth.ok) return auth;

  logUpdatePlan(ctx.logger, deployment.value, selection);
  const { cluster, services } = deployment.value;

  for (const component of components) {
    const pushed = await buildAndPush(component, services[component].repository, auth.value, ctx);
    if (!pushed.ok) return pushed;
  }

  for (const component of components) {
    const redeployed = await forceRedeploy(cluster, services[component].service, ctx);
    if (!redeployed.ok) return redeployed;
  }

  for (const component of components) {
    const stable = await waitForStable(cluster, services[component].service, ctx);
    if (!stable.ok) return stable;
  }

  ctx.progress.step('');
  ctx.progress.step('🎉 Update complete!');

  return Success({ selection, services: components.map((c) => services[c].service) });
}
