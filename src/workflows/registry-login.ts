import { Success, type Result } from '@/types';
import { registryHost } from '@/infra/aws/registry';
import type { RegistryAuth } from '@/infra/docker/client';
import type { WorkflowContext } from './types';

/**
 * Resolve the caller's account and the registry host it pushes to
 */
export async function resolveRegistryHost(
  ctx: Pick<WorkflowContext, 'identity' | 'config'>,
): Promise<Result<string>> {
  const account = await ctx.identity.getAccountId();
  if (!account.ok) return account;
  return Success(registryHost(account.value, ctx.config.region));
}

export async function loginToRegistry(
  host: string,
  ctx: Pick<WorkflowContext, 'registry' | 'progress'>,
): Promise<Result<RegistryAuth>> {
  ctx.progress.step('🔐 Logging in to ECR...');
  return ctx.registry.getLoginCredentials(host);
}
