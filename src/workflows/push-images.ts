/**
 * Build, tag and push images to the registry repositories
 */

import { Failure, Success, type Result } from '@/types';
import { IMAGE_TAG, type ComponentSelection } from '@/config/constants';
import { componentsFor } from './components';
import { buildComponentImage, localImageTag } from './build-images';
import { resolveRepositories } from './deployment-config';
import { loginToRegistry, resolveRegistryHost } from './registry-login';
import type { WorkflowContext } from './types';

export interface PushedImage {
  image: string;
  digest: string;
}

export async function pushImages(
  selection: ComponentSelection,
  ctx: WorkflowContext,
): Promise<Result<PushedImage[]>> {
  const components = componentsFor(selection);

  const host = await resolveRegistryHost(ctx);
  if (!host.ok) return host;

  const repositories = await resolveRepositories(
    ctx.parameterStore,
    components,
    ctx.config.parameterPrefix,
  );
  if (!repositories.ok) return repositories;

  const auth = await loginToRegistry(host.value, ctx);
  if (!auth.ok) return auth;

  const pushed: PushedImage[] = [];
  for (const component of components) {
    const repository = repositories.value[component];
    if (!repository) return Failure(`No repository resolved for ${component}`);

    const local = localImageTag(component);
    const built = await buildComponentImage(component, local, ctx);
    if (!built.ok) return built;

    const tagged = await ctx.docker.tagImage(local, repository, IMAGE_TAG);
    if (!tagged.ok) return tagged;

    ctx.progress.step(`⬆  Pushing ${component}...`);
    const result = await ctx.docker.pushImage(repository, IMAGE_TAG, auth.value);
    if (!result.ok) return result;

    pushed.push({ image: `${repository}:${IMAGE_TAG}`, digest: result.value.digest });
  }

  return Success(pushed);
}
