/**
 * Local image builds (`modernizer-<component>:latest`)
 */

import path from 'node:path';
import { Success, type Result } from '@/types';
import {
  IMAGE_PLATFORM,
  IMAGE_TAG,
  LOCAL_IMAGE_NAMES,
  type Component,
  type ComponentSelection,
} from '@/config/constants';
import { componentsFor } from './components';
import type { WorkflowContext } from './types';

export function localImageTag(component: Component): string {
  return `${LOCAL_IMAGE_NAMES[component]}:${IMAGE_TAG}`;
}

export function buildContext(projectRoot: string, component: Component): string {
  return path.join(projectRoot, component);
}

/**
 * Build one component's image from `<projectRoot>/<component>` under the given tag
 */
export async function buildComponentImage(
  component: Component,
  tag: string,
  ctx: Pick<WorkflowContext, 'config' | 'docker' | 'progress'>,
): Promise<Result<string>> {
  ctx.progress.step(`🔨 Building ${component}...`);
  const built = await ctx.docker.buildImage({
    context: buildContext(ctx.config.projectRoot, component),
    tag,
    platform: IMAGE_PLATFORM,
  });
  if (!built.ok) return built;
  return Success(tag);
}

/**
 * Build the local images for the selection; returns the tags built
 */
export async function buildImages(
  selection: ComponentSelection,
  ctx: Pick<WorkflowContext, 'config' | 'docker' | 'progress'>,
): Promise<Result<string[]>> {
  const tags: string[] = [];

  for (const component of componentsFor(selection)) {
    const built = await buildComponentImage(component, localImageTag(component), ctx);
    if (!built.ok) return built;
    tags.push(built.value);
  }

  return Success(tags);
}
