/**
 * Clone a repository, report its stack and files, then delete the clone
 */

import { Success, type Result, type ToolContext } from '@/types';
import {
  cleanupRepositoryTool,
  cloneRepositoryTool,
  detectTechStackTool,
  listRepositoryFilesTool,
} from '@/tools';
import type { TechStack } from '@/tools/detect-tech-stack/schema';

export interface InspectRepositoryOptions {
  url: string;
  authType: 'pat' | 'ssh';
  credential: string;
  branch?: string;
  maxFiles?: number;
}

export interface RepositoryReport {
  url: string;
  stack: TechStack;
  files: string[];
  total: number;
}

export async function inspectRepository(
  options: InspectRepositoryOptions,
  ctx: ToolContext,
): Promise<Result<RepositoryReport>> {
  const cloned = await cloneRepositoryTool.run(
    {
      url: options.url,
      authType: options.authType,
      credential: options.credential,
      ...(options.branch ? { branch: options.branch } : {}),
    },
    ctx,
  );
  if (!cloned.ok) return cloned;

  const { repoPath } = cloned.value;
  try {
    const stack = await detectTechStackTool.run({ repoPath }, ctx);
    if (!stack.ok) return stack;

    const listing = await listRepositoryFilesTool.run(
      { repoPath, ...(options.maxFiles ? { maxFiles: options.maxFiles } : {}) },
      ctx,
    );
    if (!listing.ok) return listing;

    return Success({ url: options.url, stack: stack.value, ...listing.value });
  } finally {
    const cleaned = await cleanupRepositoryTool.run({ repoPath }, ctx);
    if (!cleaned.ok) {
      ctx.logger.warn({ repoPath, error: cleaned.error }, 'Failed to remove cloned repository');
    }
  }
}
