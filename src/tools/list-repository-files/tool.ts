import path from 'node:path';
import { Failure, Success, type Result, type ToolContext } from '@/types';
import { tool } from '@/types/tool';
import { extractErrorMessage } from '@/lib/errors';
import { loadSignals } from '../shared/signals';
import { isDirectory, walkFiles } from '../shared/walk';
import {
  listRepositoryFilesSchema,
  type ListRepositoryFilesParams,
  type ListRepositoryFilesResult,
} from './schema';

/**
 * Source files of a repository, without VCS, dependency, build output or binary files
 */
async function handleListRepositoryFiles(
  input: ListRepositoryFilesParams,
  ctx: ToolContext,
): Promise<Result<ListRepositoryFilesResult>> {
  if (!(await isDirectory(input.repoPath))) {
    return Failure(`Repository not found: ${input.repoPath}`);
  }

  const { listing } = loadSignals();
  const skipDirectories = new Set(listing.skipDirectories);
  const skipExtensions = new Set(listing.skipExtensions);
  const files: string[] = [];

  try {
    for await (const file of walkFiles(input.repoPath, { skipDirectories })) {
      if (skipExtensions.has(path.extname(file).toLowerCase())) continue;
      files.push(file);
      if (files.length >= input.maxFiles) break;
    }
  } catch (error) {
    return Failure(`Failed to list ${input.repoPath}: ${extractErrorMessage(error)}`);
  }

  ctx.logger.debug({ repoPath: input.repoPath, total: files.length }, 'Listed repository files');
  return Success({ files, total: files.length });
}

export default tool({
  name: 'list-repository-files',
  description: 'Recursive file listing of a cloned repository, excluding generated and binary files',
  schema: listRepositoryFilesSchema,
  handler: handleListRepositoryFiles,
});
