import { promises as fs } from 'node:fs';
import { Failure, Success, type Result, type ToolContext } from '@/types';
import { tool } from '@/types/tool';
import { extractErrorMessage } from '@/lib/errors';
import {
  cleanupRepositorySchema,
  type CleanupRepositoryParams,
  type CleanupRepositoryResult,
} from './schema';

async function handleCleanupRepository(
  input: CleanupRepositoryParams,
  ctx: ToolContext,
): Promise<Result<CleanupRepositoryResult>> {
  try {
    await fs.rm(input.repoPath, { recursive: true, force: true });
  } catch (error) {
    return Failure(`Failed to delete ${input.repoPath}: ${extractErrorMessage(error)}`);
  }

  ctx.logger.debug({ repoPath: input.repoPath }, 'Deleted repository');
  return Success<CleanupRepositoryResult>({ status: 'deleted', path: input.repoPath });
}

export default tool({
  name: 'cleanup-repository',
  description: 'Delete a cloned repository once analysis is complete',
  schema: cleanupRepositorySchema,
  handler: handleCleanupRepository,
});
