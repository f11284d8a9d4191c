import { z } from 'zod';

export const cleanupRepositorySchema = z.object({
  repoPath: z.string().min(1).describe('Absolute path of the cloned repository'),
});

export type CleanupRepositoryParams = z.infer<typeof cleanupRepositorySchema>;

export interface CleanupRepositoryResult {
  status: 'deleted';
  path: string;
}
