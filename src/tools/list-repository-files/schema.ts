import { z } from 'zod';

export const listRepositoryFilesSchema = z.object({
  repoPath: z.string().min(1).describe('Absolute path of the cloned repository'),
  maxFiles: z.number().int().positive().default(300).describe('Maximum number of files to return'),
});

export type ListRepositoryFilesParams = z.infer<typeof listRepositoryFilesSchema>;

export interface ListRepositoryFilesResult {
  files: string[];
  total: number;
}
