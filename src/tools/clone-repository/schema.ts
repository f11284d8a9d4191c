import { z } from 'zod';

export const cloneRepositorySchema = z.object({
  url: z.string().min(1).describe('Repository URL (HTTPS or SSH)'),
  authType: z
    .enum(['pat', 'ssh'])
    .describe("'pat' for a personal access token, 'ssh' for a private key"),
  credential: z.string().min(1).describe('The token, or the PEM-encoded private key'),
  branch: z.string().min(1).default('main').describe('Branch to clone'),
});

export type CloneRepositoryParams = z.infer<typeof cloneRepositorySchema>;

export interface CloneRepositoryResult {
  repoPath: string;
}
