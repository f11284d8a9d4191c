import { z } from 'zod';

export const readFileContentSchema = z.object({
  repoPath: z.string().min(1).describe('Absolute path of the cloned repository'),
  relativePath: z.string().min(1).describe('File path relative to the repository root'),
  maxLines: z.number().int().positive().default(300).describe('Lines returned before truncating'),
});

export type ReadFileContentParams = z.infer<typeof readFileContentSchema>;

export interface ReadFileContentResult {
  content: string;
  linesShown: number;
  totalLines: number;
  truncated: boolean;
}
