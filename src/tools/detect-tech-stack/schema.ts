import { z } from 'zod';

export const detectTechStackSchema = z.object({
  repoPath: z.string().min(1).describe('Absolute path of the cloned repository'),
});

export type DetectTechStackParams = z.infer<typeof detectTechStackSchema>;

export interface TechStack {
  languages: string[];
  frameworks: string[];
  buildTools: string[];
  ciCd: string[];
  containerization: string[];
  manifestFiles: string[];
}

/**
 * The subset of package.json read for framework signals
 */
export const packageManifestSchema = z.object({
  dependencies: z.record(z.string()).optional(),
  devDependencies: z.record(z.string()).optional(),
});
