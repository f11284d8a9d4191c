import { z } from 'zod';
import { Failure, type Result, type ToolContext } from '@/types';
import { extractErrorMessage } from '@/lib/errors';
import cleanupRepositoryTool from './cleanup-repository/tool';
import cloneRepositoryTool from './clone-repository/tool';
import detectTechStackTool from './detect-tech-stack/tool';
import listRepositoryFilesTool from './list-repository-files/tool';
import readFileContentTool from './read-file-content/tool';

export const TOOL_NAME = {
  CLONE_REPOSITORY: 'clone-repository',
  LIST_REPOSITORY_FILES: 'list-repository-files',
  READ_FILE_CONTENT: 'read-file-content',
  DETECT_TECH_STACK: 'detect-tech-stack',
  CLEANUP_REPOSITORY: 'cleanup-repository',
} as const;

export type ToolName = (typeof TOOL_NAME)[keyof typeof TOOL_NAME];

export type Tool =
  | typeof cloneRepositoryTool
  | typeof listRepositoryFilesTool
  | typeof readFileContentTool
  | typeof detectTechStackTool
  | typeof cleanupRepositoryTool;

// Order the agent is expected to use them in
export const ALL_TOOLS: readonly Tool[] = [
  cloneRepositoryTool,
  detectTechStackTool,
  listRepositoryFilesTool,
  readFileContentTool,
  cleanupRepositoryTool,
];

export function getTool(name: string): Tool | undefined {
  return ALL_TOOLS.find((candidate) => candidate.name === name);
}

/**
 * Validate untyped arguments against a tool's schema and run it
 */
export async function runTool(
  name: string,
  args: unknown,
  ctx: ToolContext,
): Promise<Result<unknown>> {
  const found = getTool(name);
  if (!found) {
    return Failure(`Unknown tool: ${name}`);
  }

  try {
    return await found.run(args, ctx);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return Failure(`Invalid arguments for ${name}: ${issues}`);
    }
    return Failure(`${name} failed: ${extractErrorMessage(error)}`);
  }
}

export {
  cleanupRepositoryTool,
  cloneRepositoryTool,
  detectTechStackTool,
  listRepositoryFilesTool,
  readFileContentTool,
};
