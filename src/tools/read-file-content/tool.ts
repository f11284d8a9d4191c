import { promises as fs, type Stats } from 'node:fs';
import path from 'node:path';
import { Failure, Success, type Result, type ToolContext } from '@/types';
import { tool } from '@/types/tool';
import { extractErrorMessage } from '@/lib/errors';
import {
  readFileContentSchema,
  type ReadFileContentParams,
  type ReadFileContentResult,
} from './schema';

function isInside(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Split on any line ending; a trailing line ending does not add an empty line
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

async function handleReadFileContent(
  input: ReadFileContentParams,
  ctx: ToolContext,
): Promise<Result<ReadFileContentResult>> {
  const root = path.resolve(input.repoPath);
  const target = path.resolve(root, input.relativePath);

  if (!isInside(root, target)) {
    return Failure('Path traversal detected');
  }

  let stat: Stats;
  try {
    stat = await fs.stat(target);
  } catch {
    return Failure(`File not found: ${input.relativePath}`);
  }
  if (!stat.isFile()) {
    return Failure(`Not a file: ${input.relativePath}`);
  }

  try {
    // symlinks inside the repository must not lead out of it
    const [realRoot, realTarget] = await Promise.all([fs.realpath(root), fs.realpath(target)]);
    if (!isInside(realRoot, realTarget)) {
      return Failure('Path traversal detected');
    }

    const lines = splitLines(await fs.readFile(target, 'utf8'));
    const shown = lines.slice(0, input.maxLines);

    ctx.logger.debug({ relativePath: input.relativePath, totalLines: lines.length }, 'Read file');
    return Success({
      content: shown.join('\n'),
      linesShown: shown.length,
      totalLines: lines.length,
      truncated: lines.length > input.maxLines,
    });
  } catch (error) {
    return Failure(extractErrorMessage(error));
  }
}

export default tool({
  name: 'read-file-content',
  description: 'Read a file inside a cloned repository, truncated to a maximum number of lines',
  schema: readFileContentSchema,
  handler: handleReadFileContent,
});
