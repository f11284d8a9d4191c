/**
 * Detect languages, frameworks and tooling from well-known files
 */

import { existsSync, promises as fs } from 'node:fs';
import path from 'node:path';
import type { Logger } from 'pino';
import { Failure, Success, type Result, type ToolContext } from '@/types';
import { tool } from '@/types/tool';
import { extractErrorMessage } from '@/lib/errors';
import { loadSignals, type TechStackSignals } from '../shared/signals';
import { isDirectory, walkFiles } from '../shared/walk';
import {
  detectTechStackSchema,
  packageManifestSchema,
  type DetectTechStackParams,
  type TechStack,
} from './schema';

function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}

async function detectLanguages(root: string, signals: TechStackSignals): Promise<string[]> {
  const extensions = new Set<string>();
  for await (const file of walkFiles(root, { skipDirectories: new Set(['.git']) })) {
    extensions.add(path.extname(file).toLowerCase());
  }

  const languages: string[] = [];
  for (const [extension, language] of Object.entries(signals.extensionLanguages)) {
    if (extensions.has(extension)) pushUnique(languages, language);
  }
  return languages;
}

async function detectNodeFrameworks(
  root: string,
  signals: TechStackSignals,
  logger: Logger,
): Promise<string[]> {
  const manifestPath = path.join(root, 'package.json');
  if (!existsSync(manifestPath)) return [];

  let dependencies: Record<string, string>;
  try {
    const raw: unknown = JSON.parse(await fs.readFile(manifestPath, 'utf8'));
    const manifest = packageManifestSchema.parse(raw);
    dependencies = { ...manifest.dependencies, ...manifest.devDependencies };
  } catch (error) {
    logger.debug({ error: extractErrorMessage(error) }, 'Unreadable package.json, skipping');
    return [];
  }

  const frameworks: string[] = [];
  for (const [name, label] of Object.entries(signals.nodeFrameworks)) {
    if (name in dependencies || `@${name}` in dependencies) pushUnique(frameworks, label);
  }
  return frameworks;
}

async function detectPythonFrameworks(root: string, signals: TechStackSignals): Promise<string[]> {
  const requirementFiles = (await fs.readdir(root, { withFileTypes: true }))
    .filter((entry) => entry.isFile() && /^requirements.*\.txt$/.test(entry.name))
    .map((entry) => entry.name)
    .sort();

  const frameworks: string[] = [];
  for (const file of requirementFiles) {
    const content = (await fs.readFile(path.join(root, file), 'utf8')).toLowerCase();
    for (const [name, label] of Object.entries(signals.pythonFrameworks)) {
      if (content.includes(name)) pushUnique(frameworks, label);
    }
  }
  return frameworks;
}

async function handleDetectTechStack(
  input: DetectTechStackParams,
  ctx: ToolContext,
): Promise<Result<TechStack>> {
  const root = input.repoPath;
  if (!(await isDirectory(root))) {
    return Failure(`Repository not found: ${root}`);
  }

  const signals = loadSignals();
  const present = (name: string): boolean => existsSync(path.join(root, name));

  try {
    const stack: TechStack = {
      languages: await detectLanguages(root, signals),
      frameworks: [
        ...(await detectNodeFrameworks(root, signals, ctx.logger)),
        ...(await detectPythonFrameworks(root, signals)),
      ],
      buildTools: Object.entries(signals.buildTools)
        .filter(([, file]) => present(file))
        .map(([name]) => name),
      ciCd: signals.ciFiles.filter(present),
      containerization: signals.containerFiles.filter(present),
      manifestFiles: signals.manifestFiles.filter(present),
    };

    ctx.logger.debug({ repoPath: root, stack }, 'Detected tech stack');
    return Success(stack);
  } catch (error) {
    return Failure(`Failed to inspect ${root}: ${extractErrorMessage(error)}`);
  }
}

export default tool({
  name: 'detect-tech-stack',
  description: 'Detect languages, frameworks, build tools, CI and container files in a repository',
  schema: detectTechStackSchema,
  handler: handleDetectTechStack,
});
