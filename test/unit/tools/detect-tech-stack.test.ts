import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import detectTechStackTool from '@/tools/detect-tech-stack/tool';
import { createTestTempDir, writeTree } from '../../__support__/utilities/tmp-helpers';
import { createTestLogger } from '../../__support__/utilities/logger';

describe('detect-tech-stack', () => {
  const ctx = { logger: createTestLogger() };
  let repoPath: string;
  let cleanup: () => Promise<void>;

  beforeEach(() => {
    const temp = createTestTempDir('detect-');
    repoPath = temp.dir.name;
    cleanup = temp.cleanup;
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should detect a mixed Node and Python repository', async () => {
    writeTree(repoPath, {
      '.github/workflows/ci.yml': 'on: push\n',
      'Dockerfile': 'FROM python:3.12\n',
      'Makefile': 'all:\n',
      'app.py': 'print(1)\n',
      'k8s/deploy.yaml': 'kind: Deployment\n',
      'package-lock.json': '{}',
      'package.json': JSON.stringify({
        dependencies: { react: '^18.3.0' },
        devDependencies: { next: '^14.2.0' },
      }),
      'requirements-dev.txt': 'pytest\nFlask\n',
      'requirements.txt': 'Django==4.2\nfastapi\n',
      'web/index.tsx': 'export {};\n',
      'web/util.js': 'module.exports = {};\n',
    });

    const result = await detectTechStackTool.run({ repoPath }, ctx);

    expect(result).toEqual({
      ok: true,
      value: {
        languages: ['Python', 'JavaScript', 'TypeScript'],
        frameworks: ['React', 'Next', 'Flask', 'Django', 'Fastapi'],
        buildTools: ['Make', 'npm'],
        ciCd: ['.github/workflows'],
        containerization: ['Dockerfile', 'k8s'],
        manifestFiles: ['package.json', 'requirements.txt', 'requirements-dev.txt'],
      },
    });
  });

  it('should skip an unreadable package.json', async () => {
    writeTree(repoPath, { 'package.json': '{ not json', 'index.js': '' });

    const result = await detectTechStackTool.run({ repoPath }, ctx);

    expect(result).toMatchObject({
      ok: true,
      value: { languages: ['JavaScript'], frameworks: [], manifestFiles: ['package.json'] },
    });
  });

  it('should report an empty stack for an empty repository', async () => {
    expect(await detectTechStackTool.run({ repoPath }, ctx)).toEqual({
      ok: true,
      value: {
        languages: [],
        frameworks: [],
        buildTools: [],
        ciCd: [],
        containerization: [],
        manifestFiles: [],
      },
    });
  });

  it('should fail for a missing repository', async () => {
    const missing = `${repoPath}/absent`;

    expect(await detectTechStackTool.run({ repoPath: missing }, ctx)).toEqual({
      ok: false,
      error: `Repository not found: ${missing}`,
    });
  });
});
