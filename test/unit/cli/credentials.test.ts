import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import path from 'node:path';
import { resolveGitCredential } from '@/cli/commands/credentials';
import { createTestTempDir, writeTree } from '../../__support__/utilities/tmp-helpers';

describe('resolveGitCredential', () => {
  const originalToken = process.env.MODERNIZER_GIT_TOKEN;

  beforeEach(() => {
    delete process.env.MODERNIZER_GIT_TOKEN;
  });

  afterEach(() => {
    if (originalToken === undefined) {
      delete process.env.MODERNIZER_GIT_TOKEN;
    } else {
      process.env.MODERNIZER_GIT_TOKEN = originalToken;
    }
  });

  it('should prefer an explicit token', () => {
    process.env.MODERNIZER_GIT_TOKEN = 'env-secret';

    expect(resolveGitCredential({ token: 'test-secret', sshKeyFile: '/missing' })).toEqual({
      ok: true,
      value: { authType: 'pat', credential: 'test-secret' },
    });
  });

  it('should read an SSH key file', async () => {
    const { dir, cleanup } = createTestTempDir('key-');
    writeTree(dir.name, { id_test: 'test-key\n' });

    expect(resolveGitCredential({ sshKeyFile: path.join(dir.name, 'id_test') })).toEqual({
      ok: true,
      value: { authType: 'ssh', credential: 'test-key\n' },
    });
    await cleanup();
  });

  it('should fail on an unreadable key file', () => {
    const result = resolveGitCredential({ sshKeyFile: '/nonexistent/id_test' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.startsWith('Cannot read SSH key /nonexistent/id_test: ENOENT')).toBe(true);
  });

  it('should fall back to MODERNIZER_GIT_TOKEN', () => {
    process.env.MODERNIZER_GIT_TOKEN = 'env-secret';

    expect(resolveGitCredential({})).toEqual({
      ok: true,
      value: { authType: 'pat', credential: 'env-secret' },
    });
  });

  it('should fail without any credential', () => {
    expect(resolveGitCredential({})).toEqual({
      ok: false,
      error: 'No repository credential given',
      guidance: {
        message: 'No repository credential given',
        resolution: 'Pass --token, --ssh-key-file, or set MODERNIZER_GIT_TOKEN.',
      },
    });
  });
});
