/**
 * Shallow-clone a repository into a fresh temporary directory
 */

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Failure, Success, type Result, type ToolContext } from '@/types';
import { tool } from '@/types/tool';
import { extractErrorMessage } from '@/lib/errors';
import { runCommand, type CommandOutput } from '@/infra/process/run-command';
import {
  cloneRepositorySchema,
  type CloneRepositoryParams,
  type CloneRepositoryResult,
} from './schema';

export const CLONE_DIR_PREFIX = 'modernizer_repo_';

/**
 * `https://host/x.git` → `https://oauth2:<token>@host/x.git`
 */
export function injectToken(url: string, token: string): Result<string> {
  const separator = url.indexOf('://');
  if (separator === -1) {
    return Failure(`Cannot inject PAT into URL: ${url}`);
  }
  return Success(`${url.slice(0, separator)}://oauth2:${token}@${url.slice(separator + 3)}`);
}

/**
 * Git runs GIT_SSH_COMMAND through a shell, so the key path is single-quoted
 */
export function sshCommand(keyPath: string): string {
  const quoted = `'${keyPath.replace(/'/g, `'\\''`)}'`;
  return `ssh -i ${quoted} -o StrictHostKeyChecking=no -o UserKnownHostsFile=/dev/null`;
}

/**
 * Write the key to a private temp file; the returned cleanup removes it
 */
async function writeSshKey(
  privateKey: string,
): Promise<{ keyPath: string; remove: () => Promise<void> }> {
  const keyDir = await fs.mkdtemp(path.join(os.tmpdir(), 'modernizer_ssh_'));
  const keyPath = path.join(keyDir, 'id_key.pem');
  await fs.writeFile(keyPath, `${privateKey.trim()}\n`, { mode: 0o600 });
  return {
    keyPath,
    remove: () => fs.rm(keyDir, { recursive: true, force: true }),
  };
}

function redact(text: string, secret: string): string {
  return text.split(secret).join('***');
}

async function handleCloneRepository(
  input: CloneRepositoryParams,
  ctx: ToolContext,
): Promise<Result<CloneRepositoryResult>> {
  const run = ctx.runCommand ?? runCommand;
  const logger = ctx.logger.child({ tool: 'clone-repository' });
  const dest = await fs.mkdtemp(path.join(os.tmpdir(), CLONE_DIR_PREFIX));
  const removeDest = (): Promise<void> => fs.rm(dest, { recursive: true, force: true });

  let source = input.url;
  const env: Record<string, string> = {};
  let removeKey: (() => Promise<void>) | undefined;

  try {
    if (input.authType === 'pat') {
      const authed = injectToken(input.url, input.credential);
      if (!authed.ok) {
        await removeDest();
        return authed;
      }
      source = authed.value;
    } else {
      const key = await writeSshKey(input.credential);
      removeKey = key.remove;
      env.GIT_SSH_COMMAND = sshCommand(key.keyPath);
    }

    logger.info({ url: input.url, authType: input.authType, branch: input.branch }, 'Cloning repository');

    const clone = (extra: string[]): Promise<Result<CommandOutput>> =>
      run('git', ['clone', '--depth', '1', ...extra, source, dest], { env });

    let attempt = await clone(['--branch', input.branch]);
    if (attempt.ok && attempt.value.exitCode !== 0) {
      // the default branch may have another name
      logger.debug({ branch: input.branch }, 'Branch clone failed, retrying with the default branch');
      attempt = await clone([]);
    }

    if (!attempt.ok) {
      await removeDest();
      return attempt;
    }
    if (attempt.value.exitCode !== 0) {
      await removeDest();
      const stderr = redact(attempt.value.stderr.trim(), input.credential);
      return Failure(stderr || `git clone exited with code ${attempt.value.exitCode}`);
    }

    logger.info({ repoPath: dest }, 'Repository cloned');
    return Success({ repoPath: dest });
  } catch (error) {
    await removeDest();
    return Failure(redact(extractErrorMessage(error), input.credential));
  } finally {
    if (removeKey) await removeKey();
  }
}

export default tool({
  name: 'clone-repository',
  description: 'Clone a repository (shallow) into a temporary directory using a token or SSH key',
  schema: cloneRepositorySchema,
  handler: handleCloneRepository,
});
