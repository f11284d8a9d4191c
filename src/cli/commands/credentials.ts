import { readFileSync } from 'node:fs';
import { Failure, Success, type Result } from '@/types';
import { parseOptionalEnv } from '@/config/env-utils';
import { extractErrorMessage } from '@/lib/errors';

export interface CredentialOptions {
  token?: string;
  sshKeyFile?: string;
}

export interface GitCredential {
  authType: 'pat' | 'ssh';
  credential: string;
}

/**
 * `--token`, then `--ssh-key-file`, then MODERNIZER_GIT_TOKEN
 */
export function resolveGitCredential(options: CredentialOptions): Result<GitCredential> {
  if (options.token) {
    return Success({ authType: 'pat', credential: options.token });
  }

  if (options.sshKeyFile) {
    try {
      return Success({ authType: 'ssh', credential: readFileSync(options.sshKeyFile, 'utf8') });
    } catch (error) {
      return Failure(`Cannot read SSH key ${options.sshKeyFile}: ${extractErrorMessage(error)}`);
    }
  }

  const envToken = parseOptionalEnv('MODERNIZER_GIT_TOKEN');
  if (envToken) {
    return Success({ authType: 'pat', credential: envToken });
  }

  return Failure('No repository credential given', {
    message: 'No repository credential given',
    resolution: 'Pass --token, --ssh-key-file, or set MODERNIZER_GIT_TOKEN.',
  });
}
