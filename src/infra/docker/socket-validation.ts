/**
 * Docker socket auto-detection
 */

import { existsSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

const DEFAULT_UNIX_SOCKET = '/var/run/docker.sock';
const WINDOWS_PIPE = '//./pipe/docker_engine';

/**
 * Candidate sockets in order of preference: the standard path, then Colima's
 */
function candidateSockets(): string[] {
  const home = homedir();
  return [
    DEFAULT_UNIX_SOCKET,
    join(home, '.colima/default/docker.sock'),
    join(home, '.colima/docker/docker.sock'),
    join(home, '.docker/run/docker.sock'),
  ];
}

function isSocket(socketPath: string): boolean {
  try {
    return existsSync(socketPath) && statSync(socketPath).isSocket();
  } catch {
    return false;
  }
}

/**
 * Pick the first live Docker socket, falling back to the standard path
 */
export function autoDetectDockerSocket(): string {
  if (process.platform === 'win32') {
    return WINDOWS_PIPE;
  }
  return candidateSockets().find(isSocket) ?? DEFAULT_UNIX_SOCKET;
}
