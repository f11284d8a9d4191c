/**
 * Unit tests for Docker socket auto-detection
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { autoDetectDockerSocket } from '@/infra/docker/socket-validation';

describe('autoDetectDockerSocket', () => {
  let originalPlatform: NodeJS.Platform;

  beforeEach(() => {
    originalPlatform = process.platform;
  });

  afterEach(() => {
    Object.defineProperty(process, 'platform', {
      value: originalPlatform,
      writable: true,
      configurable: true,
    });
  });

  it('should return the named pipe on Windows', () => {
    Object.defineProperty(process, 'platform', {
      value: 'win32',
      writable: true,
      configurable: true,
    });

    expect(autoDetectDockerSocket()).toBe('//./pipe/docker_engine');
  });

  it('should return a unix socket path elsewhere', () => {
    Object.defineProperty(process, 'platform', {
      value: 'linux',
      writable: true,
      configurable: true,
    });

    const socket = autoDetectDockerSocket();
    expect(socket.endsWith('docker.sock')).toBe(true);
  });
});
