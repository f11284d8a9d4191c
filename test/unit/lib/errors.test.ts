import { runInNewContext } from 'node:vm';
import { describe, it, expect } from '@jest/globals';
import { ERROR_MESSAGES, extractErrorMessage } from '@/lib/errors';
import { Failure, Success } from '@/types';

describe('ERROR_MESSAGES', () => {
  it('should name the missing parameter', () => {
    expect(ERROR_MESSAGES.PARAMETER_MISSING('/modernizer/cluster-name')).toBe(
      'Parameter /modernizer/cluster-name is missing or empty',
    );
  });

  it('should list the accepted components', () => {
    expect(ERROR_MESSAGES.UNKNOWN_COMPONENT('db', ['frontend', 'backend', 'all'])).toBe(
      'Unknown component: db. Expected one of: frontend, backend, all',
    );
  });

  it('should include the exit code of a failed command', () => {
    expect(ERROR_MESSAGES.COMMAND_FAILED('cdk deploy', 2)).toBe('cdk deploy exited with code 2');
    expect(ERROR_MESSAGES.COMMAND_FAILED('cdk deploy', null)).toBe(
      'cdk deploy exited with code unknown',
    );
  });
});

describe('extractErrorMessage', () => {
  it('should read Error messages and stringify anything else', () => {
    expect(extractErrorMessage(new Error('boom'))).toBe('boom');
    expect(extractErrorMessage('plain')).toBe('plain');
    expect(extractErrorMessage(42)).toBe('42');
  });

  it('should read errors created in another realm', () => {
    const foreign: unknown = runInNewContext("new Error('ENOENT: no such file or directory')");

    expect(foreign instanceof Error).toBe(false);
    expect(extractErrorMessage(foreign)).toBe('ENOENT: no such file or directory');
  });
});

describe('Result helpers', () => {
  it('should build success and failure values', () => {
    expect(Success(3)).toEqual({ ok: true, value: 3 });
    expect(Failure('nope')).toEqual({ ok: false, error: 'nope' });
  });

  it('should fill an empty guidance message from the error', () => {
    expect(Failure('nope', { message: '', hint: 'h' })).toEqual({
      ok: false,
      error: 'nope',
      guidance: { message: 'nope', hint: 'h' },
    });
  });
});
