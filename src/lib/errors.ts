/**
 * Error handling utilities and message templates
 */

import { types } from 'node:util';

/**
 * Centralized error message templates
 */
export const ERROR_MESSAGES = {
  PARAMETER_MISSING: (name: string) => `Parameter ${name} is missing or empty`,
  UNKNOWN_COMPONENT: (value: string, allowed: readonly string[]) =>
    `Unknown component: ${value}. Expected one of: ${allowed.join(', ')}`,
  COMMAND_FAILED: (command: string, exitCode: number | null) =>
    `${command} exited with code ${exitCode ?? 'unknown'}`,
} as const;

/**
 * Safely extracts error message from unknown error types.
 * Invariant: Always returns a string message
 */
export function extractErrorMessage(error: unknown): string {
  // isNativeError also recognises errors created in another realm (vm contexts, Jest sandboxes)
  if (types.isNativeError(error) || error instanceof Error) {
    return error.message;
  }
  return String(error);
}
