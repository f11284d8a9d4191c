/**
 * Centralized error formatting for CLI commands
 * Ensures consistent error messages and exit behavior
 */

import type { ErrorGuidance, Result } from '@/types/core';

/**
 * Standard error formatting for CLI commands
 */
export function formatError(message: string, error?: unknown): string {
  const baseMessage = `❌ ${message}`;

  if (!error) {
    return baseMessage;
  }

  if (typeof error === 'string') {
    return `${baseMessage}: ${error}`;
  }

  if (error instanceof Error) {
    return `${baseMessage}: ${error.message}`;
  }

  return `${baseMessage}: ${String(error)}`;
}

/**
 * Hint and resolution lines shown under an error
 */
export function formatGuidance(guidance: ErrorGuidance | undefined): string[] {
  const lines: string[] = [];
  if (guidance?.hint) lines.push(`   ${guidance.hint}`);
  if (guidance?.resolution) lines.push(`   💡 ${guidance.resolution}`);
  return lines;
}

/**
 * Handle Result errors consistently across CLI commands
 */
export function handleResultError<T>(result: Result<T>, message: string): never {
  if (result.ok) {
    throw new Error('Called handleResultError on successful result');
  }

  console.error(formatError(message, result.error));
  for (const line of formatGuidance(result.guidance)) {
    console.error(line);
  }
  process.exit(1);
}

/**
 * Handle generic errors consistently across CLI commands
 */
export function handleGenericError(message: string, error?: unknown): never {
  console.error(formatError(message, error));
  process.exit(1);
}

/**
 * Print a usage line and exit non-zero
 */
export function handleUsageError(usage: string, error?: string): never {
  if (error) {
    console.error(formatError(error));
  }
  console.error(`Usage: ${usage}`);
  process.exit(1);
}
