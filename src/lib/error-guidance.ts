/**
 * Error guidance pattern matching shared by the Docker and AWS error classifiers
 */

import type { ErrorGuidance } from '@/types';
import { extractErrorMessage } from './errors';

/**
 * Pattern definition for matching errors and generating guidance
 */
export interface ErrorPattern {
  match: (error: unknown) => boolean;
  guidance: (error: unknown) => ErrorGuidance;
}

/**
 * Create a guidance extractor that tries each pattern in order
 *
 * @example
 * ```typescript
 * const extractGuidance = createErrorGuidanceBuilder([
 *   namePattern('ParameterNotFound', {
 *     message: 'Parameter not found',
 *     resolution: 'Deploy the infrastructure stacks first',
 *   }),
 * ], (error) => ({ message: extractErrorMessage(error) }));
 * const guidance = extractGuidance(error);
 * ```
 */
export function createErrorGuidanceBuilder(
  patterns: ErrorPattern[],
  defaultGuidance: (error: unknown) => ErrorGuidance,
) {
  return function extractGuidance(error: unknown): ErrorGuidance {
    for (const pattern of patterns) {
      if (pattern.match(error)) {
        return pattern.guidance(error);
      }
    }

    return defaultGuidance(error);
  };
}

/**
 * Match a case-insensitive substring of the error message
 */
export function messagePattern(substring: string, guidance: ErrorGuidance): ErrorPattern {
  return {
    match: (error: unknown) => {
      const message = extractErrorMessage(error).toLowerCase();
      return message.includes(substring.toLowerCase());
    },
    guidance: () => guidance,
  };
}

/**
 * Match on the `name` of an Error (SDK service exceptions carry their type there)
 */
export function namePattern(
  name: string,
  guidance: ErrorGuidance | ((error: unknown) => ErrorGuidance),
): ErrorPattern {
  return customPattern((error) => error instanceof Error && error.name === name, guidance);
}

/**
 * Match on a Node.js system error code such as ECONNREFUSED
 */
export function codePattern(
  code: string,
  guidance: ErrorGuidance | ((error: unknown) => ErrorGuidance),
): ErrorPattern {
  return customPattern(
    (error) => error instanceof Error && 'code' in error && error.code === code,
    guidance,
  );
}

/**
 * Create pattern with custom match function
 */
export function customPattern(
  matchFn: (error: unknown) => boolean,
  guidance: ErrorGuidance | ((error: unknown) => ErrorGuidance),
): ErrorPattern {
  return {
    match: matchFn,
    guidance: typeof guidance === 'function' ? guidance : () => guidance,
  };
}
