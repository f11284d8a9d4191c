import type { Logger } from 'pino';
import { Failure, type Result } from '@/types';
import { extractErrorMessage } from '@/lib/errors';
import { extractAwsErrorGuidance } from './errors';

/**
 * Log an SDK error with its guidance and turn it into a failed Result
 *
 * The SDK's own message is kept in the error text so the operator sees
 * exactly what AWS reported.
 */
export function awsFailure<T>(
  logger: Logger,
  operation: string,
  error: unknown,
  context: Record<string, unknown> = {},
): Result<T> {
  const guidance = extractAwsErrorGuidance(error);
  const errorMessage = `${operation}: ${extractErrorMessage(error) || guidance.message}`;

  logger.error(
    {
      error: errorMessage,
      hint: guidance.hint,
      resolution: guidance.resolution,
      errorDetails: guidance.details,
      ...context,
    },
    operation,
  );

  return Failure(errorMessage, guidance);
}
