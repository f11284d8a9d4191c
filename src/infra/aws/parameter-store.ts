/**
 * Parameter store lookups (SSM GetParameter)
 */

import { GetParameterCommand, type SSMClient } from '@aws-sdk/client-ssm';
import type { Logger } from 'pino';
import { Failure, Success, type Result } from '@/types';
import { ERROR_MESSAGES } from '@/lib/errors';
import { awsFailure } from './failure';

export interface ParameterStore {
  /** Value of a plain String parameter; missing or empty values fail */
  getParameter: (name: string) => Promise<Result<string>>;
}

export function createParameterStore(client: SSMClient, logger: Logger): ParameterStore {
  return {
    async getParameter(name: string): Promise<Result<string>> {
      try {
        const response = await client.send(new GetParameterCommand({ Name: name }));
        const value = response.Parameter?.Value;

        if (!value) {
          return Failure(ERROR_MESSAGES.PARAMETER_MISSING(name), {
            message: ERROR_MESSAGES.PARAMETER_MISSING(name),
            hint: 'The parameter exists but holds no value',
            resolution: 'Redeploy the stacks so they publish the value again.',
          });
        }

        logger.debug({ name }, 'Resolved parameter');
        return Success(value);
      } catch (error) {
        return awsFailure(logger, `Failed to read parameter ${name}`, error, { name });
      }
    },
  };
}
