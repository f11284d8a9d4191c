import { GetCallerIdentityCommand, type STSClient } from '@aws-sdk/client-sts';
import type { Logger } from 'pino';
import { Failure, Success, type Result } from '@/types';
import { awsFailure } from './failure';

export interface Identity {
  getAccountId: () => Promise<Result<string>>;
}

/**
 * Caller identity lookup (STS GetCallerIdentity)
 */
export function createIdentity(client: STSClient, logger: Logger): Identity {
  return {
    async getAccountId(): Promise<Result<string>> {
      try {
        const response = await client.send(new GetCallerIdentityCommand({}));
        if (!response.Account) {
          return Failure('Caller identity returned no account id');
        }
        logger.debug({ account: response.Account }, 'Resolved AWS account');
        return Success(response.Account);
      } catch (error) {
        return awsFailure(logger, 'Failed to resolve AWS account', error);
      }
    },
  };
}
