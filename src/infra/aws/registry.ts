/**
 * Container registry login (ECR GetAuthorizationToken)
 */

import { GetAuthorizationTokenCommand, type ECRClient } from '@aws-sdk/client-ecr';
import type { Logger } from 'pino';
import { Failure, Success, type Result } from '@/types';
import type { RegistryAuth } from '@/infra/docker/client';
import { awsFailure } from './failure';

/**
 * Registry hostname for an account and region
 */
export function registryHost(account: string, region: string): string {
  return `${account}.dkr.ecr.${region}.amazonaws.com`;
}

export interface Registry {
  /** Short-lived push credentials for `serverAddress` */
  getLoginCredentials: (serverAddress: string) => Promise<Result<RegistryAuth>>;
}

/**
 * Split a base64 `user:password` authorization token
 */
export function decodeAuthorizationToken(
  token: string,
): { username: string; password: string } | undefined {
  const decoded = Buffer.from(token, 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator <= 0) {
    return undefined;
  }
  return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

export function createRegistry(client: ECRClient, logger: Logger): Registry {
  return {
    async getLoginCredentials(serverAddress: string): Promise<Result<RegistryAuth>> {
      let token: string | undefined;
      try {
        const response = await client.send(new GetAuthorizationTokenCommand({}));
        token = response.authorizationData?.[0]?.authorizationToken;
      } catch (error) {
        return awsFailure(logger, 'Failed to log in to the registry', error, { serverAddress });
      }

      const credentials = token ? decodeAuthorizationToken(token) : undefined;
      if (!credentials) {
        return Failure('Registry returned no usable authorization token');
      }

      // credentials stay out of the log
      logger.debug({ serverAddress }, 'Obtained registry credentials');
      return Success({ ...credentials, serveraddress: serverAddress });
    },
  };
}
