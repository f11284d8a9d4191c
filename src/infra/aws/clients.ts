/**
 * AWS SDK client factory
 *
 * Every client shares one region and, when set, one named profile.
 */

import { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import { ECRClient } from '@aws-sdk/client-ecr';
import { ECSClient } from '@aws-sdk/client-ecs';
import { SSMClient } from '@aws-sdk/client-ssm';
import { STSClient } from '@aws-sdk/client-sts';

export interface AwsClientConfig {
  region: string;
  profile?: string;
}

export interface AwsClients {
  ssm: SSMClient;
  sts: STSClient;
  ecr: ECRClient;
  ecs: ECSClient;
  logs: CloudWatchLogsClient;
}

export function createAwsClients(config: AwsClientConfig): AwsClients {
  const clientConfig = {
    region: config.region,
    ...(config.profile ? { profile: config.profile } : {}),
  };

  return {
    ssm: new SSMClient(clientConfig),
    sts: new STSClient(clientConfig),
    ecr: new ECRClient(clientConfig),
    ecs: new ECSClient(clientConfig),
    logs: new CloudWatchLogsClient(clientConfig),
  };
}
