/**
 * AWS SDK error handling with actionable guidance
 *
 * SDK v3 service exceptions carry their type in `name`; credential and
 * network failures surface as provider errors or Node.js system codes.
 */

import type { ErrorGuidance } from '@/types';
import { extractErrorMessage } from '@/lib/errors';
import {
  codePattern,
  createErrorGuidanceBuilder,
  customPattern,
  namePattern,
  type ErrorPattern,
} from '@/lib/error-guidance';

function sdkDetails(error: unknown): Record<string, unknown> {
  const details: Record<string, unknown> = {};
  if (error instanceof Error) {
    details.name = error.name;
    if ('$metadata' in error && error.$metadata && typeof error.$metadata === 'object') {
      const metadata = error.$metadata;
      if ('httpStatusCode' in metadata) details.httpStatusCode = metadata.httpStatusCode;
      if ('requestId' in metadata) details.requestId = metadata.requestId;
    }
  }
  return details;
}

const withDetails =
  (guidance: Omit<ErrorGuidance, 'details'>) =>
  (error: unknown): ErrorGuidance => ({ ...guidance, details: sdkDetails(error) });

const anyName = (names: string[], guidance: Omit<ErrorGuidance, 'details'>): ErrorPattern =>
  customPattern(
    (error) => error instanceof Error && names.includes(error.name),
    withDetails(guidance),
  );

const awsErrorPatterns: ErrorPattern[] = [
  anyName(['CredentialsProviderError', 'CredentialsError'], {
    message: 'AWS credentials not found',
    hint: 'No credentials could be loaded from the environment, profile or instance metadata',
    resolution: 'Run `aws configure`, set AWS_PROFILE, or pass --profile.',
  }),

  anyName(['ExpiredToken', 'ExpiredTokenException', 'TokenRefreshRequired'], {
    message: 'AWS session has expired',
    hint: 'The temporary credentials for this profile are no longer valid',
    resolution: 'Refresh the session, e.g. `aws sso login --profile <name>`.',
  }),

  anyName(['AccessDenied', 'AccessDeniedException', 'UnauthorizedOperation'], {
    message: 'Access denied by AWS',
    hint: 'The current identity lacks permission for this call',
    resolution: 'Check the IAM policy attached to the identity shown by `aws sts get-caller-identity`.',
  }),

  anyName(['UnrecognizedClientException', 'InvalidClientTokenId', 'InvalidSignatureException'], {
    message: 'AWS rejected the credentials',
    hint: 'The access key is unknown or the secret does not match',
    resolution: 'Check the credentials for the selected profile.',
  }),

  namePattern(
    'ParameterNotFound',
    withDetails({
      message: 'Deployment parameter not found',
      hint: 'The infrastructure stacks publish these parameters when they deploy',
      resolution: 'Deploy the stacks first (`modernizer-ops deploy`) and check --region.',
    }),
  ),

  namePattern(
    'ClusterNotFoundException',
    withDetails({
      message: 'ECS cluster not found',
      hint: 'The cluster named in the parameter store does not exist in this region',
      resolution: 'Check --region and redeploy the stacks if the cluster was deleted.',
    }),
  ),

  anyName(['ServiceNotFoundException', 'ServiceNotActiveException'], {
    message: 'ECS service not found or inactive',
    hint: 'The service named in the parameter store is missing from the cluster',
    resolution: 'Redeploy the stacks with `modernizer-ops deploy`.',
  }),

  namePattern(
    'ResourceNotFoundException',
    withDetails({
      message: 'AWS resource not found',
      hint: 'The log group or resource does not exist yet',
      resolution: 'Log groups appear after the service has been deployed once.',
    }),
  ),

  namePattern(
    'TimeoutError',
    withDetails({
      message: 'Timed out waiting for the service to stabilize',
      hint: 'The new tasks did not reach a steady state in time',
      resolution:
        'Check the service events in the ECS console and raise MODERNIZER_WAIT_TIMEOUT_SECONDS if deployments are slow.',
    }),
  ),

  anyName(['ThrottlingException', 'TooManyRequestsException', 'Throttling'], {
    message: 'AWS request throttled',
    hint: 'Too many requests were sent in a short period',
    resolution: 'Wait a moment and run the command again.',
  }),

  codePattern('ENOTFOUND', (error) => ({
    message: 'Cannot reach the AWS endpoint',
    hint: 'DNS lookup for the service endpoint failed',
    resolution: 'Check network connectivity and the --region value.',
    details: sdkDetails(error),
  })),
];

function defaultAwsGuidance(error: unknown): ErrorGuidance {
  return {
    message: extractErrorMessage(error) || 'AWS request failed',
    hint: 'An AWS API call failed',
    resolution: 'Re-run with --log-level debug for request details.',
    details: sdkDetails(error),
  };
}

const extractGuidance = createErrorGuidanceBuilder(awsErrorPatterns, defaultAwsGuidance);

export function extractAwsErrorGuidance(error: unknown): ErrorGuidance {
  return extractGuidance(error);
}
