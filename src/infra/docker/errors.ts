/**
 * Docker error classification built on dockerode's error shape
 */

import type { ErrorGuidance } from '@/types';
import { extractErrorMessage } from '@/lib/errors';
import {
  codePattern,
  createErrorGuidanceBuilder,
  customPattern,
  messagePattern,
  type ErrorPattern,
} from '@/lib/error-guidance';

/**
 * HTTP status carried by dockerode errors (`statusCode`) or by a wrapped response
 */
function statusCodeOf(error: unknown): number | undefined {
  if (!(error instanceof Error)) return undefined;
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Daemon-reported message: dockerode puts the daemon's JSON body in `json`
 */
export function daemonMessage(error: unknown): string | undefined {
  if (!(error instanceof Error) || !('json' in error)) return undefined;
  const json = error.json;
  if (json && typeof json === 'object' && 'message' in json && typeof json.message === 'string') {
    return json.message;
  }
  return undefined;
}

function buildDetails(error: unknown): Record<string, unknown> {
  const details: Record<string, unknown> = {};
  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined) details.statusCode = statusCode;
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    details.code = error.code;
  }
  if (error instanceof Error && 'reason' in error && typeof error.reason === 'string') {
    details.reason = error.reason;
  }
  return details;
}

const statusPattern = (status: number, guidance: Omit<ErrorGuidance, 'details'>): ErrorPattern =>
  customPattern(
    (error) => statusCodeOf(error) === status,
    (error) => ({ ...guidance, details: buildDetails(error) }),
  );

const dockerErrorPatterns: ErrorPattern[] = [
  codePattern('ECONNREFUSED', (error) => ({
    message: 'Docker daemon is not available',
    hint: 'Connection to the Docker daemon was refused',
    resolution: 'Start Docker and check that `docker ps` succeeds.',
    details: buildDetails(error),
  })),

  codePattern('ENOENT', (error) => ({
    message: 'Docker daemon is not running',
    hint: 'The Docker socket does not exist',
    resolution: 'Start Docker, or pass --docker-socket with the path of a running daemon.',
    details: buildDetails(error),
  })),

  codePattern('ENOTFOUND', (error) => ({
    message: 'Cannot resolve the registry hostname',
    hint: 'DNS lookup for the registry failed',
    resolution: 'Check network connectivity and that the repository URI in the parameter store is correct.',
    details: buildDetails(error),
  })),

  statusPattern(401, {
    message: 'Registry authentication failed',
    hint: 'The registry rejected the login token',
    resolution: 'Registry tokens expire after 12 hours; rerun the command to log in again.',
  }),

  statusPattern(403, {
    message: 'Access denied to the image repository',
    hint: 'The AWS identity lacks push permission on this repository',
    resolution: 'Grant ecr:InitiateLayerUpload, ecr:UploadLayerPart, ecr:CompleteLayerUpload and ecr:PutImage.',
  }),

  statusPattern(404, {
    message: 'Image not found',
    hint: 'The image or tag does not exist locally',
    resolution: 'Build the image first: `modernizer-ops build <component>`.',
  }),

  customPattern(
    (error) => {
      const status = statusCodeOf(error);
      return status !== undefined && status >= 500;
    },
    (error) => ({
      message: daemonMessage(error) ?? 'Docker daemon error',
      hint: `Docker returned HTTP ${statusCodeOf(error) ?? 'unknown'}`,
      resolution: 'Check the Docker daemon logs.',
      details: buildDetails(error),
    }),
  ),

  messagePattern('no basic auth credentials', {
    message: 'Push attempted without registry credentials',
    hint: 'The registry login step did not produce credentials',
    resolution: 'Check that the AWS identity can call ecr:GetAuthorizationToken.',
  }),

  customPattern(
    (error) =>
      /dockerfile parse error|unknown instruction|cannot locate specified dockerfile/i.test(
        extractErrorMessage(error),
      ),
    (error) => ({
      message: extractErrorMessage(error),
      hint: 'The Dockerfile in the build context is missing or invalid',
      resolution: 'Check the Dockerfile in the component directory.',
    }),
  ),
];

function defaultDockerGuidance(error: unknown): ErrorGuidance {
  const message = daemonMessage(error) ?? extractErrorMessage(error);
  return {
    message: message || 'Docker operation failed',
    hint: 'An error occurred during the Docker operation',
    resolution: 'Check Docker daemon status and logs for more information.',
    details: buildDetails(error),
  };
}

const extractGuidance = createErrorGuidanceBuilder(dockerErrorPatterns, defaultDockerGuidance);

/**
 * Extract actionable guidance from a dockerode or build/push stream error
 */
export function extractDockerErrorGuidance(error: unknown): ErrorGuidance {
  return extractGuidance(error);
}
