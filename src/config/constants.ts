/**
 * Application constants and defaults
 *
 * Names here must stay in step with the infrastructure stacks: the stacks
 * publish the parameters and log groups, this toolkit reads them.
 */

import { z } from 'zod';

/**
 * Deployable services of the analyzer
 */
export const COMPONENTS = ['frontend', 'backend'] as const;
export type Component = (typeof COMPONENTS)[number];

/**
 * Accepted values for commands that act on one or both services
 */
export const componentSelectionSchema = z
  .enum(['frontend', 'backend', 'all'])
  .describe('Service(s) to act on');
export type ComponentSelection = z.infer<typeof componentSelectionSchema>;

/**
 * Parameter store layout written by the infrastructure stacks
 */
export const DEFAULT_PARAMETER_PREFIX = '/modernizer';

export const PARAMETER_KEYS = {
  frontendRepository: 'frontend-ecr-uri',
  backendRepository: 'backend-ecr-uri',
  cluster: 'cluster-name',
  frontendService: 'frontend-service',
  backendService: 'backend-service',
} as const;

export type ParameterKey = keyof typeof PARAMETER_KEYS;

/**
 * Full parameter name for a key, e.g. `/modernizer/cluster-name`
 */
export function parameterName(key: ParameterKey, prefix = DEFAULT_PARAMETER_PREFIX): string {
  return `${prefix}/${PARAMETER_KEYS[key]}`;
}

/**
 * Image build settings
 */
export const IMAGE_PLATFORM = 'linux/amd64';
export const IMAGE_TAG = 'latest';

export const LOCAL_IMAGE_NAMES: Record<Component, string> = {
  frontend: 'modernizer-frontend',
  backend: 'modernizer-backend',
};

export const LOG_GROUPS: Record<Component, string> = {
  frontend: '/ecs/modernizer-frontend',
  backend: '/ecs/modernizer-backend',
};

/** Stack holding only the image repositories (deployed before the first push) */
export const ECR_STACK_NAME = 'ModernizerEcr';

export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_BACKEND_URL = 'http://localhost:8000';
export const DEFAULT_CDK_DIR = 'cdk';

/**
 * Default timeout values
 */
export const DEFAULT_TIMEOUTS = {
  docker: 60000, // 1 minute
  healthCheck: 3000, // 3 seconds
  serviceStableSeconds: 600, // 40 polls of 15 seconds, same as `aws ecs wait services-stable`
  logPoll: 2000, // 2 seconds between log polls while following
  modelCatalog: 5000, // 5 seconds
} as const;

export const LOG_TAIL_DEFAULTS = {
  sinceMinutes: 10,
  limit: 100,
} as const;

/**
 * Foundation models offered by the analyzer backend
 */
export interface ModelOption {
  id: string;
  label: string;
}

export const DEFAULT_MODEL_ID = 'anthropic.claude-3-5-sonnet-20241022-v2:0';

export const MODEL_CATALOG: readonly ModelOption[] = [
  { id: 'anthropic.claude-3-5-sonnet-20241022-v2:0', label: 'Claude 3.5 Sonnet (recommended)' },
  { id: 'anthropic.claude-3-5-haiku-20241022-v1:0', label: 'Claude 3.5 Haiku (faster / cheaper)' },
  { id: 'anthropic.claude-3-opus-20240229-v1:0', label: 'Claude 3 Opus (most capable)' },
];

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
