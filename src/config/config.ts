/**
 * Environment-backed configuration
 *
 * Read on demand rather than at import time so commands and tests see the
 * environment as it is when they run.
 */

import { autoDetectDockerSocket } from '@/infra/docker/socket-validation';
import {
  parseBoolEnv,
  parseIntEnv,
  parseOptionalEnv,
  parsePositiveIntEnv,
  parseStringEnv,
} from './env-utils';
import {
  DEFAULT_BACKEND_URL,
  DEFAULT_CDK_DIR,
  DEFAULT_MODEL_ID,
  DEFAULT_PARAMETER_PREFIX,
  DEFAULT_REGION,
  DEFAULT_TIMEOUTS,
} from './constants';

export interface EnvironmentConfig {
  aws: {
    region: string;
    profile: string | undefined;
  };
  analyzer: {
    defaultModelId: string;
    backendUrl: string;
  };
  project: {
    root: string;
    cdkDir: string;
    parameterPrefix: string;
  };
  docker: {
    socketPath: string;
    timeout: number;
  };
  deploy: {
    waitTimeoutSeconds: number;
  };
  logging: {
    level: string;
    quiet: boolean;
  };
}

export function loadEnvironmentConfig(): EnvironmentConfig {
  return {
    aws: {
      region: parseStringEnv('AWS_REGION', DEFAULT_REGION),
      profile: parseOptionalEnv('AWS_PROFILE'),
    },
    analyzer: {
      defaultModelId: parseStringEnv('DEFAULT_MODEL_ID', DEFAULT_MODEL_ID),
      backendUrl: parseStringEnv('BACKEND_URL', DEFAULT_BACKEND_URL),
    },
    project: {
      root: parseStringEnv('MODERNIZER_PROJECT_ROOT', process.cwd()),
      cdkDir: parseStringEnv('MODERNIZER_CDK_DIR', DEFAULT_CDK_DIR),
      parameterPrefix: parseStringEnv('MODERNIZER_PARAMETER_PREFIX', DEFAULT_PARAMETER_PREFIX),
    },
    docker: {
      socketPath: parseStringEnv('DOCKER_SOCKET', autoDetectDockerSocket()),
      timeout: parseIntEnv('DOCKER_TIMEOUT', DEFAULT_TIMEOUTS.docker),
    },
    deploy: {
      waitTimeoutSeconds: parsePositiveIntEnv(
        'MODERNIZER_WAIT_TIMEOUT_SECONDS',
        DEFAULT_TIMEOUTS.serviceStableSeconds,
      ),
    },
    logging: {
      level: parseStringEnv(
        'LOG_LEVEL',
        process.env.NODE_ENV === 'development' ? 'debug' : 'info',
      ),
      quiet: parseBoolEnv('MODERNIZER_QUIET', false),
    },
  };
}
