/**
 * Runtime configuration: environment values merged with CLI flags
 */

import path from 'node:path';
import { z } from 'zod';
import { Failure, Success, type Result } from '@/types';
import { loadEnvironmentConfig, type EnvironmentConfig } from './config';
import { LOG_LEVELS } from './constants';

export const runtimeConfigSchema = z.object({
  region: z.string().min(1, 'region must not be empty'),
  profile: z.string().min(1).optional(),
  projectRoot: z.string().min(1),
  cdkDir: z.string().min(1),
  parameterPrefix: z
    .string()
    .regex(/^\/\S*[^/\s]$/, 'parameter prefix must start with "/" and must not end with "/"'),
  dockerSocket: z.string(),
  dockerTimeout: z.number().int().positive(),
  waitTimeoutSeconds: z.number().int().positive(),
  backendUrl: z.string().url(),
  defaultModelId: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
  quiet: z.boolean(),
});

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

/**
 * Global CLI flags; each one wins over its environment variable
 */
export interface CliOverrides {
  region?: string;
  profile?: string;
  projectRoot?: string;
  logLevel?: string;
  dockerSocket?: string;
  quiet?: boolean;
}

/**
 * Merge CLI flags over the environment and validate the outcome
 */
export function resolveRuntimeConfig(
  overrides: CliOverrides,
  env: EnvironmentConfig = loadEnvironmentConfig(),
): Result<RuntimeConfig> {
  const candidate = {
    region: overrides.region ?? env.aws.region,
    profile: overrides.profile ?? env.aws.profile,
    projectRoot: path.resolve(overrides.projectRoot ?? env.project.root),
    cdkDir: env.project.cdkDir,
    parameterPrefix: env.project.parameterPrefix,
    dockerSocket: overrides.dockerSocket || env.docker.socketPath,
    dockerTimeout: env.docker.timeout,
    waitTimeoutSeconds: env.deploy.waitTimeoutSeconds,
    backendUrl: env.analyzer.backendUrl,
    defaultModelId: env.analyzer.defaultModelId,
    logLevel: overrides.logLevel ?? env.logging.level,
    quiet: overrides.quiet ?? env.logging.quiet,
  };

  const parsed = runtimeConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return Failure(`Invalid configuration: ${issues}`, {
      message: `Invalid configuration: ${issues}`,
      hint: 'A CLI flag or environment variable has an unusable value',
      resolution: `Valid log levels: ${LOG_LEVELS.join(', ')}. Run with --help for the flag list.`,
    });
  }

  return Success(parsed.data);
}
