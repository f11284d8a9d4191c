/**
 * Docker client for the image build, tag and push steps
 */

import Docker, { type DockerOptions } from 'dockerode';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '@/types';
import { extractErrorMessage } from '@/lib/errors';
import { daemonMessage, extractDockerErrorGuidance } from './errors';
import { autoDetectDockerSocket } from './socket-validation';

export interface DockerClientConfig {
  /** Docker socket path or tcp:// address (defaults to auto-detection with Colima support) */
  socketPath?: string;
}

export interface DockerBuildOptions {
  /** Build context directory */
  context: string;
  tag: string;
  /** Target platform, e.g. linux/amd64 */
  platform?: string;
  /** Dockerfile path relative to the context */
  dockerfile?: string;
}

export interface DockerBuildResult {
  imageId: string;
  tag: string;
  logs: string[];
}

export interface DockerPushResult {
  digest: string;
  size?: number;
}

/**
 * Credentials for a registry push, in the shape the daemon expects
 */
export interface RegistryAuth {
  username: string;
  password: string;
  serveraddress: string;
}

export interface DockerClient {
  buildImage: (options: DockerBuildOptions) => Promise<Result<DockerBuildResult>>;
  tagImage: (source: string, repository: string, tag: string) => Promise<Result<void>>;
  pushImage: (
    repository: string,
    tag: string,
    authConfig?: RegistryAuth,
  ) => Promise<Result<DockerPushResult>>;
  /** Daemon version; doubles as a reachability probe */
  version: () => Promise<Result<string>>;
}

interface ProgressEvent {
  stream?: string;
  status?: string;
  error?: string;
  errorDetail?: { message?: string };
  aux?: { ID?: string; Digest?: string; Size?: number };
}

/**
 * Follow a build or push stream to the end; the first error event fails it
 */
function followProgress(
  docker: Docker,
  stream: NodeJS.ReadableStream,
  onEvent: (event: ProgressEvent) => void,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    let streamError: Error | null = null;

    docker.modem.followProgress(
      stream,
      (err: Error | null) => {
        if (err) {
          reject(err);
        } else if (streamError) {
          reject(streamError);
        } else {
          resolve();
        }
      },
      (event: ProgressEvent) => {
        if ((event.error || event.errorDetail) && !streamError) {
          streamError = new Error(event.error || event.errorDetail?.message || 'Docker step failed');
        }
        onEvent(event);
      },
    );
  });
}

function createBaseDockerClient(docker: Docker, logger: Logger): DockerClient {
  const fail = <T>(
    operation: string,
    error: unknown,
    context: Record<string, unknown>,
  ): Result<T> => {
    const guidance = extractDockerErrorGuidance(error);
    const reported = daemonMessage(error) ?? extractErrorMessage(error);
    const errorMessage = `${operation}: ${reported || guidance.message}`;
    logger.error(
      {
        error: errorMessage,
        hint: guidance.hint,
        resolution: guidance.resolution,
        errorDetails: guidance.details,
        ...context,
      },
      `Docker ${operation.toLowerCase()}`,
    );
    return Failure(errorMessage, guidance);
  };

  const tagImage = async (source: string, repository: string, tag: string): Promise<Result<void>> => {
    try {
      await docker.getImage(source).tag({ repo: repository, tag });
      logger.info({ source, repository, tag }, 'Image tagged');
      return Success(undefined);
    } catch (error) {
      return fail('Failed to tag image', error, { source, repository, tag });
    }
  };

  return {
    async buildImage(options: DockerBuildOptions): Promise<Result<DockerBuildResult>> {
      const logs: string[] = [];
      let imageId = '';

      try {
        logger.debug(
          { context: options.context, tag: options.tag, platform: options.platform },
          'Starting Docker build',
        );

        // dockerode packs the context directory itself
        const stream = await docker.buildImage(
          { context: options.context, src: ['.'] },
          {
            t: options.tag,
            ...(options.dockerfile ? { dockerfile: options.dockerfile } : {}),
            ...(options.platform ? { platform: options.platform } : {}),
          },
        );

        await followProgress(docker, stream, (event) => {
          if (event.stream) {
            const line = event.stream.trimEnd();
            if (line) {
              logs.push(line);
              logger.debug({ line }, 'Docker build output');
            }
          }
          if (event.aux?.ID) {
            imageId = event.aux.ID;
          }
        });
      } catch (error) {
        return fail('Build failed', error, { context: options.context, tag: options.tag });
      }

      logger.info({ tag: options.tag, imageId }, 'Image built');
      return Success({ imageId, tag: options.tag, logs });
    },

    tagImage,

    async pushImage(
      repository: string,
      tag: string,
      authConfig?: RegistryAuth,
    ): Promise<Result<DockerPushResult>> {
      let digest = '';
      let size: number | undefined;

      try {
        const image = docker.getImage(`${repository}:${tag}`);
        // dockerode's Image.push takes the auth config inside the options object
        const stream = await image.push(authConfig ? { authconfig: authConfig } : {});

        await followProgress(docker, stream, (event) => {
          if (event.status) {
            logger.debug({ status: event.status }, 'Docker push progress');
          }
          if (event.aux?.Digest) digest = event.aux.Digest;
          if (event.aux?.Size) size = event.aux.Size;
        });

        if (!digest) {
          const inspect = await image.inspect();
          digest = inspect.RepoDigests?.[0]?.split('@')[1] ?? inspect.Id;
        }
      } catch (error) {
        return fail('Failed to push image', error, { repository, tag });
      }

      logger.info({ repository, tag, digest }, 'Image pushed');
      return Success(size === undefined ? { digest } : { digest, size });
    },

    async version(): Promise<Result<string>> {
      try {
        const info = await docker.version();
        return Success(info.Version);
      } catch (error) {
        return fail('Docker unavailable', error, {});
      }
    },
  };
}

/**
 * Create a Docker client bound to the configured or auto-detected socket
 */
export const createDockerClient = (logger: Logger, config: DockerClientConfig = {}): DockerClient => {
  const socketPath = config.socketPath || autoDetectDockerSocket();
  const dockerOptions: DockerOptions = {};

  if (socketPath.startsWith('tcp://') || socketPath.startsWith('http://')) {
    const url = new URL(socketPath.replace(/^tcp:/, 'http:'));
    dockerOptions.host = url.hostname;
    dockerOptions.port = Number(url.port || 2375);
  } else {
    dockerOptions.socketPath = socketPath;
  }

  // No request timeout: docker-modem would apply it as an idle timeout on build and push streams

  logger.debug({ dockerOptions }, 'Created Docker client');
  return createBaseDockerClient(new Docker(dockerOptions), logger);
};
