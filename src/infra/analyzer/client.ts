/**
 * HTTP client for the analyzer backend (`/models`, `/health`, `/analyze`)
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { Failure, Success, type Result } from '@/types';
import { DEFAULT_TIMEOUTS, MODEL_CATALOG, type ModelOption } from '@/config/constants';
import { extractErrorMessage } from '@/lib/errors';
import { parseEventLine, type AnalysisEvent } from '@/events/analysis-events';

export type FetchLike = typeof fetch;

export interface AnalyzerClientOptions {
  backendUrl: string;
  logger: Logger;
  fetch?: FetchLike;
  timeoutMs?: number;
}

export interface ModelCatalog {
  defaultModelId: string;
  models: ModelOption[];
  source: 'backend' | 'builtin';
}

export interface AnalyzeRequest {
  url: string;
  authType: 'pat' | 'ssh';
  credential: string;
  branch?: string;
  /** Empty uses the backend's default model */
  modelId?: string;
}

const modelsResponseSchema = z.object({
  default: z.string().default(''),
  available: z.array(z.object({ id: z.string(), label: z.string() })).default([]),
});

const healthResponseSchema = z.object({
  status: z.string(),
  default_model: z.string().optional(),
  region: z.string().optional(),
});

export type BackendHealth = z.infer<typeof healthResponseSchema>;

export interface AnalyzerClient {
  /** Backend catalog, or the built-in one when the backend cannot be reached */
  listModels: (fallbackDefault: string) => Promise<ModelCatalog>;
  health: () => Promise<Result<BackendHealth>>;
  /** Stream an analysis; resolves once the response body ends */
  analyze: (
    request: AnalyzeRequest,
    onEvent: (event: AnalysisEvent) => void,
    signal?: AbortSignal,
  ) => Promise<Result<void>>;
}

function endpoint(backendUrl: string, route: string): string {
  return `${backendUrl.replace(/\/+$/, '')}${route}`;
}

export function createAnalyzerClient(options: AnalyzerClientOptions): AnalyzerClient {
  const fetchImpl = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUTS.modelCatalog;
  const { logger } = options;

  const getJson = async (route: string): Promise<unknown> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetchImpl(endpoint(options.backendUrl, route), {
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new Error(`Backend returned HTTP ${response.status}`);
      }
      return await response.json();
    } finally {
      clearTimeout(timeoutId);
    }
  };

  return {
    async listModels(fallbackDefault: string): Promise<ModelCatalog> {
      try {
        const parsed = modelsResponseSchema.parse(await getJson('/models'));
        if (parsed.available.length > 0) {
          return {
            defaultModelId: parsed.default || fallbackDefault,
            models: parsed.available,
            source: 'backend',
          };
        }
      } catch (error) {
        logger.debug(
          { error: extractErrorMessage(error) },
          'Model catalog unavailable, using built-in list',
        );
      }
      return { defaultModelId: fallbackDefault, models: [...MODEL_CATALOG], source: 'builtin' };
    },

    async health(): Promise<Result<BackendHealth>> {
      try {
        return Success(healthResponseSchema.parse(await getJson('/health')));
      } catch (error) {
        return Failure(`Analyzer backend unavailable: ${extractErrorMessage(error)}`, {
          message: `Analyzer backend unavailable at ${options.backendUrl}`,
          resolution: 'Start the backend (`modernizer-ops local up`) or set BACKEND_URL.',
        });
      }
    },

    async analyze(request, onEvent, signal): Promise<Result<void>> {
      let response: Response;
      try {
        response = await fetchImpl(endpoint(options.backendUrl, '/analyze'), {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Accept: 'text/event-stream' },
          body: JSON.stringify({
            gitlab_url: request.url,
            auth_type: request.authType,
            credential: request.credential,
            branch: request.branch ?? 'main',
            model_id: request.modelId ?? '',
          }),
          ...(signal ? { signal } : {}),
        });
      } catch (error) {
        return Failure(
          `Cannot connect to the analysis backend at ${options.backendUrl}: ${extractErrorMessage(error)}`,
        );
      }

      if (!response.ok || !response.body) {
        let text: string;
        try {
          text = await response.text();
        } catch (error) {
          return Failure(
            `Backend error ${response.status}: unreadable response body (${extractErrorMessage(error)})`,
          );
        }
        onEvent({ event: 'error', data: `Backend error ${response.status}: ${text}` });
        return Success(undefined);
      }

      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      let buffered = '';

      const flushLines = (final: boolean): void => {
        const lines = buffered.split(/\r?\n/);
        buffered = final ? '' : (lines.pop() ?? '');
        for (const line of lines) {
          const event = parseEventLine(line);
          if (event) onEvent(event);
        }
      };

      try {
        for (;;) {
          const { done, value } = await reader.read();
          if (done) break;
          buffered += decoder.decode(value, { stream: true });
          flushLines(false);
        }
        buffered += decoder.decode();
        flushLines(true);
      } catch (error) {
        return Failure(`Analysis stream interrupted: ${extractErrorMessage(error)}`);
      }

      return Success(undefined);
    },
  };
}
