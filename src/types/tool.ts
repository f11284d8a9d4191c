import type { z } from 'zod';
import type { Logger } from 'pino';
import type { Result } from './core';
import type { CommandRunner } from '@/infra/process/run-command';

/**
 * Context handed to every repository tool handler
 */
export interface ToolContext {
  logger: Logger;
  /** Process runner used for git; defaults to spawning real processes */
  runCommand?: CommandRunner;
}

/**
 * Repository tool exposed to the analysis agent
 */
export interface RepositoryTool<TSchema extends z.ZodTypeAny = z.ZodTypeAny, TOut = unknown> {
  /** Unique tool identifier */
  name: string;

  /** Description given to the agent */
  description: string;

  /** Zod schema used to validate agent-supplied arguments */
  schema: TSchema;

  /** Parse and validate untyped arguments (throws on invalid input, like Zod) */
  parse: (args: unknown) => z.infer<TSchema>;

  /** Handler with pre-validated input */
  handler: (input: z.infer<TSchema>, context: ToolContext) => Promise<Result<TOut>>;

  /** Parse, then run the handler */
  run: (args: unknown, context: ToolContext) => Promise<Result<TOut>>;
}

/**
 * Lightweight helper to create tools with reduced boilerplate
 */
export function tool<TSchema extends z.ZodTypeAny, TOut>(config: {
  name: string;
  description: string;
  schema: TSchema;
  handler: (input: z.infer<TSchema>, context: ToolContext) => Promise<Result<TOut>>;
}): RepositoryTool<TSchema, TOut> {
  const parse = (args: unknown): z.infer<TSchema> => config.schema.parse(args);
  return {
    ...config,
    parse,
    run: (args: unknown, context: ToolContext) => config.handler(parse(args), context),
  };
}
