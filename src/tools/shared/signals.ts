/**
 * Detection tables shipped in resources/tech-stack-signals.json
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const signalsSchema = z.object({
  extensionLanguages: z.record(z.string()),
  nodeFrameworks: z.record(z.string()),
  pythonFrameworks: z.record(z.string()),
  manifestFiles: z.array(z.string()),
  ciFiles: z.array(z.string()),
  containerFiles: z.array(z.string()),
  buildTools: z.record(z.string()),
  listing: z.object({
    skipDirectories: z.array(z.string()),
    skipExtensions: z.array(z.string()),
  }),
});

export type TechStackSignals = z.infer<typeof signalsSchema>;

const SIGNALS_PATH = path.resolve(__dirname, '../../../resources/tech-stack-signals.json');

let cached: TechStackSignals | undefined;

export function loadSignals(): TechStackSignals {
  cached ??= signalsSchema.parse(JSON.parse(readFileSync(SIGNALS_PATH, 'utf8')));
  return cached;
}
