#!/usr/bin/env node
/**
 * modernizer-ops entry point
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { argv } from 'node:process';
import { createProgram } from './program';
import { handleGenericError } from './error-formatting';

// src/cli and dist/cli both sit two levels below the package root
const packageJson: unknown = JSON.parse(
  readFileSync(join(__dirname, '../../package.json'), 'utf-8'),
);

function readVersion(manifest: unknown): string {
  if (manifest && typeof manifest === 'object' && 'version' in manifest) {
    return typeof manifest.version === 'string' ? manifest.version : '0.0.0';
  }
  return '0.0.0';
}

const version = readVersion(packageJson);

createProgram(version)
  .parseAsync(argv)
  .catch((error: unknown) => handleGenericError('Unexpected error', error));
