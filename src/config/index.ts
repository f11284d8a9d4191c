export * from './constants';
export * from './config';
export * from './runtime';
export { parseIntEnv, parsePositiveIntEnv, parseStringEnv, parseOptionalEnv, parseBoolEnv } from './env-utils';
