/**
 * Environment variable parsing helpers
 */

/**
 * Parse integer from environment variable with default
 *
 * @example
 * parseIntEnv('DOCKER_TIMEOUT', 60000) // 60000 when unset or not a number
 */
export function parseIntEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a strictly positive integer; zero, negatives and garbage fall back to the default
 */
export function parsePositiveIntEnv(key: string, defaultValue: number): number {
  const parsed = parseIntEnv(key, defaultValue);
  return parsed > 0 ? parsed : defaultValue;
}

/**
 * Parse string from environment variable; unset and empty values use the default
 */
export function parseStringEnv(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

/**
 * Read an optional string; unset and empty values are `undefined`
 */
export function parseOptionalEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Parse boolean from environment variable with default
 *
 * Recognizes 'true' / '1' / 'yes' and 'false' / '0' / 'no' (case-insensitive).
 */
export function parseBoolEnv(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const lower = value.toLowerCase();
  if (lower === 'false' || lower === '0' || lower === 'no') return false;
  if (lower === 'true' || lower === '1' || lower === 'yes') return true;
  return defaultValue;
}
