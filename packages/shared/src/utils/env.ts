/**
 * Environment Parsing Helpers
 *
 * Each app's loadConfig() is built from these. Fail fast on startup when
 * a required variable is missing.
 */

/**
 * Get required environment variable or throw.
 */
export function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

/**
 * Get optional environment variable with default.
 */
export function optional(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

/**
 * Parse integer with default.
 */
export function optionalInt(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse one of a fixed set of lowercase values, falling back to the
 * default for anything unrecognised.
 */
export function optionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T
): T {
  const value = process.env[name]?.toLowerCase();
  if (!value) return defaultValue;
  return allowed.find((candidate) => candidate === value) ?? defaultValue;
}
