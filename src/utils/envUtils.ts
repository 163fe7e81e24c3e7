/**
 * Environment variable parsing helpers shared by the runtime config loader and the CLI.
 *
 * Every helper takes an explicit env map (defaulting to process.env) so tests and
 * embedded transports can pass their own environment without mutating the process.
 */

export type EnvSource = NodeJS.ProcessEnv | Record<string, string | undefined>;

const TRUTHY = ['1', 'true', 'yes', 'on'];
const FALSY = ['0', 'false', 'no', 'off'];

/**
 * Parse a boolean flag. Accepts 1/true/yes/on and 0/false/no/off (case insensitive);
 * anything else yields the default.
 */
export function parseBooleanEnv(envVar: string | undefined, defaultValue = false): boolean {
  if (!envVar) return defaultValue;
  const normalized = envVar.toLowerCase().trim();
  if (TRUTHY.includes(normalized)) return true;
  if (FALSY.includes(normalized)) return false;
  return defaultValue;
}

export function getBooleanEnv(name: string, defaultValue = false, env: EnvSource = process.env): boolean {
  return parseBooleanEnv(env[name], defaultValue);
}

/**
 * Parse a non-negative integer. Values with a sign, a fraction or trailing garbage
 * fall back to the default.
 */
export function parseIntegerEnv(envVar: string | undefined, defaultValue: number): number {
  if (!envVar) return defaultValue;
  const trimmed = envVar.trim();
  if (!/^\d+$/.test(trimmed)) return defaultValue;
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : defaultValue;
}

export function getIntegerEnv(name: string, defaultValue: number, env: EnvSource = process.env): number {
  return parseIntegerEnv(env[name], defaultValue);
}

/** Return the value when it is one of `allowed` (case insensitive), else the default. */
export function parseEnumEnv<T extends string>(envVar: string | undefined, allowed: readonly T[], defaultValue: T): T {
  if (!envVar) return defaultValue;
  const normalized = envVar.toLowerCase().trim();
  const match = allowed.find(a => a === normalized);
  return match ?? defaultValue;
}

export function getStringEnv(name: string, defaultValue: string, env: EnvSource = process.env): string {
  const raw = env[name];
  if (raw && raw.trim().length) return raw.trim();
  return defaultValue;
}
