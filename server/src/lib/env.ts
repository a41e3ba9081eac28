/**
 * Environment variable helpers. Values are read once at startup by
 * `loadConfig`; nothing else in the engine reads the environment.
 */

type EnvLike = Record<string, string | undefined>;

export function getEnv(key: string, defaultValue: string, source?: EnvLike): string;
export function getEnv(key: string, defaultValue?: string, source?: EnvLike): string | undefined;
export function getEnv(key: string, defaultValue?: string, source: EnvLike = process.env): string | undefined {
  const value = source[key]?.trim();
  return value !== undefined && value !== '' ? value : defaultValue;
}

/**
 * Integer env var; falls back to the default when unset or not an integer.
 */
export function getIntEnv(key: string, defaultValue: number, source: EnvLike = process.env): number {
  const raw = getEnv(key, undefined, source);
  if (!raw) {
    return defaultValue;
  }

  const parsed = Number(raw);
  return Number.isInteger(parsed) ? parsed : defaultValue;
}

export function getDatabaseUrl(source: EnvLike = process.env): string | undefined {
  return getEnv('DATABASE_URL', undefined, source);
}
