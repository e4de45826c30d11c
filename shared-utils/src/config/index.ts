/**
 * Shared configuration utilities
 */

export interface RedisConfig {
  url: string;
  host: string;
  port: number;
}

export interface ServiceConfig {
  name: string;
  mode: string;
  logLevel: string;
  port?: number;
}

/**
 * Create service configuration from environment variables
 */
export function createServiceConfig(
  name: string,
  defaultPort?: number
): ServiceConfig {
  return {
    name,
    mode: process.env.MODE ?? process.env.NODE_ENV ?? "development",
    logLevel: process.env.LOG_LEVEL ?? "info",
    port: defaultPort ? parseEnvNumber("PORT", defaultPort) : undefined,
  };
}

/**
 * Create Redis configuration from REDIS_URL, or null when caching stays in memory
 */
export function createRedisConfig(): RedisConfig | null {
  const redisUrl = process.env.REDIS_URL;
  if (!redisUrl) return null;

  try {
    const url = new URL(redisUrl);
    return {
      url: redisUrl,
      host: url.hostname,
      port: url.port ? parseInt(url.port, 10) : 6379,
    };
  } catch {
    throw new Error(`Invalid REDIS_URL: ${redisUrl}`);
  }
}

/**
 * Parse a numeric environment variable, falling back when unset
 */
export function parseEnvNumber(envVar: string, defaultValue: number): number {
  const raw = process.env[envVar];
  if (raw === undefined || raw.trim() === "") return defaultValue;

  const num = Number(raw);
  if (!Number.isFinite(num)) {
    throw new Error(`Invalid number in ${envVar}: ${raw}`);
  }
  return num;
}

/**
 * Parse an optional numeric environment variable
 */
export function parseOptionalEnvNumber(envVar: string): number | undefined {
  const raw = process.env[envVar];
  if (raw === undefined || raw.trim() === "") return undefined;
  return parseEnvNumber(envVar, 0);
}

/**
 * Parse a boolean flag; anything other than "false"/"0" counts as enabled
 */
export function parseEnvFlag(envVar: string, defaultValue: boolean): boolean {
  const raw = process.env[envVar];
  if (raw === undefined) return defaultValue;
  return !["false", "0", "no"].includes(raw.trim().toLowerCase());
}

/**
 * Parse comma-separated environment variable into array
 */
export function parseEnvArray(
  envVar: string,
  defaultValue: string[] = []
): string[] {
  const value = process.env[envVar];
  if (!value) return defaultValue;

  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}
