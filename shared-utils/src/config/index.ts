/**
 * Shared configuration utilities
 */

import { LogLevel, parseLogLevel } from "../logger";

export interface ServiceConfig {
  mode: string;
  logLevel: LogLevel;
}

export interface RedisConfig {
  url: string;
}

/**
 * Create service configuration from environment variables
 */
export function createServiceConfig(): ServiceConfig {
  return {
    mode: process.env.MODE ?? process.env.NODE_ENV ?? "dev",
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
  };
}

/**
 * Create Redis configuration from environment variables
 */
export function createRedisConfig(): RedisConfig {
  return { url: process.env.REDIS_URL ?? "" };
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

/**
 * Parse comma-separated environment variable into number array
 */
export function parseEnvNumberArray(
  envVar: string,
  defaultValue: number[] = []
): number[] {
  const stringArray = parseEnvArray(envVar);
  if (stringArray.length === 0) return defaultValue;

  return stringArray.map((str) => {
    const num = Number(str);
    if (isNaN(num)) {
      throw new Error(`Invalid number in ${envVar}: ${str}`);
    }
    return num;
  });
}

/**
 * Parse a numeric environment variable, falling back on absence
 */
export function parseEnvNumber(envVar: string, defaultValue: number): number {
  const value = process.env[envVar];
  if (value === undefined || value.trim() === "") return defaultValue;

  const num = Number(value);
  if (isNaN(num)) {
    throw new Error(`Invalid number in ${envVar}: ${value}`);
  }
  return num;
}

/**
 * Parse a boolean environment variable ("false"/"0"/"no" are false)
 */
export function parseEnvBoolean(envVar: string, defaultValue: boolean): boolean {
  const value = process.env[envVar];
  if (value === undefined || value.trim() === "") return defaultValue;

  return !["false", "0", "no", "off"].includes(value.trim().toLowerCase());
}
