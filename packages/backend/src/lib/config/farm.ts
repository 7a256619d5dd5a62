import { z } from 'zod';
import { ValidationError } from '../errors.js';

export interface FarmConfig {
  /** Uniform capacity shared by every barn. */
  barnCapacity: number;
  port: number;
  host: string;
  logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  frontendUrl: string;
}

const envSchema = z.object({
  BARN_CAPACITY: z.coerce.number().int().positive().default(20),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  FRONTEND_URL: z.string().url().default('http://localhost:5173'),
});

let cachedConfig: FarmConfig | undefined;

/**
 * Read and validate the farm's environment variables.
 * Unset variables take their defaults; set but malformed ones throw a
 * ValidationError naming every offending variable.
 */
export function loadFarmConfig(env: NodeJS.ProcessEnv = process.env): FarmConfig {
  if (cachedConfig !== undefined) {
    return cachedConfig;
  }

  // Treat empty strings as unset so `BARN_CAPACITY=` in a .env falls back to the default
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const invalid = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new ValidationError(
      `Invalid farm configuration. Check environment variables: ${invalid.join(', ')}`,
      { invalid }
    );
  }

  cachedConfig = {
    barnCapacity: parsed.data.BARN_CAPACITY,
    port: parsed.data.PORT,
    host: parsed.data.HOST,
    logLevel: parsed.data.LOG_LEVEL,
    frontendUrl: parsed.data.FRONTEND_URL,
  };
  return cachedConfig;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetFarmConfigCache(): void {
  cachedConfig = undefined;
}
