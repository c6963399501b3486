/**
 * Configuration management for the tile cache proxy
 * Uses Zod for runtime validation of environment variables
 */

import path from 'node:path';
import { config as dotenvConfig } from 'dotenv';
import { EnvConfigSchema, type EnvConfig } from './schemas.js';

// Load environment variables
dotenvConfig();

/**
 * Validate environment variables with Zod
 */
function validateEnvironment(env: NodeJS.ProcessEnv): EnvConfig {
  const result = EnvConfigSchema.safeParse(env);
  if (!result.success) {
    // Use console.error to avoid circular dependency with logger
    console.error('Environment validation failed:', result.error.message);
    throw new Error(`Invalid environment configuration: ${result.error.message}`);
  }
  return result.data;
}

/** Shape of the application configuration */
export interface AppConfig {
  server: {
    port: number;
    environment: EnvConfig['NODE_ENV'];
    adminApiKey?: string;
  };
  paths: {
    cacheDir: string;
    stylesDir: string;
    secretsFile: string;
  };
  cache: {
    defaultTtlSeconds: number;
    cacheControlMaxAge: number;
    dedupeInflight: boolean;
    styleCacheTtlSeconds: number;
  };
  upstream: {
    timeoutMs: number;
    maxConcurrency: number;
  };
}

/**
 * Build the application configuration from an environment map.
 * Relative paths resolve against the working directory.
 */
export function buildConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = validateEnvironment(source);
  return {
    server: {
      port: env.PORT,
      environment: env.NODE_ENV,
      adminApiKey: env.ADMIN_API_KEY,
    },
    paths: {
      cacheDir: path.resolve(env.CACHE_DIR),
      stylesDir: path.resolve(env.STYLES_DIR),
      secretsFile: path.resolve(env.SECRETS_FILE),
    },
    cache: {
      defaultTtlSeconds: env.TILE_CACHE_TTL_SECONDS,
      cacheControlMaxAge: env.TILE_CACHE_CONTROL_MAX_AGE,
      dedupeInflight: env.TILE_DEDUPE_INFLIGHT,
      styleCacheTtlSeconds: env.STYLE_CACHE_TTL_SECONDS,
    },
    upstream: {
      timeoutMs: env.UPSTREAM_TIMEOUT_MS,
      maxConcurrency: env.UPSTREAM_MAX_CONCURRENCY,
    },
  };
}

/**
 * Application configuration (validated with Zod)
 */
export const config: AppConfig = buildConfig();
