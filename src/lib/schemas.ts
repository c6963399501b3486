/**
 * Zod Runtime Validation Schemas
 * Provides type-safe validation for environment, style documents, the secret
 * table and on-disk cache metadata
 */

import { z } from 'zod';

/** Environment flag: only the literal "true" (any case) enables it */
const envFlag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value.trim().toLowerCase() === 'true'));

// ============================================================================
// Environment Configuration Schemas
// ============================================================================

export const EnvConfigSchema = z.object({
  // Server configuration
  PORT: z.coerce.number().int().positive().default(8000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  ADMIN_API_KEY: z.string().min(1).optional(),

  // Filesystem locations
  CACHE_DIR: z.string().min(1).default('./cache/tiles'),
  STYLES_DIR: z.string().min(1).default('./styles'),
  SECRETS_FILE: z.string().min(1).default('./secrets.json'),

  // Tile cache policy
  TILE_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(86400),
  TILE_CACHE_CONTROL_MAX_AGE: z.coerce.number().int().nonnegative().default(86400),
  TILE_DEDUPE_INFLIGHT: envFlag(true),
  STYLE_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(30),

  // Upstream requests
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  UPSTREAM_MAX_CONCURRENCY: z.coerce.number().int().positive().default(16),
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;

// ============================================================================
// Style Document Schemas
// ============================================================================

/** Proxy metadata the style-rewriting step stores under `_meta` */
export const StyleMetaSchema = z.object({
  source: z.string().optional(),
  original_sprite: z.string().min(1).nullish(),
  original_glyphs: z.string().min(1).nullish(),
  tile_auth_provider: z.string().optional(),
  tile_sources: z.record(z.string(), z.string().min(1)).default({}),
  // Older scrapes embedded credentials directly in the style
  tile_auth: z.record(z.string(), z.string()).optional(),
});

export const StyleDocumentSchema = z
  .object({
    _meta: StyleMetaSchema.optional(),
  })
  .passthrough();

export type StyleMeta = z.infer<typeof StyleMetaSchema>;
export type StyleDocument = z.infer<typeof StyleDocumentSchema>;

// ============================================================================
// Secret Table Schema
// ============================================================================

export const SecretTableSchema = z.record(z.string(), z.record(z.string(), z.string()));

export type SecretTableData = z.infer<typeof SecretTableSchema>;

// ============================================================================
// Cache Metadata Schema
// ============================================================================

/** Sibling `.meta` record written next to every cached tile */
export const CacheMetadataSchema = z.object({
  content_type: z.string().min(1),
  headers: z.record(z.string(), z.string()).default({}),
  ttl: z.number().nonnegative(),
  cached_at: z.number().nonnegative(),
});

export type CacheMetadata = z.infer<typeof CacheMetadataSchema>;
