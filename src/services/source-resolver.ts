/**
 * Source Resolver
 * Maps a (style, source) pair onto its upstream tile template and provider
 * auth, reading the `_meta` block the style-rewriting step stores in each
 * scraped style document.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import NodeCache from 'node-cache';
import { assertSafeSegment } from '../lib/cache-keys.js';
import { NotFoundError, StyleDescriptorError, getErrorMessage } from '../lib/errors.js';
import { proxyLogger } from '../lib/logger.js';
import { StyleDocumentSchema, type StyleMeta } from '../lib/schemas.js';
import type { SecretTable } from '../lib/secrets.js';
import type { AssetDescriptor, ProviderAuth, ProviderKind, SourceDescriptor } from '../lib/types.js';

/** Styles whose provider is not the token before the first dash */
export const STYLE_PROVIDER_MAP: Readonly<Record<string, string>> = {
  'maptiler-outdoor': 'maptiler',
  'maptiler-topo': 'maptiler',
  'tracestrack-topo': 'tracestrack',
  'mapbox-outdoors': 'mapbox',
};

/** Hosts served by providers that need request fix-ups */
const PROVIDER_DOMAINS: ReadonlyArray<[Exclude<ProviderKind, 'generic'>, string]> = [
  ['maptiler', 'maptiler.com'],
  ['mapbox', 'mapbox.com'],
  ['tracestrack', 'tracestrack.com'],
];

/** Provider identifier for a style name */
export function providerIdForStyle(styleName: string): string {
  return STYLE_PROVIDER_MAP[styleName] ?? styleName.split('-')[0];
}

function hostMatches(url: string, domain: string): boolean {
  try {
    const { hostname } = new URL(url);
    return hostname === domain || hostname.endsWith(`.${domain}`);
  } catch {
    return false;
  }
}

/**
 * Decide the provider kind once, from the provider id when it names a known
 * provider, otherwise from the host of the style's upstream URLs.
 */
export function classifyProvider(providerId: string, upstreamUrls: string[]): ProviderKind {
  for (const [kind] of PROVIDER_DOMAINS) {
    if (providerId === kind) return kind;
  }
  for (const url of upstreamUrls) {
    for (const [kind, domain] of PROVIDER_DOMAINS) {
      if (hostMatches(url, domain)) return kind;
    }
  }
  return 'generic';
}

/** Parsed, validated view of one scraped style */
interface LoadedStyle {
  styleName: string;
  meta: StyleMeta;
  providerId: string;
  providerKind: ProviderKind;
  auth: ProviderAuth;
}

/** Resolution contract used by the proxy */
export interface StyleSourceResolver {
  resolve(styleName: string, sourceName: string): Promise<SourceDescriptor>;
  resolveAssets(styleName: string): Promise<AssetDescriptor>;
}

export interface SourceResolverOptions {
  /** Seconds a parsed style stays memoised; 0 disables memoisation */
  styleCacheTtlSeconds?: number;
}

export class SourceResolver implements StyleSourceResolver {
  private readonly stylesDir: string;
  private readonly secrets: SecretTable;
  private readonly options: SourceResolverOptions;
  private readonly styleCache: NodeCache | null;

  constructor(stylesDir: string, secrets: SecretTable, options: SourceResolverOptions = {}) {
    this.stylesDir = path.resolve(stylesDir);
    this.secrets = secrets;
    this.options = options;
    const ttl = options.styleCacheTtlSeconds ?? 30;
    this.styleCache = ttl > 0 ? new NodeCache({ stdTTL: ttl, useClones: false }) : null;
  }

  /** New resolver over the same styles with a replacement secret table */
  withSecrets(secrets: SecretTable): SourceResolver {
    return new SourceResolver(this.stylesDir, secrets, this.options);
  }

  /** Resolve a style's source to its upstream template and auth */
  async resolve(styleName: string, sourceName: string): Promise<SourceDescriptor> {
    const style = await this.loadStyle(styleName);
    const sources = style.meta.tile_sources;
    const template = Object.hasOwn(sources, sourceName) ? sources[sourceName] : undefined;
    if (!template) {
      throw new NotFoundError(`Source ${sourceName} not found in ${styleName}`);
    }

    return {
      styleName,
      sourceName,
      template,
      providerId: style.providerId,
      providerKind: style.providerKind,
      auth: style.auth,
    };
  }

  /** Original sprite and glyph locations for a style */
  async resolveAssets(styleName: string): Promise<AssetDescriptor> {
    const style = await this.loadStyle(styleName);
    return {
      styleName,
      sprite: style.meta.original_sprite ?? undefined,
      glyphs: style.meta.original_glyphs ?? undefined,
      providerId: style.providerId,
      providerKind: style.providerKind,
      auth: style.auth,
    };
  }

  /** Drop memoised styles so the next request rereads them from disk */
  clearCache(): void {
    this.styleCache?.flushAll();
  }

  close(): void {
    this.styleCache?.close();
  }

  private async loadStyle(styleName: string): Promise<LoadedStyle> {
    assertSafeSegment(styleName, 'style name');

    const cached = this.styleCache?.get<LoadedStyle>(styleName);
    if (cached) return cached;

    const meta = await this.readStyleMeta(styleName);
    const providerId = meta.tile_auth_provider || providerIdForStyle(styleName);
    const upstreamUrls = [
      ...Object.values(meta.tile_sources),
      ...(meta.original_sprite ? [meta.original_sprite] : []),
      ...(meta.original_glyphs ? [meta.original_glyphs] : []),
    ];

    const loaded: LoadedStyle = {
      styleName,
      meta,
      providerId,
      providerKind: classifyProvider(providerId, upstreamUrls),
      auth: this.authFor(providerId, meta),
    };

    this.styleCache?.set(styleName, loaded);
    proxyLogger.debug('Loaded style descriptor', {
      styleName,
      providerId,
      providerKind: loaded.providerKind,
      sources: Object.keys(meta.tile_sources),
    });
    return loaded;
  }

  /** Secret table first, then credentials embedded by older scrapes, else none */
  private authFor(providerId: string, meta: StyleMeta): ProviderAuth {
    if (this.secrets.has(providerId)) {
      return this.secrets.forProvider(providerId);
    }
    return Object.freeze({ ...(meta.tile_auth ?? {}) });
  }

  private async readStyleMeta(styleName: string): Promise<StyleMeta> {
    const stylePath = path.join(this.stylesDir, 'scraped', `${styleName}.json`);

    let raw: string;
    try {
      raw = await readFile(stylePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new NotFoundError(`No tile info for style ${styleName}`);
      }
      throw new StyleDescriptorError(styleName, getErrorMessage(error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StyleDescriptorError(styleName, `not valid JSON (${getErrorMessage(error)})`);
    }

    const result = StyleDocumentSchema.safeParse(parsed);
    if (!result.success) {
      throw new StyleDescriptorError(styleName, result.error.message);
    }
    if (!result.data._meta) {
      throw new NotFoundError(`No tile info for style ${styleName}`);
    }
    return result.data._meta;
  }
}
