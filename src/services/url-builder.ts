/**
 * Upstream URL Builder
 * Expands coordinate templates and merges provider auth into the query string.
 * Provider-independent: templates written in {z}/{y}/{x} order come out in
 * that order, which is how row-first providers are addressed.
 */

import type { ProviderAuth, TileCoordinate } from '../lib/types.js';

/** Substitute the {z}, {x} and {y} placeholders */
export function expandTileTemplate(template: string, coord: TileCoordinate): string {
  return template
    .replaceAll('{z}', String(coord.z))
    .replaceAll('{x}', String(coord.x))
    .replaceAll('{y}', String(coord.y));
}

/**
 * Substitute the {fontstack} and {range} placeholders of a glyph template.
 * Commas separating font names stay literal.
 */
export function expandGlyphTemplate(template: string, fontstack: string, range: string): string {
  const encodedStack = encodeURIComponent(fontstack).replaceAll('%2C', ',');
  return template.replaceAll('{fontstack}', encodedStack).replaceAll('{range}', range);
}

/**
 * Merge auth parameters into a URL's query string, auth winning on collision.
 * Existing parameters keep their order and new ones follow in insertion order,
 * so identical inputs always produce identical URLs. Repeated parameters in
 * the original query collapse to their first value.
 */
export function applyAuth(url: string, auth: ProviderAuth): string {
  const queryStart = url.indexOf('?');
  const base = queryStart === -1 ? url : url.slice(0, queryStart);
  const existing = queryStart === -1 ? '' : url.slice(queryStart + 1);

  const params = new Map<string, string>();
  for (const [name, value] of new URLSearchParams(existing)) {
    if (!params.has(name)) params.set(name, value);
  }
  for (const [name, value] of Object.entries(auth)) {
    params.set(name, value);
  }

  if (params.size === 0) return url;

  const query = new URLSearchParams([...params.entries()]).toString();
  return `${base}?${query}`;
}

/** Build the upstream URL for one tile */
export function buildTileUrl(template: string, z: number, x: number, y: number, auth: ProviderAuth): string {
  return applyAuth(expandTileTemplate(template, { z, x, y }), auth);
}
