/**
 * Provider secret table
 * Loads the provider → auth parameter map written by the style scraper.
 * The table is immutable; reloading produces a new instance.
 */

import { readFile } from 'node:fs/promises';
import { proxyLogger } from './logger.js';
import { getErrorMessage } from './errors.js';
import { SecretTableSchema, type SecretTableData } from './schemas.js';
import type { ProviderAuth } from './types.js';

const EMPTY_AUTH: ProviderAuth = Object.freeze({});

export class SecretTable {
  private readonly entries: ReadonlyMap<string, ProviderAuth>;

  constructor(data: SecretTableData = {}) {
    const entries = new Map<string, ProviderAuth>();
    for (const [provider, params] of Object.entries(data)) {
      entries.set(provider, Object.freeze({ ...params }));
    }
    this.entries = entries;
  }

  /** Auth parameters for a provider; empty when none are configured */
  forProvider(providerId: string): ProviderAuth {
    return this.entries.get(providerId) ?? EMPTY_AUTH;
  }

  has(providerId: string): boolean {
    const auth = this.entries.get(providerId);
    return auth !== undefined && Object.keys(auth).length > 0;
  }

  providers(): string[] {
    return [...this.entries.keys()];
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load the secret table from disk.
 * A missing file yields an empty table; a malformed one fails startup.
 */
export async function loadSecretTable(filePath: string): Promise<SecretTable> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      proxyLogger.info('No secrets file found, upstream requests will carry no auth', { filePath });
      return new SecretTable();
    }
    throw new Error(`Secret table load failed: ${getErrorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Secret table load failed: ${filePath} is not valid JSON (${getErrorMessage(error)})`);
  }

  const result = SecretTableSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Secret table load failed: ${result.error.message}`);
  }

  const table = new SecretTable(result.data);
  proxyLogger.info('Loaded provider secrets', { providers: table.providers() });
  return table;
}
