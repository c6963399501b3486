import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SecretTable, loadSecretTable } from './secrets.js';

vi.mock('./logger.js', () => ({
  proxyLogger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('SecretTable', () => {
  it('should return auth for a configured provider', () => {
    const table = new SecretTable({ maptiler: { key: 'test-secret' } });
    expect(table.forProvider('maptiler')).toEqual({ key: 'test-secret' });
    expect(table.has('maptiler')).toBe(true);
  });

  it('should return empty auth for unknown providers', () => {
    const table = new SecretTable({});
    expect(table.forProvider('mapbox')).toEqual({});
    expect(table.has('mapbox')).toBe(false);
  });

  it('should not report providers with no parameters', () => {
    const table = new SecretTable({ tracestrack: {} });
    expect(table.has('tracestrack')).toBe(false);
    expect(table.providers()).toEqual(['tracestrack']);
  });

  it('should not be affected by later changes to the input', () => {
    const data = { maptiler: { key: 'test-secret' } };
    const table = new SecretTable(data);
    data.maptiler.key = 'changed';
    expect(table.forProvider('maptiler')).toEqual({ key: 'test-secret' });
    expect(Object.isFrozen(table.forProvider('maptiler'))).toBe(true);
  });
});

describe('loadSecretTable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'tile-secrets-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load providers from a JSON file', async () => {
    const file = path.join(dir, 'secrets.json');
    await writeFile(file, JSON.stringify({ maptiler: { key: 'test-secret' }, mapbox: { access_token: 'test-token' } }));

    const table = await loadSecretTable(file);

    expect(table.providers()).toEqual(['maptiler', 'mapbox']);
    expect(table.forProvider('mapbox')).toEqual({ access_token: 'test-token' });
  });

  it('should return an empty table when the file is missing', async () => {
    const table = await loadSecretTable(path.join(dir, 'missing.json'));
    expect(table.providers()).toEqual([]);
  });

  it('should fail on invalid JSON', async () => {
    const file = path.join(dir, 'secrets.json');
    await writeFile(file, '{ not json');

    await expect(loadSecretTable(file)).rejects.toThrow(/^Secret table load failed: .* is not valid JSON/);
  });

  it('should fail when values are not string maps', async () => {
    const file = path.join(dir, 'secrets.json');
    await writeFile(file, JSON.stringify({ maptiler: 'test-secret' }));

    await expect(loadSecretTable(file)).rejects.toThrow(/^Secret table load failed/);
  });
});
