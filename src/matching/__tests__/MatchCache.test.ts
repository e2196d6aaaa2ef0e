import { promises as fs } from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FatalConfigurationError } from '../../utils/ErrorHandler.js';
import { makeTempDir, removeTempDir } from '../../__tests__/helpers/fakeCatalogs.js';
import { MatchCache } from '../MatchCache.js';

describe('MatchCache', () => {
  let dir: string;
  let cachePath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    cachePath = path.join(dir, 'lookup.json');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('arranca vacía si el archivo no existe', async () => {
    const cache = await MatchCache.open(cachePath);

    expect(cache.size).toBe(0);
    expect(cache.lookup('artist x|song a')).toBeUndefined();
  });

  it('persiste lo guardado entre aperturas', async () => {
    const cache = await MatchCache.open(cachePath);
    await cache.store('artist x|song a', { targetId: 't1', score: 0.9, matchedAt: '2024-01-01T00:00:00.000Z' });
    await cache.store('artist y|song b', { targetId: null, score: 0, matchedAt: '2024-01-01T00:00:00.000Z' });

    const reopened = await MatchCache.open(cachePath);

    expect(reopened.size).toBe(2);
    expect(reopened.lookup('artist x|song a')).toEqual({
      targetId: 't1',
      score: 0.9,
      matchedAt: '2024-01-01T00:00:00.000Z'
    });
    expect(reopened.lookup('artist y|song b')?.targetId).toBeNull();
  });

  it('lookup devuelve una copia', async () => {
    const cache = await MatchCache.open(cachePath);
    await cache.store('k', { targetId: 't1', score: 0.8, matchedAt: '2024-01-01T00:00:00.000Z' });

    const found = cache.lookup('k');
    if (found) {
      found.targetId = 'otro';
    }

    expect(cache.lookup('k')?.targetId).toBe('t1');
  });

  it('el último store gana', async () => {
    const cache = await MatchCache.open(cachePath);
    await cache.store('k', { targetId: 't1', score: 0.8, matchedAt: '2024-01-01T00:00:00.000Z' });
    await cache.store('k', { targetId: 't2', score: 0.9, matchedAt: '2024-01-02T00:00:00.000Z' });

    const reopened = await MatchCache.open(cachePath);

    expect(reopened.lookup('k')?.targetId).toBe('t2');
  });

  it('falla con error de configuración si el JSON está corrupto', async () => {
    await fs.writeFile(cachePath, '{ no es json', 'utf-8');

    await expect(MatchCache.open(cachePath)).rejects.toBeInstanceOf(FatalConfigurationError);
  });

  it('falla si el formato no es el esperado', async () => {
    await fs.writeFile(cachePath, JSON.stringify({ version: 2, entries: {} }), 'utf-8');

    await expect(MatchCache.open(cachePath)).rejects.toMatchObject({ code: 'CACHE_CORRUPTA' });
  });

  it('clear borra el archivo y las entradas', async () => {
    const cache = await MatchCache.open(cachePath);
    await cache.store('k', { targetId: 't1', score: 0.9, matchedAt: '2024-01-01T00:00:00.000Z' });

    await cache.clear();

    expect(cache.size).toBe(0);
    await expect(fs.access(cachePath)).rejects.toThrow();
  });

  it('clear no falla si no hay archivo', async () => {
    await expect(MatchCache.empty(cachePath).clear()).resolves.toBeUndefined();
  });
});
