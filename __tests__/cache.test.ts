/**
 * Cache Backend Tests
 *
 * - MemoryCacheBackend expiry and stats
 * - FileCacheBackend persistence
 * - CachedTransport cache keys
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { CachedResponse } from '../interfaces/CacheBackend';
import { CachedTransport } from '../structs/CachedTransport';
import { FileCacheBackend } from '../utils/cache';
import { MemoryCacheBackend } from '../utils/memoryCache';

const RESPONSE: CachedResponse = { status: 200, body: '{"entityUniqueId":"A"}', storedAt: 1 };

describe('MemoryCacheBackend', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_000;
  });

  it('returns entries until their ttl has passed', () => {
    const cache = new MemoryCacheBackend(clock);
    cache.set('a', RESPONSE, 10);

    now += 9_999;
    expect(cache.get('a')).toEqual(RESPONSE);

    now += 1;
    expect(cache.get('a')).toBeUndefined();
    expect(cache.stats).toEqual({ size: 0, hits: 1, misses: 1 });
  });

  it('removes expired entries on cleanup', () => {
    const cache = new MemoryCacheBackend(clock);
    cache.set('short', RESPONSE, 1);
    cache.set('long', RESPONSE, 100);

    now += 5_000;

    expect(cache.cleanup()).toBe(1);
    expect(cache.stats.size).toBe(1);
  });

  it('evicts expired entries when a new one is stored', () => {
    const cache = new MemoryCacheBackend(clock);
    cache.set('old', RESPONSE, 1);

    now += 10_000;
    cache.set('new', RESPONSE, 1);

    expect(cache.stats.size).toBe(1);
    expect(cache.get('new')).toEqual(RESPONSE);
  });

  it('deletes and clears', () => {
    const cache = new MemoryCacheBackend(clock);
    cache.set('a', RESPONSE, 10);
    cache.set('b', RESPONSE, 10);

    cache.delete('a');
    expect(cache.get('a')).toBeUndefined();

    cache.clear();
    expect(cache.stats).toEqual({ size: 0, hits: 0, misses: 0 });
  });
});

describe('FileCacheBackend', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'songlink-cache-'));
    filePath = path.join(dir, 'nested', 'cache.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('persists entries for a later instance', async () => {
    await new FileCacheBackend(filePath).set('a', RESPONSE, 60);

    const reopened = new FileCacheBackend(filePath);
    expect(await reopened.get('a')).toEqual(RESPONSE);
  });

  it('expires entries by their ttl', async () => {
    let now = 5_000;
    const cache = new FileCacheBackend(filePath, () => now);
    await cache.set('a', RESPONSE, 1);

    now = 6_000;
    expect(await cache.get('a')).toBeUndefined();

    const stored: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    expect(stored).toEqual({});
  });

  it('evicts expired entries when a new one is stored', async () => {
    let now = 0;
    const cache = new FileCacheBackend(filePath, () => now);

    for (let i = 0; i < 100; i++) {
      await cache.set(`key-${i}`, RESPONSE, 1);
      now += 10_000;
    }

    const stored: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    expect(stored).toEqual({ 'key-99': { value: RESPONSE, expiresAt: 991_000 } });
  });

  it('starts empty when the file is missing', async () => {
    expect(await new FileCacheBackend(filePath).get('a')).toBeUndefined();
  });

  it('starts empty when the file is not valid JSON', async () => {
    const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '{ not json', 'utf-8');

    expect(await new FileCacheBackend(filePath).get('a')).toBeUndefined();
    expect(consoleError).toHaveBeenCalledTimes(1);
    consoleError.mockRestore();
  });

  it('skips malformed entries', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(
      filePath,
      JSON.stringify({ good: { value: RESPONSE, expiresAt: Date.now() + 60_000 }, bad: { value: 'x', expiresAt: 1 } }),
      'utf-8'
    );

    const cache = new FileCacheBackend(filePath);
    expect(await cache.get('good')).toEqual(RESPONSE);
    expect(await cache.get('bad')).toBeUndefined();
  });

  it('clears and deletes entries', async () => {
    const cache = new FileCacheBackend(filePath);
    await cache.set('a', RESPONSE, 60);
    await cache.set('b', RESPONSE, 60);

    await cache.delete('a');
    expect(await new FileCacheBackend(filePath).get('a')).toBeUndefined();
    expect(await new FileCacheBackend(filePath).get('b')).toEqual(RESPONSE);

    await cache.clear();
    expect(await new FileCacheBackend(filePath).get('b')).toBeUndefined();
  });
});

describe('CachedTransport.cacheKey', () => {
  const transport = new CachedTransport(null);

  it('sorts parameters and leaves out the key', () => {
    expect(
      transport.cacheKey('https://api.song.link/v1-alpha.1/links', {
        userCountry: 'US',
        key: 'test-key',
        url: 'https://open.spotify.com/track/xyz'
      })
    ).toBe('https://api.song.link/v1-alpha.1/links?url=https%3A%2F%2Fopen.spotify.com%2Ftrack%2Fxyz&userCountry=US');
  });

  it('is the bare url without parameters', () => {
    expect(transport.cacheKey('https://api.song.link/v1-alpha.1/links', { key: 'test-key' })).toBe(
      'https://api.song.link/v1-alpha.1/links'
    );
  });

  it('honours custom ignored parameters', () => {
    const custom = new CachedTransport(null, { ignoredParameters: ['key', 'songIfSingle'] });
    expect(custom.cacheKey('https://x.example.com', { songIfSingle: 'true', id: '1' })).toBe('https://x.example.com?id=1');
  });
});
