import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TrackCache, isExpired } from './TrackCache.js';

const TTL = 1000;
const NOW = 50_000;
const BELL = { trackId: 't-bell', uri: 'spotify:track:t-bell' };

describe('TrackCache', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'track-cache-'));
    file = path.join(dir, 'track_cache.json');
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('expires entries strictly older than the TTL', () => {
    const cache = new TrackCache(file, TTL);
    cache.store('stale', BELL, NOW - TTL - 1);
    cache.store('edge', BELL, NOW - TTL);
    cache.store('fresh', BELL, NOW - TTL + 1);

    expect(cache.lookup('stale', NOW)).toBeUndefined();
    expect(cache.lookup('edge', NOW)).toEqual({ track: BELL, resolvedAt: NOW - TTL });
    expect(cache.lookup('fresh', NOW)).toEqual({ track: BELL, resolvedAt: NOW - TTL + 1 });
    expect(isExpired({ track: null, resolvedAt: 0 }, TTL + 1, TTL)).toBe(true);
  });

  it('keeps a live entry that was resolved later than the incoming one', () => {
    const cache = new TrackCache(file, TTL);
    const air = { trackId: 't-air', uri: 'spotify:track:t-air' };
    cache.store('k', BELL, NOW);
    cache.store('k', air, NOW - 10);
    expect(cache.lookup('k', NOW)?.track).toEqual(BELL);

    cache.store('k', air, NOW + 10);
    expect(cache.lookup('k', NOW + 10)?.track).toEqual(air);
  });

  it('round-trips entries, including cached misses, through the file', async () => {
    const cache = new TrackCache(file, TTL);
    cache.store('loscil - bell flame', BELL, NOW);
    cache.store('nobody known - ghost song', null, NOW);
    expect(await cache.flush()).toBe(true);

    const raw = JSON.parse(await fs.promises.readFile(file, 'utf8'));
    expect(raw.version).toBe(1);

    const reloaded = new TrackCache(file, TTL);
    await reloaded.load();
    expect(reloaded.size).toBe(2);
    expect(reloaded.lookup('loscil - bell flame', NOW)?.track).toEqual(BELL);
    expect(reloaded.lookup('nobody known - ghost song', NOW)).toEqual({ track: null, resolvedAt: NOW });
  });

  it('does not write when nothing changed', async () => {
    const cache = new TrackCache(file, TTL);
    expect(await cache.flush()).toBe(true);
    expect(fs.existsSync(file)).toBe(false);
  });

  it('starts empty when the file is corrupt', async () => {
    await fs.promises.writeFile(file, '{"tracks": {', 'utf8');
    const cache = new TrackCache(file, TTL);
    await cache.load();
    expect(cache.size).toBe(0);

    cache.store('k', BELL, NOW);
    expect(await cache.flush()).toBe(true);
    const reloaded = new TrackCache(file, TTL);
    await reloaded.load();
    expect(reloaded.size).toBe(1);
  });

  it('drops unreadable entries and keeps the rest', async () => {
    const doc = {
      version: 1,
      tracks: {
        good: { track: BELL, resolvedAt: NOW },
        miss: { track: null, resolvedAt: NOW },
        noTime: { track: BELL },
        badTrack: { track: { trackId: 7 }, resolvedAt: NOW },
      },
    };
    await fs.promises.writeFile(file, JSON.stringify(doc), 'utf8');
    const cache = new TrackCache(file, TTL);
    await cache.load();
    expect(cache.size).toBe(2);
    expect(cache.lookup('good', NOW)?.track).toEqual(BELL);
  });

  it('starts empty when no file exists', async () => {
    const cache = new TrackCache(file, TTL);
    await cache.load();
    expect(cache.size).toBe(0);
  });

  it('prunes expired entries', () => {
    const cache = new TrackCache(file, TTL);
    cache.store('old', BELL, 0);
    cache.store('new', BELL, 5000);
    expect(cache.prune(5500)).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.lookup('new', 5500)).toBeDefined();
  });

  it('reports a failed write and keeps the entries in memory', async () => {
    const blocker = path.join(dir, 'blocker');
    await fs.promises.writeFile(blocker, 'not a directory', 'utf8');
    const cache = new TrackCache(path.join(blocker, 'track_cache.json'), TTL);
    cache.store('k', BELL, NOW);

    expect(await cache.flush()).toBe(false);
    expect(cache.lookup('k', NOW)?.track).toEqual(BELL);
  });
});
