import fs from 'fs';
import path from 'path';
import { Logger } from '../../utils/logger.js';
import { CacheIOFailure } from '../../types/errors.js';
import type { CacheEntry, CatalogTrackRef } from '../../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_TRACK_TTL_MS = 14 * DAY_MS;

interface TrackCacheFile {
  version: 1;
  tracks: Record<string, CacheEntry>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readTrackRef(value: unknown): CatalogTrackRef | null | undefined {
  if (value === null) return null;
  if (!isRecord(value)) return undefined;
  const { trackId, uri, album } = value;
  if (typeof trackId !== 'string' || typeof uri !== 'string') return undefined;
  const ref: CatalogTrackRef = { trackId, uri };
  if (typeof album === 'string') ref.album = album;
  return ref;
}

// Entries that do not have the expected shape are dropped one by one
function readEntry(value: unknown): CacheEntry | undefined {
  if (!isRecord(value) || typeof value.resolvedAt !== 'number') return undefined;
  const track = readTrackRef(value.track);
  if (track === undefined) return undefined;
  return { track, resolvedAt: value.resolvedAt };
}

export function isExpired(entry: CacheEntry, now: number, ttlMs: number): boolean {
  return now - entry.resolvedAt > ttlMs;
}

/**
 * Persisted map from normalized search key to a resolved catalog track (or "not found").
 * Expiry is evaluated on lookup; nothing is evicted in the background.
 */
export class TrackCache {
  private entries: Map<string, CacheEntry> = new Map();
  private dirty = false;

  constructor(
    private readonly filePath: string,
    readonly ttlMs: number = DEFAULT_TRACK_TTL_MS
  ) {}

  get size(): number {
    return this.entries.size;
  }

  async load(): Promise<void> {
    this.entries.clear();
    this.dirty = false;
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        Logger.debug(`No track cache at ${this.filePath}; starting empty.`);
        return;
      }
      Logger.warn(`${new CacheIOFailure('read', this.filePath, err).message}. Starting with an empty track cache.`);
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      Logger.warn(`${new CacheIOFailure('read', this.filePath, err).message}. Starting with an empty track cache.`);
      return;
    }
    const tracks = isRecord(parsed) ? parsed.tracks : undefined;
    if (!isRecord(tracks)) {
      Logger.warn(`Track cache ${this.filePath} has an unexpected layout; starting empty.`);
      return;
    }
    let dropped = 0;
    for (const [key, value] of Object.entries(tracks)) {
      const entry = readEntry(value);
      if (entry) this.entries.set(key, entry);
      else dropped++;
    }
    if (dropped > 0) Logger.warn(`Dropped ${dropped} unreadable track cache entr${dropped === 1 ? 'y' : 'ies'}.`);
    Logger.info(`Track cache loaded with ${this.entries.size} entries.`);
  }

  isExpired(entry: CacheEntry, now: number, ttlMs: number = this.ttlMs): boolean {
    return isExpired(entry, now, ttlMs);
  }

  lookup(key: string, now: number = Date.now()): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry || this.isExpired(entry, now)) return undefined;
    return entry;
  }

  store(key: string, track: CatalogTrackRef | null, now: number = Date.now()): void {
    const existing = this.entries.get(key);
    // A live entry resolved after `now` is fresher than what we hold; keep it
    if (existing && !this.isExpired(existing, now) && existing.resolvedAt > now) {
      return;
    }
    this.entries.set(key, { track, resolvedAt: now });
    this.dirty = true;
  }

  // Remove expired entries; returns how many were dropped
  prune(now: number = Date.now()): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) this.dirty = true;
    return removed;
  }

  // Write the whole document once per batch. Failures keep the in-memory cache.
  async flush(): Promise<boolean> {
    if (!this.dirty) return true;
    const doc: TrackCacheFile = { version: 1, tracks: Object.fromEntries(this.entries) };
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(tmp, JSON.stringify(doc, null, 2), 'utf8');
      await fs.promises.rename(tmp, this.filePath);
      this.dirty = false;
      Logger.debug(`Track cache flushed (${this.entries.size} entries) to ${this.filePath}.`);
      return true;
    } catch (err) {
      Logger.warn(`${new CacheIOFailure('write', this.filePath, err).message}. Cache kept in memory only.`);
      return false;
    }
  }
}
