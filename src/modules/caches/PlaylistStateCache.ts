import fs from 'fs';
import path from 'path';
import { Logger } from '../../utils/logger.js';
import { CacheIOFailure } from '../../types/errors.js';
import { parseDescription, slugify } from '../../utils/playlistText.js';
import type { PlaylistRecord, RemotePlaylist } from '../../types/index.js';

interface PlaylistCacheFile {
  version: 1;
  playlists: Record<string, PlaylistRecord>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRecord(value: unknown): PlaylistRecord | undefined {
  if (!isRecord(value)) return undefined;
  const { playlistId, name, watermark, trackCount, url, updatedAt } = value;
  if (typeof playlistId !== 'string' || typeof name !== 'string') return undefined;
  if (typeof watermark !== 'number' || !Number.isFinite(watermark) || watermark < 0) return undefined;
  const record: PlaylistRecord = {
    playlistId,
    name,
    watermark,
    trackCount: typeof trackCount === 'number' ? trackCount : 0,
    updatedAt: typeof updatedAt === 'string' ? updatedAt : new Date(0).toISOString(),
  };
  if (typeof url === 'string') record.url = url;
  return record;
}

export function stateKey(station: string, showId: string): string {
  return `${station}::${showId}`;
}

export function splitStateKey(key: string): { station: string; showId: string } {
  const idx = key.indexOf('::');
  if (idx === -1) return { station: '', showId: key };
  return { station: key.slice(0, idx), showId: key.slice(idx + 2) };
}

/**
 * Persisted (station, show) -> playlist record map. A missing record only means the
 * show has no playlist yet.
 */
export class PlaylistStateCache {
  private records: Map<string, PlaylistRecord> = new Map();
  private dirty = false;

  constructor(private readonly filePath: string) {}

  get size(): number {
    return this.records.size;
  }

  async load(): Promise<void> {
    this.records.clear();
    this.dirty = false;
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.promises.readFile(this.filePath, 'utf8'));
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        Logger.debug(`No playlist cache at ${this.filePath}; starting empty.`);
      } else {
        Logger.warn(`${new CacheIOFailure('read', this.filePath, err).message}. Starting with an empty playlist cache.`);
      }
      return;
    }
    const playlists = isRecord(parsed) ? parsed.playlists : undefined;
    if (!isRecord(playlists)) {
      Logger.warn(`Playlist cache ${this.filePath} has an unexpected layout; starting empty.`);
      return;
    }
    for (const [key, value] of Object.entries(playlists)) {
      const record = readRecord(value);
      if (record) this.records.set(key, record);
    }
    Logger.info(`Playlist cache loaded with ${this.records.size} playlists.`);
  }

  get(station: string, showId: string): PlaylistRecord | undefined {
    const record = this.records.get(stateKey(station, showId));
    return record ? { ...record } : undefined;
  }

  put(station: string, showId: string, record: PlaylistRecord): void {
    this.records.set(stateKey(station, showId), { ...record });
    this.dirty = true;
  }

  all(): Array<{ station: string; showId: string; record: PlaylistRecord }> {
    return Array.from(this.records.entries()).map(([key, record]) => ({ ...splitStateKey(key), record: { ...record } }));
  }

  /**
   * Replace every record with what the remote playlist listing says. Returns how many
   * playlists were recognised.
   */
  refreshFromRemote(listing: RemotePlaylist[], stations: string[], now: Date = new Date()): number {
    const next = new Map<string, PlaylistRecord>();
    for (const pl of listing) {
      const parsed = parseDescription(pl.description);
      const namePrefix = stations.find((s) => pl.name.startsWith(`${s} - `));
      const ours = parsed.generated || (namePrefix !== undefined && parsed.watermark !== undefined);
      if (!ours) continue;

      const station = parsed.station && stations.includes(parsed.station) ? parsed.station : namePrefix;
      if (!station) {
        Logger.debug(`Skipping playlist "${pl.name}": station not configured.`);
        continue;
      }
      const showPart = pl.name.startsWith(`${station} - `) ? pl.name.slice(station.length + 3) : pl.name;
      const showId = parsed.showId ?? slugify(showPart);
      if (!showId) continue;

      const key = stateKey(station, showId);
      const watermark = parsed.watermark ?? 0;
      const current = next.get(key);
      // Two remote playlists for one show: keep the one that got further
      if (current && current.watermark >= watermark) {
        Logger.warn(`Duplicate remote playlist for ${key}: "${pl.name}" (${pl.id}) ignored.`);
        continue;
      }
      const record: PlaylistRecord = {
        playlistId: pl.id,
        name: pl.name,
        watermark,
        trackCount: pl.trackCount,
        updatedAt: now.toISOString(),
      };
      if (pl.url) record.url = pl.url;
      next.set(key, record);
    }
    this.records = next;
    this.dirty = true;
    Logger.info(`Refreshed playlist cache with ${next.size} playlists from the remote listing.`);
    return next.size;
  }

  async flush(): Promise<boolean> {
    if (!this.dirty) return true;
    const doc: PlaylistCacheFile = { version: 1, playlists: Object.fromEntries(this.records) };
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(tmp, JSON.stringify(doc, null, 2), 'utf8');
      await fs.promises.rename(tmp, this.filePath);
      this.dirty = false;
      return true;
    } catch (err) {
      Logger.warn(`${new CacheIOFailure('write', this.filePath, err).message}. Playlist state kept in memory only.`);
      return false;
    }
  }
}
