import fs from 'fs';
import path from 'path';
import ejs from 'ejs';
import dayjs from 'dayjs';
import { parseDescription } from '../utils/playlistText.js';
import { formatUtcStamp } from '../utils/date.js';
import type { PlaylistRecord, RemotePlaylist } from '../types/index.js';

export interface IndexEntry {
  station: string;
  name: string;
  url?: string;
  trackCount: number;
  watermark: number;
  updatedAt: string | null; // ISO timestamp when known
}

interface IndexGroup {
  station: string;
  playlists: Array<{ link: string; trackCount: number; watermark: number; updated: string }>;
}

// Markdown listing of every synced playlist, grouped by station
export class PlaylistIndex {
  constructor(private readonly templatePath: string = path.resolve(process.cwd(), 'templates', 'playlists.md.ejs')) {}

  static fromState(records: Array<{ station: string; showId: string; record: PlaylistRecord }>): IndexEntry[] {
    return records.map(({ station, record }) => {
      const entry: IndexEntry = {
        station,
        name: record.name,
        trackCount: record.trackCount,
        watermark: record.watermark,
        updatedAt: record.updatedAt,
      };
      if (record.url) entry.url = record.url;
      return entry;
    });
  }

  // Only playlists this tool generated, for the configured stations
  static fromRemote(listing: RemotePlaylist[], stations: string[]): IndexEntry[] {
    const out: IndexEntry[] = [];
    for (const pl of listing) {
      const parsed = parseDescription(pl.description);
      if (!parsed.generated || !parsed.station || !stations.includes(parsed.station)) continue;
      const entry: IndexEntry = {
        station: parsed.station,
        name: pl.name,
        trackCount: pl.trackCount,
        watermark: parsed.watermark ?? 0,
        updatedAt: null,
      };
      if (pl.url) entry.url = pl.url;
      out.push(entry);
    }
    return out;
  }

  async render(entries: IndexEntry[], generatedAt: Date = new Date()): Promise<string> {
    const template = await fs.promises.readFile(this.templatePath, 'utf8');
    const byStation = new Map<string, IndexEntry[]>();
    for (const e of entries) {
      const list = byStation.get(e.station) ?? [];
      list.push(e);
      byStation.set(e.station, list);
    }
    const groups: IndexGroup[] = Array.from(byStation.keys())
      .sort((a, b) => a.localeCompare(b))
      .map((station) => ({
        station,
        playlists: (byStation.get(station) ?? [])
          .slice()
          .sort((a, b) => a.name.localeCompare(b.name))
          .map((e) => ({
            link: e.url ? `[${e.name}](${e.url})` : e.name,
            trackCount: e.trackCount,
            watermark: e.watermark,
            updated: e.updatedAt ? dayjs(e.updatedAt).format('YYYY-MM-DD') : 'unknown',
          })),
      }));

    return ejs.render(template, {
      generatedAt: formatUtcStamp(generatedAt),
      total: entries.length,
      groups,
    });
  }
}
