import fs from 'fs';
import path from 'path';
import { Logger } from '../../utils/logger.js';
import { daysInWindow } from '../../utils/date.js';
import type { DateWindow, ISpinSource, RawSpin } from '../../types/index.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function idValue(value: unknown): string | number | null {
  if (typeof value === 'number' || typeof value === 'string') return value;
  return null;
}

// Accepts the field names of the scheduling service export as well as our own.
// The directory decides the station; a record naming another one is not read.
function toRawSpin(value: unknown, station: string): RawSpin | null {
  if (!isRecord(value)) return null;
  const claimed = text(value.station);
  if (claimed !== null && claimed.trim() !== station) return null;
  return {
    station,
    showId: idValue(value.showId ?? value.show_id),
    showName: text(value.showName ?? value.show_name ?? value.show),
    artist: text(value.artist),
    title: text(value.title ?? value.song),
    album: text(value.album ?? value.release),
    label: text(value.label),
    sourceId: idValue(value.sourceId ?? value.id),
    playedAt: text(value.playedAt ?? value.start),
  };
}

/**
 * Reads exported spin logs from disk: one JSON file per station and day, at
 * `<dir>/<station>/<YYYY-MM-DD>.json`.
 */
export class JsonSpinSource implements ISpinSource {
  constructor(private readonly dir: string) {}

  async fetchSpins(station: string, window: DateWindow): Promise<RawSpin[]> {
    const spins: RawSpin[] = [];
    for (const day of daysInWindow(window)) {
      const file = path.join(this.dir, station, `${day}.json`);
      let content: string;
      try {
        content = await fs.promises.readFile(file, 'utf8');
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
          Logger.debug(`No spins for ${station} on ${day} (${file}).`);
          continue;
        }
        throw err;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch (err) {
        Logger.error(`Could not parse spin file ${file}; skipping it.`, err);
        continue;
      }
      const items = Array.isArray(parsed) ? parsed : isRecord(parsed) && Array.isArray(parsed.spins) ? parsed.spins : null;
      if (!items) {
        Logger.error(`Spin file ${file} holds neither an array nor a "spins" list; skipping it.`);
        continue;
      }

      let unreadable = 0;
      for (const item of items) {
        const raw = toRawSpin(item, station);
        if (raw) spins.push(raw);
        else unreadable++;
      }
      if (unreadable > 0) {
        Logger.warn(`${file}: ignored ${unreadable} entr${unreadable === 1 ? 'y' : 'ies'} that are not objects or name another station.`);
      }
    }
    Logger.info(`Loaded ${spins.length} spins for ${station} (${window.start} to ${window.end}).`);
    return spins;
  }
}
