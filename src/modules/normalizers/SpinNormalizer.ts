import { Logger } from '../../utils/logger.js';
import { slugify } from '../../utils/playlistText.js';
import { MalformedSpinError } from '../../types/errors.js';
import type { CanonicalTrackList, RawSpin, Spin } from '../../types/index.js';

export interface NormalizeResult {
  shows: CanonicalTrackList[];
  malformed: MalformedSpinError[];
  ignored: number;
}

export function sanitizeText(input: string | number | undefined | null): string {
  if (input === undefined || input === null) return '';
  // Normalize whitespace and trim common punctuation artifacts
  return String(input)
    .replace(/\s+/g, ' ') // collapse whitespace
    .replace(/[\u2018\u2019]/g, "'") // smart single quotes
    .replace(/[\u201C\u201D]/g, '"') // smart double quotes
    .replace(/^[-–—\s]+|[-–—\s]+$/g, '') // leading/trailing dashes
    .trim();
}

// Dedup key: lowercased, whitespace-collapsed artist + title
export function trackIdentity(artist: string, title: string): string {
  const norm = (s: string) => s.toLowerCase().replace(/\s+/g, ' ').trim();
  return `${norm(artist)}\u0000${norm(title)}`;
}

function parseSourceId(value: RawSpin['sourceId']): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value > 0 ? value : null;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    const n = Number(value.trim());
    return Number.isSafeInteger(n) && n > 0 ? n : null;
  }
  return null;
}

export function compileIgnorePatterns(patterns: string[]): RegExp[] {
  const compiled: RegExp[] = [];
  for (const pattern of patterns) {
    try {
      compiled.push(new RegExp(pattern));
    } catch (err) {
      Logger.warn(`Invalid ignore pattern '${pattern}': ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  return compiled;
}

export class SpinNormalizer {
  normalize(rawSpins: RawSpin[], ignorePatterns: RegExp[]): NormalizeResult {
    const malformed: MalformedSpinError[] = [];
    let ignored = 0;
    const groups = new Map<string, { list: CanonicalTrackList; byTrack: Map<string, Spin>; seenIds: Set<number> }>();

    for (const raw of rawSpins) {
      const showName = sanitizeText(raw.showName);
      const rawId = raw.sourceId ?? null;

      if (showName && ignorePatterns.some((re) => re.test(showName))) {
        ignored++;
        continue;
      }

      const spin = this.toSpin(raw, showName);
      if (spin instanceof MalformedSpinError) {
        Logger.debug(spin.message);
        malformed.push(spin);
        continue;
      }

      const groupKey = `${spin.station}\u0000${spin.showId}`;
      let group = groups.get(groupKey);
      if (!group) {
        group = {
          list: { station: spin.station, showId: spin.showId, showName: spin.showName, spins: [] },
          byTrack: new Map(),
          seenIds: new Set(),
        };
        groups.set(groupKey, group);
      }

      // Source ids are unique per station; a repeat is the same event exported twice
      if (group.seenIds.has(spin.sourceId)) {
        Logger.debug(`Duplicate source id ${rawId} in ${spin.showName}; keeping the first record.`);
        continue;
      }
      group.seenIds.add(spin.sourceId);

      const identity = trackIdentity(spin.artist, spin.title);
      const existing = group.byTrack.get(identity);
      if (!existing || spin.sourceId > existing.sourceId) {
        group.byTrack.set(identity, spin);
      }
    }

    const shows: CanonicalTrackList[] = [];
    for (const { list, byTrack } of groups.values()) {
      list.spins = Array.from(byTrack.values()).sort((a, b) => a.sourceId - b.sourceId);
      // Show name follows the most recent spin in case the station renamed the slot
      const latest = list.spins[list.spins.length - 1];
      if (latest) list.showName = latest.showName;
      shows.push(list);
    }

    if (malformed.length > 0) {
      Logger.warn(`Skipped ${malformed.length} malformed spin(s).`);
    }
    return { shows, malformed, ignored };
  }

  private toSpin(raw: RawSpin, showName: string): Spin | MalformedSpinError {
    const rawId = raw.sourceId ?? null;
    const station = sanitizeText(raw.station);
    const artist = sanitizeText(raw.artist);
    const title = sanitizeText(raw.title);
    const sourceId = parseSourceId(raw.sourceId);

    if (!station) return new MalformedSpinError('missing station', rawId, showName || null);
    if (!showName) return new MalformedSpinError('missing show name', rawId, null);
    if (sourceId === null) return new MalformedSpinError('source id is not a positive integer', rawId, showName);
    if (!artist) return new MalformedSpinError('empty artist', rawId, showName);
    if (!title) return new MalformedSpinError('empty title', rawId, showName);

    const showId = sanitizeText(raw.showId) || slugify(showName) || showName;
    const album = sanitizeText(raw.album);
    const label = sanitizeText(raw.label);
    const playedAt = sanitizeText(raw.playedAt);

    const spin: Spin = { station, showId, showName, artist, title, sourceId, playedAt: playedAt || null };
    if (album) spin.album = album;
    if (label) spin.label = label;
    return spin;
  }
}
