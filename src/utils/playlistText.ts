import { formatUtcStamp } from './date.js';

export const DESCRIPTION_MARKER = 'Generated from Spinitron playlists.';
export const MAX_NAME_LENGTH = 100;
export const MAX_DESCRIPTION_LENGTH = 300;

// Spotify rejects some show-name glyphs; keep names plain ASCII
export function sanitizeShowName(showName: string): string {
  return showName
    .replace(/\(\(\(\u221e\)\)\)/g, 'Infinity')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#0?39;/g, "'")
    .replace(/[^\x20-\x7e]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function buildPlaylistName(station: string, showName: string): string {
  return `${station} - ${sanitizeShowName(showName)}`;
}

export function slugify(input: string): string {
  return input
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export interface DescriptionFields {
  station: string;
  showName: string;
  showId: string;
  watermark: number;
  updatedAt?: Date;
}

export function buildDescription(fields: DescriptionFields): string {
  const updated = `Last updated: ${formatUtcStamp(fields.updatedAt)}`;
  const tail = `Show ID: ${fields.showId} Latest ID: ${fields.watermark} ${updated}`;
  const full = `${DESCRIPTION_MARKER} Station: ${fields.station} Show: ${sanitizeShowName(fields.showName)} ${tail}`;
  if (full.length <= MAX_DESCRIPTION_LENGTH) return full;
  return `${DESCRIPTION_MARKER} Station: ${fields.station} ${tail}`;
}

export interface ParsedDescription {
  generated: boolean;
  station?: string;
  showId?: string;
  watermark?: number;
}

export function parseDescription(description: string | null | undefined): ParsedDescription {
  const text = description ?? '';
  const out: ParsedDescription = { generated: text.includes(DESCRIPTION_MARKER) };
  const station = text.match(/Station:\s*(\S+)/);
  if (station) out.station = station[1];
  // Show ids are free text and may hold spaces; the id runs up to the next field
  const showId = text.match(/Show ID:\s*(.+?)\s+Latest ID:/);
  if (showId) out.showId = showId[1];
  const latest = text.match(/Latest ID:\s*(\d+)/);
  if (latest) out.watermark = Number(latest[1]);
  return out;
}
