import { normalizeKey } from '../utils/matching.js';
import type { CatalogCandidate, ICatalogSearch, IPlaylistService, RemotePlaylist } from '../types/index.js';

export function track(id: string, name: string, artist: string, album?: string, popularity?: number): CatalogCandidate {
  const c: CatalogCandidate = { id, uri: `spotify:track:${id}`, name, artists: [artist] };
  if (album) c.album = album;
  if (popularity !== undefined) c.popularity = popularity;
  return c;
}

/**
 * In-memory catalog. A query returns every track by the queried artist, narrowed to the
 * queried album when the query names one; the matcher is left to judge titles.
 */
export class FakeCatalog implements ICatalogSearch {
  readonly queries: string[] = [];
  private failures: unknown[] = [];

  constructor(private readonly tracks: CatalogCandidate[]) {}

  // The next `times` searches reject with `error`
  failNext(error: unknown, times = 1): void {
    for (let i = 0; i < times; i++) this.failures.push(error);
  }

  async searchTracks(query: string): Promise<CatalogCandidate[]> {
    this.queries.push(query);
    if (this.failures.length > 0) throw this.failures.shift();
    const m = query.match(/^track:(.*) artist:(.*?)(?: album:(.*))?$/);
    if (!m) return [];
    const artist = normalizeKey(m[2] ?? '');
    const album = m[3] ? normalizeKey(m[3]) : null;
    return this.tracks.filter(
      (t) => t.artists.some((a) => normalizeKey(a) === artist) && (album === null || normalizeKey(t.album ?? '') === album)
    );
  }
}

interface FakePlaylist {
  name: string;
  description: string;
  uris: string[];
}

export class FakePlaylistService implements IPlaylistService {
  readonly playlists = new Map<string, FakePlaylist>();
  created = 0;
  reads = 0;
  appendCalls = 0;
  descriptionWrites = 0;
  failCreate: Error | null = null;
  // Append calls numbered from 1 that reject
  failAppendOn = new Set<number>();
  private nextId = 1;

  get mutations(): number {
    return this.created + this.appendCalls + this.descriptionWrites;
  }

  seed(id: string, name: string, description: string, uris: string[] = []): void {
    this.playlists.set(id, { name, description, uris: [...uris] });
  }

  tracksOf(id: string): string[] {
    return this.playlists.get(id)?.uris ?? [];
  }

  async createPlaylist(name: string, description: string): Promise<{ id: string; name: string; url?: string }> {
    if (this.failCreate) throw this.failCreate;
    this.created++;
    const id = `pl-${this.nextId++}`;
    this.playlists.set(id, { name, description, uris: [] });
    return { id, name, url: `https://open.spotify.com/playlist/${id}` };
  }

  async getPlaylistTrackIds(playlistId: string): Promise<Set<string>> {
    this.reads++;
    return new Set(this.tracksOf(playlistId).map((uri) => uri.replace('spotify:track:', '')));
  }

  async appendTracks(playlistId: string, trackUris: string[]): Promise<void> {
    this.appendCalls++;
    if (this.failAppendOn.has(this.appendCalls)) throw new Error('Service Unavailable');
    const pl = this.playlists.get(playlistId);
    if (!pl) throw new Error(`No playlist ${playlistId}`);
    pl.uris.push(...trackUris);
  }

  async setDescription(playlistId: string, description: string): Promise<void> {
    this.descriptionWrites++;
    const pl = this.playlists.get(playlistId);
    if (pl) pl.description = description;
  }

  async listPlaylists(): Promise<RemotePlaylist[]> {
    return Array.from(this.playlists.entries()).map(([id, pl]) => ({
      id,
      name: pl.name,
      description: pl.description,
      trackCount: pl.uris.length,
      url: `https://open.spotify.com/playlist/${id}`,
    }));
  }
}
