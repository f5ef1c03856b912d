// Raw spin as exported by the station's scheduling service. Nothing here is trusted.
export interface RawSpin {
  station?: string | null;
  showId?: string | number | null;
  showName?: string | null;
  artist?: string | null;
  title?: string | null;
  album?: string | null;
  label?: string | null;
  sourceId?: string | number | null; // scheduling service event id
  playedAt?: string | null; // ISO timestamp
}

export interface Spin {
  station: string;
  showId: string;
  showName: string;
  artist: string;
  title: string;
  album?: string;
  label?: string;
  sourceId: number;
  playedAt: string | null;
}

// Spins of one show, deduplicated by (artist, title) and ascending by sourceId
export interface CanonicalTrackList {
  station: string;
  showId: string;
  showName: string;
  spins: Spin[];
}

export interface DateWindow {
  start: string; // YYYY-MM-DD, inclusive
  end: string; // YYYY-MM-DD, inclusive
}

// Catalog-side summaries; SDK types stay inside the gateway
export interface CatalogCandidate {
  id: string;
  uri: string;
  name: string;
  artists: string[]; // display names of artists
  album?: string;
  popularity?: number; // 0..100 when the catalog reports it
}

export interface TrackMatch {
  candidate: CatalogCandidate;
  confidence: number; // 0..1
  exact: boolean;
  albumMatch: boolean;
}

export interface CatalogTrackRef {
  trackId: string;
  uri: string;
  album?: string;
}

export interface CacheEntry {
  track: CatalogTrackRef | null; // null = catalog has no acceptable match
  resolvedAt: number; // epoch ms
}

export type ResolveOutcome =
  | { kind: 'found'; track: CatalogTrackRef; cached: boolean; confidence?: number }
  | { kind: 'not_found'; cached: boolean }
  | { kind: 'unavailable'; reason: string };

export interface PlaylistRecord {
  playlistId: string;
  name: string; // "Station - Show"
  watermark: number; // highest sourceId already reflected in the playlist; 0 = none
  trackCount: number;
  url?: string;
  updatedAt: string; // ISO
}

export interface RemotePlaylist {
  id: string;
  name: string;
  description: string | null;
  trackCount: number;
  url?: string;
}

export type ReconcileStatus = 'created' | 'updated' | 'unchanged' | 'failed' | 'preview';

export interface ReconcileResult {
  station: string;
  showId: string;
  playlistName: string;
  playlistId: string | null;
  status: ReconcileStatus;
  pending: number;
  resolved: number;
  skipped: number; // not found in the catalog
  unavailable: number; // transient failures, retried next run
  duplicates: number;
  appended: number;
  watermarkBefore: number;
  watermarkAfter: number;
  error?: string;
}

export interface RunSummary {
  results: ReconcileResult[];
  spinsProcessed: number;
  resolved: number;
  skipped: number;
  playlistsCreated: number;
  playlistsUpdated: number;
  failures: number;
  malformed: number;
  ignored: number;
}

// Boundary collaborators
export interface ISpinSource {
  fetchSpins(station: string, window: DateWindow): Promise<RawSpin[]>;
}

export interface ICatalogSearch {
  searchTracks(query: string): Promise<CatalogCandidate[]>;
}

export interface IPlaylistService {
  createPlaylist(name: string, description: string): Promise<{ id: string; name: string; url?: string }>;
  getPlaylistTrackIds(playlistId: string): Promise<Set<string>>;
  appendTracks(playlistId: string, trackUris: string[]): Promise<void>;
  setDescription(playlistId: string, description: string): Promise<void>;
  listPlaylists(): Promise<RemotePlaylist[]>;
}
