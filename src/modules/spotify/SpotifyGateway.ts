import Bottleneck from 'bottleneck';
import SpotifyWebApi from 'spotify-web-api-node';
import { Logger } from '../../utils/logger.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { SpotifyRequestError } from '../../types/errors.js';
import type { RateLimitBucketConfig, SpotifyCredentials } from '../../utils/config.js';
import type { CatalogCandidate, ICatalogSearch, IPlaylistService, RemotePlaylist } from '../../types/index.js';

type ApiCall<T> = () => Promise<T>;

export interface SpotifyGatewayOptions {
  credentials: SpotifyCredentials;
  rateLimit: RateLimitBucketConfig;
  market?: string;
  searchLimit?: number;
  baseDelayMs?: number;
}

const TRANSIENT_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'ECONNREFUSED']);

function field(err: unknown, key: string): unknown {
  if (typeof err !== 'object' || err === null) return undefined;
  const value: unknown = Reflect.get(err, key);
  return value;
}

// Turn whatever spotify-web-api-node threw into a classified SpotifyRequestError
export function classifySpotifyError(err: unknown, label: string): SpotifyRequestError {
  if (err instanceof SpotifyRequestError) return err;
  const rawStatus = field(err, 'statusCode');
  const status = typeof rawStatus === 'number' ? rawStatus : null;
  const headers = field(err, 'headers');
  const retryAfter = Number(field(headers, 'retry-after')) || 0;
  const code = String(field(err, 'code') ?? '');
  const message = err instanceof Error ? err.message : String(err);
  const looksLikeTimeout = /timeout|timed out|ETIMEDOUT/i.test(message);
  const retryable =
    status === 429 ||
    (status !== null && status >= 500 && status < 600) ||
    (status === null && (TRANSIENT_CODES.has(code) || looksLikeTimeout));
  return new SpotifyRequestError(`Spotify API ${label} failed${status !== null ? ` (status ${status})` : ''}: ${message}`, {
    statusCode: status,
    retryable,
    retryAfterSeconds: retryAfter,
    body: field(err, 'body'),
  });
}

export function toCatalogCandidate(t: SpotifyApi.TrackObjectFull): CatalogCandidate {
  const candidate: CatalogCandidate = {
    id: t.id,
    uri: t.uri,
    name: t.name,
    artists: (t.artists ?? []).map((a) => a.name),
  };
  if (t.album?.name) candidate.album = t.album.name;
  if (typeof t.popularity === 'number') candidate.popularity = t.popularity;
  return candidate;
}

/**
 * Catalog search and playlist mutation over the Spotify Web API. Every request goes
 * through one Bottleneck limiter, which is the process-wide cap on outstanding calls.
 */
export class SpotifyGateway implements ICatalogSearch, IPlaylistService {
  private spotify: SpotifyWebApi;
  private limiter: Bottleneck;
  private accessTokenExpiresAt: number | null = null; // epoch ms
  private userId: string | null = null;
  private readonly market: string;
  private readonly searchLimit: number;
  private readonly baseDelayMs: number;

  constructor(opts: SpotifyGatewayOptions) {
    const { clientId, clientSecret, refreshToken } = opts.credentials;
    this.spotify = new SpotifyWebApi({ clientId, clientSecret });
    this.spotify.setRefreshToken(refreshToken);

    const { maxConcurrent, minTime } = opts.rateLimit;
    this.limiter = new Bottleneck({ maxConcurrent, minTime });
    this.market = opts.market ?? 'US';
    this.searchLimit = opts.searchLimit ?? 10;
    this.baseDelayMs = opts.baseDelayMs ?? 500;
  }

  // Ensures we have a valid access token, refreshing proactively
  private async ensureAccessToken(): Promise<void> {
    const now = Date.now();
    if (this.accessTokenExpiresAt && now < this.accessTokenExpiresAt - 60_000) {
      return; // still valid
    }

    const result = await retryWithBackoff(() => this.spotify.refreshAccessToken(), {
      maxAttempts: 3,
      baseDelayMs: 1000,
      label: 'Spotify token refresh',
    });
    if (!result.ok) {
      Logger.error('Failed to refresh Spotify access token after all retry attempts.', result.error);
      throw classifySpotifyError(result.error, 'refreshAccessToken');
    }
    const token = result.value.body.access_token;
    const expiresInSec = result.value.body.expires_in ?? 3600;
    this.spotify.setAccessToken(token);
    this.accessTokenExpiresAt = Date.now() + expiresInSec * 1000;
    Logger.debug(`Spotify access token refreshed (expires in ${Math.floor(expiresInSec / 60)} minutes).`);
  }

  private async schedule<T>(fn: ApiCall<T>, label: string, attempts = 3): Promise<T> {
    return this.limiter.schedule(async () => {
      await this.ensureAccessToken();
      const result = await retryWithBackoff(
        async () => {
          try {
            return await fn();
          } catch (err) {
            if (field(err, 'statusCode') === 401) {
              // Token revoked or expired early; refresh before the next attempt
              this.accessTokenExpiresAt = null;
              await this.ensureAccessToken();
              throw new SpotifyRequestError(`Spotify API ${label} unauthorized`, { statusCode: 401, retryable: true });
            }
            throw classifySpotifyError(err, label);
          }
        },
        { maxAttempts: attempts, baseDelayMs: this.baseDelayMs, label: `Spotify API ${label}` }
      );
      if (result.ok) return result.value;
      throw classifySpotifyError(result.error, label);
    });
  }

  private async currentUserId(): Promise<string> {
    if (this.userId) return this.userId;
    const me = await this.schedule(() => this.spotify.getMe(), 'getMe');
    this.userId = me.body.id;
    Logger.info(`Spotify client initialized for user: ${this.userId}`);
    return this.userId;
  }

  // Single attempt: the Catalog Resolver owns retries for searches
  async searchTracks(query: string): Promise<CatalogCandidate[]> {
    const data = await this.schedule(
      () => this.spotify.searchTracks(query, { limit: this.searchLimit, market: this.market }),
      'searchTracks',
      1
    );
    return (data.body.tracks?.items ?? []).map(toCatalogCandidate);
  }

  async createPlaylist(name: string, description: string): Promise<{ id: string; name: string; url?: string }> {
    await this.currentUserId();
    const res = await this.schedule(
      () => this.spotify.createPlaylist(name, { description, public: true }),
      'createPlaylist',
      5
    );
    const pl = res.body;
    return { id: pl.id, name: pl.name, url: pl.external_urls?.spotify };
  }

  async getPlaylistTrackIds(playlistId: string): Promise<Set<string>> {
    const ids = new Set<string>();
    let offset = 0;
    const limit = 100;
    while (true) {
      const res = await this.schedule(() => this.spotify.getPlaylistTracks(playlistId, { offset, limit }), 'getPlaylistTracks');
      const items = res.body.items ?? [];
      for (const it of items) {
        const id = it.track?.id;
        if (id) ids.add(id);
      }
      if (items.length < limit) break;
      offset += limit;
    }
    Logger.debug(`Playlist ${playlistId} has ${ids.size} tracks.`);
    return ids;
  }

  async appendTracks(playlistId: string, trackUris: string[]): Promise<void> {
    // Spotify API allows max 100 tracks per add request
    const batchSize = 100;
    for (let i = 0; i < trackUris.length; i += batchSize) {
      const batch = trackUris.slice(i, i + batchSize);
      await this.schedule(() => this.spotify.addTracksToPlaylist(playlistId, batch), 'addTracksToPlaylist');
      Logger.debug(`Added batch ${Math.floor(i / batchSize) + 1} to ${playlistId}: ${batch.length} tracks`);
    }
  }

  async setDescription(playlistId: string, description: string): Promise<void> {
    await this.schedule(() => this.spotify.changePlaylistDetails(playlistId, { description }), 'changePlaylistDetails');
  }

  async listPlaylists(): Promise<RemotePlaylist[]> {
    const userId = await this.currentUserId();
    const out: RemotePlaylist[] = [];
    let offset = 0;
    const limit = 50;
    // paginate through the current user's playlists
    while (true) {
      const res = await this.schedule(() => this.spotify.getUserPlaylists(userId, { limit, offset }), 'getUserPlaylists');
      const items = res.body.items ?? [];
      for (const pl of items) {
        const remote: RemotePlaylist = {
          id: pl.id,
          name: pl.name,
          description: pl.description ?? null,
          trackCount: pl.tracks?.total ?? 0,
        };
        if (pl.external_urls?.spotify) remote.url = pl.external_urls.spotify;
        out.push(remote);
      }
      if (items.length < limit) break;
      offset += limit;
    }
    Logger.info(`Fetched ${out.length} playlists from Spotify.`);
    return out;
  }
}
