import { Logger } from '../../utils/logger.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { SongMatcher, buildCacheKey, DEFAULT_MATCH_POLICY } from '../../utils/matching.js';
import type { RetryOptions } from '../../utils/retry.js';
import type { MatchPolicy } from '../../utils/matching.js';
import { ResolutionFailure } from '../../types/errors.js';
import type { CatalogCandidate, CatalogTrackRef, ICatalogSearch, ResolveOutcome, Spin } from '../../types/index.js';
import type { TrackCache } from '../caches/TrackCache.js';

export interface CatalogResolverOptions {
  policy?: MatchPolicy;
  retry?: Omit<RetryOptions, 'label'>;
  // Dry runs: answer from the cache only, never search
  cacheOnly?: boolean;
  now?: () => number;
}

type SearchResult = { ok: true; candidates: CatalogCandidate[] } | { ok: false; failure: ResolutionFailure };

export class CatalogResolver {
  private readonly policy: MatchPolicy;
  private readonly retry: Omit<RetryOptions, 'label'>;
  private readonly cacheOnly: boolean;
  private readonly now: () => number;
  // Concurrent resolutions of the same key share one search
  private inFlight: Map<string, Promise<ResolveOutcome>> = new Map();
  private searches = 0;

  constructor(
    private readonly cache: TrackCache,
    private readonly catalog: ICatalogSearch | null,
    opts: CatalogResolverOptions = {}
  ) {
    this.policy = opts.policy ?? DEFAULT_MATCH_POLICY;
    this.retry = opts.retry ?? { maxAttempts: 4, baseDelayMs: 500 };
    this.cacheOnly = opts.cacheOnly ?? catalog === null;
    this.now = opts.now ?? Date.now;
  }

  // Number of catalog search requests issued (including retries)
  get searchCount(): number {
    return this.searches;
  }

  async resolve(spin: Spin): Promise<ResolveOutcome> {
    const key = buildCacheKey(spin.artist, spin.title);
    const hit = this.cache.lookup(key, this.now());
    if (hit) {
      Logger.debug(`Track cache hit: ${key} -> ${hit.track ? hit.track.trackId : 'not found'}`);
      return hit.track ? { kind: 'found', track: hit.track, cached: true } : { kind: 'not_found', cached: true };
    }

    if (this.cacheOnly || !this.catalog) {
      return { kind: 'unavailable', reason: 'not cached (cache-only mode)' };
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const work = this.resolveUncached(key, spin).finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, work);
    return work;
  }

  private async resolveUncached(key: string, spin: Spin): Promise<ResolveOutcome> {
    const queries = SongMatcher.buildQueries(spin);
    let candidates: CatalogCandidate[] = [];
    for (const q of queries) {
      const result = await this.search(q);
      if (!result.ok) {
        // Not cached; the next run searches again
        Logger.warn(`${result.failure.message}. Leaving "${spin.artist} - ${spin.title}" for the next run.`);
        return { kind: 'unavailable', reason: result.failure.message };
      }
      if (result.candidates.length > 0) {
        candidates = result.candidates;
        break;
      }
    }

    const best = SongMatcher.pickBest(spin, candidates, this.policy);
    if (!best) {
      Logger.info(`No catalog match: ${spin.artist} - ${spin.title}`);
      this.cache.store(key, null, this.now());
      return { kind: 'not_found', cached: false };
    }

    const track: CatalogTrackRef = { trackId: best.candidate.id, uri: best.candidate.uri };
    if (best.candidate.album) track.album = best.candidate.album;
    this.cache.store(key, track, this.now());
    Logger.debug(
      `Match found: ${spin.artist} - ${spin.title} -> ${best.candidate.artists.join(', ')} - ${best.candidate.name} ` +
        `(${(best.confidence * 100).toFixed(1)}%${best.exact ? ', exact' : ''}${best.albumMatch ? ', album' : ''})`
    );
    return { kind: 'found', track, cached: false, confidence: best.confidence };
  }

  private async search(query: string): Promise<SearchResult> {
    const catalog = this.catalog;
    if (!catalog) return { ok: true, candidates: [] };
    Logger.debug(`Searching catalog for: ${query}`);
    const result = await retryWithBackoff(
      () => {
        this.searches++;
        return catalog.searchTracks(query);
      },
      { ...this.retry, label: 'Catalog search' }
    );
    if (result.ok) return { ok: true, candidates: result.value };
    return { ok: false, failure: new ResolutionFailure(query, result.attempts, result.retryable, result.error) };
  }
}
