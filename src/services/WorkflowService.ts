import Bottleneck from 'bottleneck';
import { Logger } from '../utils/logger.js';
import { lookbackWindow } from '../utils/date.js';
import { buildPlaylistName } from '../utils/playlistText.js';
import { compileIgnorePatterns } from '../modules/normalizers/SpinNormalizer.js';
import type { AppConfig } from '../utils/config.js';
import type { SpinNormalizer } from '../modules/normalizers/SpinNormalizer.js';
import type { PlaylistReconciler } from '../modules/reconcilers/PlaylistReconciler.js';
import type { TrackCache } from '../modules/caches/TrackCache.js';
import type { PlaylistStateCache } from '../modules/caches/PlaylistStateCache.js';
import type { CanonicalTrackList, IPlaylistService, ISpinSource, ReconcileResult, RunSummary } from '../types/index.js';

export interface WorkflowDeps {
  config: AppConfig;
  source: ISpinSource;
  normalizer: SpinNormalizer;
  reconciler: PlaylistReconciler;
  trackCache: TrackCache;
  stateCache: PlaylistStateCache;
  // null means a dry run: cached state only, nothing is mutated
  playlists: IPlaylistService | null;
}

export interface RunOptions {
  endDate?: string; // YYYY-MM-DD, last day of the lookback window
  refresh?: boolean; // rebuild the playlist cache from the remote listing first
  concurrency?: number;
}

export class WorkflowService {
  constructor(private readonly deps: WorkflowDeps) {}

  private get dryRun(): boolean {
    return this.deps.config.dryRun || this.deps.playlists === null;
  }

  async run(opts: RunOptions = {}): Promise<RunSummary> {
    const { config, source, normalizer, trackCache, stateCache } = this.deps;
    const window = lookbackWindow(config.lookbackDays, opts.endDate);
    Logger.info(`Sync run started. dryRun=${this.dryRun}. Window ${window.start} to ${window.end}.`);

    if (opts.refresh) await this.refreshPlaylistState();

    const summary: RunSummary = {
      results: [],
      spinsProcessed: 0,
      resolved: 0,
      skipped: 0,
      playlistsCreated: 0,
      playlistsUpdated: 0,
      failures: 0,
      malformed: 0,
      ignored: 0,
    };

    const shows: CanonicalTrackList[] = [];
    for (const [station, stationConfig] of Object.entries(config.stations)) {
      try {
        const raw = await source.fetchSpins(station, window);
        const normalized = normalizer.normalize(raw, compileIgnorePatterns(stationConfig.ignores));
        summary.malformed += normalized.malformed.length;
        summary.ignored += normalized.ignored;
        if (normalized.ignored > 0) Logger.info(`${station}: ignored ${normalized.ignored} spin(s) from excluded shows.`);
        shows.push(...normalized.shows);
      } catch (err) {
        // One station's source failing must not stop the others
        summary.failures++;
        Logger.error(`Failed to load spins for ${station}. Continuing with next station.`, err);
      }
    }

    if (shows.length === 0) {
      Logger.warn('No shows with spins in the window. Nothing to process.');
    } else {
      summary.results = await this.reconcileAll(shows, opts.concurrency ?? config.concurrency.shows);
    }

    // Caches are written once per batch
    await trackCache.flush();
    await stateCache.flush();

    for (const r of summary.results) {
      summary.spinsProcessed += r.pending;
      summary.resolved += r.resolved;
      summary.skipped += r.skipped;
      if (r.status === 'created') summary.playlistsCreated++;
      else if (r.status === 'updated') summary.playlistsUpdated++;
      else if (r.status === 'failed') summary.failures++;
    }

    Logger.info(
      `Sync run finished. Shows=${summary.results.length}, Spins=${summary.spinsProcessed}, Resolved=${summary.resolved}, ` +
        `Skipped=${summary.skipped}, Created=${summary.playlistsCreated}, Updated=${summary.playlistsUpdated}, ` +
        `Failures=${summary.failures}, Malformed=${summary.malformed}, Ignored=${summary.ignored}.`
    );
    return summary;
  }

  private async reconcileAll(shows: CanonicalTrackList[], concurrency: number): Promise<ReconcileResult[]> {
    const { reconciler } = this.deps;
    const pool = new Bottleneck({ maxConcurrent: Math.max(1, Math.floor(concurrency)) });
    Logger.info(`Reconciling ${shows.length} show(s) with ${Math.max(1, Math.floor(concurrency))} worker(s)...`);

    return Promise.all(
      shows.map((list) =>
        pool.schedule(async (): Promise<ReconcileResult> => {
          try {
            return this.dryRun ? await reconciler.preview(list) : await reconciler.reconcile(list);
          } catch (err) {
            Logger.error(`Error reconciling ${list.station} / ${list.showName}. Continuing with next show.`, err);
            return {
              station: list.station,
              showId: list.showId,
              playlistName: buildPlaylistName(list.station, list.showName),
              playlistId: null,
              status: 'failed',
              pending: 0,
              resolved: 0,
              skipped: 0,
              unavailable: 0,
              duplicates: 0,
              appended: 0,
              watermarkBefore: 0,
              watermarkAfter: 0,
              error: err instanceof Error ? err.message : String(err),
            };
          }
        })
      )
    );
  }

  private async refreshPlaylistState(): Promise<void> {
    const { playlists, stateCache, config } = this.deps;
    if (!playlists) {
      Logger.warn('Playlist refresh needs Spotify access; keeping the local playlist cache.');
      return;
    }
    try {
      Logger.info('Refreshing playlist cache from Spotify...');
      const listing = await playlists.listPlaylists();
      stateCache.refreshFromRemote(listing, Object.keys(config.stations));
    } catch (err) {
      Logger.error('Failed to refresh playlists from Spotify; using the local playlist cache.', err);
    }
  }
}
