#!/usr/bin/env node
import path from 'path';
import { Command } from 'commander';
import { Logger } from './utils/logger.js';
import { loadConfig, loadSpotifyCredentials } from './utils/config.js';
import { ConfigError } from './types/errors.js';
import { SpinNormalizer } from './modules/normalizers/SpinNormalizer.js';
import { JsonSpinSource } from './modules/sources/JsonSpinSource.js';
import { TrackCache } from './modules/caches/TrackCache.js';
import { PlaylistStateCache } from './modules/caches/PlaylistStateCache.js';
import { CatalogResolver } from './modules/resolvers/CatalogResolver.js';
import { PlaylistReconciler } from './modules/reconcilers/PlaylistReconciler.js';
import { SpotifyGateway } from './modules/spotify/SpotifyGateway.js';
import { WorkflowService } from './services/WorkflowService.js';
import { PlaylistIndex } from './services/PlaylistIndex.js';
import type { IndexEntry } from './services/PlaylistIndex.js';

type CliOptions = {
  config?: string;
  date?: string;
  spotify?: boolean;
  refreshPlaylists?: boolean;
  listPlaylists?: boolean;
  concurrency?: number;
};

const DAY_MS = 24 * 60 * 60 * 1000;

const program = new Command();

program
  .name('radio-spin-sync')
  .description('Mirrors radio station spin logs into one Spotify playlist per show.')
  .option('-c, --config <path>', 'Path to the YAML configuration file')
  .option('--date <YYYY-MM-DD>', 'Last day of the lookback window (default: yesterday)')
  .option('--spotify', 'Search Spotify and update playlists (without it, a dry run against cached state)')
  .option('--refresh-playlists', 'Rebuild the playlist cache from Spotify before syncing')
  .option('--list-playlists', 'Print a markdown index of synced playlists and exit')
  .option('--concurrency <n>', 'Number of shows reconciled in parallel', (v) => parseInt(v, 10));

async function main(options: CliOptions): Promise<void> {
  const config = loadConfig(options.config);
  const cacheDir = path.resolve(config.cache.dir);
  const trackCache = new TrackCache(path.join(cacheDir, 'track_cache.json'), config.cache.trackTtlDays * DAY_MS);
  const stateCache = new PlaylistStateCache(path.join(cacheDir, 'playlist_cache.json'));
  await trackCache.load();
  await stateCache.load();

  const gateway = options.spotify
    ? new SpotifyGateway({
        credentials: loadSpotifyCredentials(),
        rateLimit: config.rateLimit.spotify,
        market: config.spotify.market,
        baseDelayMs: config.retry.baseDelayMs,
      })
    : null;
  if (gateway && config.dryRun) {
    Logger.info('dryRun is set in the configuration; Spotify playlists will not be modified.');
  }

  if (options.listPlaylists) {
    let entries: IndexEntry[];
    if (gateway) {
      entries = PlaylistIndex.fromRemote(await gateway.listPlaylists(), Object.keys(config.stations));
    } else {
      entries = PlaylistIndex.fromState(stateCache.all());
    }
    process.stdout.write(await new PlaylistIndex().render(entries));
    return;
  }

  const playlists = gateway && !config.dryRun ? gateway : null;
  const resolver = new CatalogResolver(trackCache, gateway, {
    policy: config.matching,
    retry: config.retry,
    cacheOnly: playlists === null,
  });
  const reconciler = new PlaylistReconciler(stateCache, resolver, playlists);
  const workflow = new WorkflowService({
    config,
    source: new JsonSpinSource(path.resolve(config.spins.dir)),
    normalizer: new SpinNormalizer(),
    reconciler,
    trackCache,
    stateCache,
    playlists,
  });

  // Refresh needs the listing even in a dry run
  if (options.refreshPlaylists && gateway && !playlists) {
    stateCache.refreshFromRemote(await gateway.listPlaylists(), Object.keys(config.stations));
  }

  const summary = await workflow.run({
    endDate: options.date,
    refresh: Boolean(options.refreshPlaylists) && playlists !== null,
    concurrency: options.concurrency && !Number.isNaN(options.concurrency) ? options.concurrency : undefined,
  });
  Logger.info(`Catalog searches issued: ${resolver.searchCount}.`);
  if (summary.failures > 0) process.exitCode = 1;
}

program.parse(process.argv);

main(program.opts<CliOptions>()).catch((err: unknown) => {
  if (err instanceof ConfigError) {
    Logger.error(err.message);
    process.exitCode = 2;
    return;
  }
  Logger.error('Sync failed.', err);
  process.exitCode = 1;
});
