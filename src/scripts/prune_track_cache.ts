import path from 'path';
import { Logger } from '../utils/logger.js';
import { loadConfig } from '../utils/config.js';
import { TrackCache } from '../modules/caches/TrackCache.js';

const DAY_MS = 24 * 60 * 60 * 1000;

// Drops expired entries from the track cache file. Usage: node dist/scripts/prune_track_cache.js [configPath]
async function main() {
  const [, , configArg] = process.argv;
  const config = loadConfig(configArg);
  const cachePath = path.resolve(config.cache.dir, 'track_cache.json');

  const cache = new TrackCache(cachePath, config.cache.trackTtlDays * DAY_MS);
  await cache.load();
  const before = cache.size;
  const removed = cache.prune(Date.now());
  if (removed === 0) {
    Logger.info(`Nothing to prune in ${cachePath} (${before} entries, TTL ${config.cache.trackTtlDays} days).`);
    return;
  }
  if (!(await cache.flush())) {
    process.exitCode = 1;
    return;
  }
  Logger.info(`Pruned ${removed} expired entr${removed === 1 ? 'y' : 'ies'}; ${cache.size} remain in ${cachePath}.`);
}

main().catch((err: unknown) => {
  Logger.error('Track cache prune failed.', err);
  process.exitCode = 1;
});
