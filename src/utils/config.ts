import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError } from '../types/errors.js';

export interface StationConfig {
  // Regular expressions tested against show names; matching shows are never synced
  ignores: string[];
}

export interface CacheConfig {
  dir: string;
  trackTtlDays: number;
}

export interface SpinsConfig {
  dir: string;
}

export interface MatchingConfig {
  minSimilarity: number; // 0..1
  artistWeight: number; // 0..1, title gets the remainder
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
}

export interface ConcurrencyConfig {
  shows: number;
}

export interface RateLimitBucketConfig {
  maxConcurrent: number;
  minTime: number;
}

export interface RateLimitConfig {
  spotify: RateLimitBucketConfig;
}

export interface SpotifyConfig {
  market: string;
}

export interface SpotifyCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface AppConfig {
  dryRun: boolean;
  lookbackDays: number;
  stations: Record<string, StationConfig>;
  cache: CacheConfig;
  spins: SpinsConfig;
  matching: MatchingConfig;
  retry: RetryConfig;
  concurrency: ConcurrencyConfig;
  rateLimit: RateLimitConfig;
  spotify: SpotifyConfig;
}

export const DEFAULT_CONFIG: Omit<AppConfig, 'stations'> = {
  dryRun: false,
  lookbackDays: 7,
  cache: { dir: 'spotify_cache', trackTtlDays: 14 },
  spins: { dir: 'spins' },
  matching: { minSimilarity: 0.8, artistWeight: 0.5 },
  retry: { maxAttempts: 4, baseDelayMs: 500 },
  concurrency: { shows: 4 },
  rateLimit: { spotify: { maxConcurrent: 2, minTime: 120 } },
  spotify: { market: 'US' },
};

function resolveConfigPath(): string {
  const fromEnv = process.env.CONFIG_PATH;
  if (fromEnv && fromEnv.trim().length > 0) {
    return path.resolve(fromEnv);
  }
  // Assume the app is started from the project root
  return path.resolve(process.cwd(), 'config', 'config.yaml');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid configuration: "${key}" must be a mapping.`);
  }
  return value;
}

function numberField(obj: Record<string, unknown>, key: string, label: string, fallback: number): number {
  const value = obj[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ConfigError(`Invalid configuration: "${label}" must be a number.`);
  }
  return value;
}

function stringField(obj: Record<string, unknown>, key: string, label: string, fallback: string): string {
  const value = obj[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigError(`Invalid configuration: "${label}" must be a non-empty string.`);
  }
  return value.trim();
}

function parseStations(raw: Record<string, unknown>): Record<string, StationConfig> {
  const stations = raw.stations;
  if (!isRecord(stations) || Object.keys(stations).length === 0) {
    throw new ConfigError('Invalid configuration: "stations" must map at least one station name.');
  }
  const out: Record<string, StationConfig> = {};
  for (const [name, value] of Object.entries(stations)) {
    const body = value === null || value === undefined ? {} : value;
    if (!isRecord(body)) {
      throw new ConfigError(`Invalid configuration: "stations.${name}" must be a mapping.`);
    }
    const ignores = body.ignores ?? [];
    if (!Array.isArray(ignores) || !ignores.every((p): p is string => typeof p === 'string')) {
      throw new ConfigError(`Invalid configuration: "stations.${name}.ignores" must be a list of strings.`);
    }
    out[name] = { ignores };
  }
  return out;
}

export function parseConfig(raw: unknown): AppConfig {
  // Basic runtime shape check to surface obvious issues early
  if (!isRecord(raw)) {
    throw new ConfigError('Invalid configuration: expected a YAML mapping at the root.');
  }
  const d = DEFAULT_CONFIG;
  const dryRun = raw.dryRun ?? d.dryRun;
  if (typeof dryRun !== 'boolean') {
    throw new ConfigError('Invalid configuration: "dryRun" must be a boolean.');
  }

  const cache = section(raw, 'cache');
  const spins = section(raw, 'spins');
  const matching = section(raw, 'matching');
  const retry = section(raw, 'retry');
  const concurrency = section(raw, 'concurrency');
  const rateLimit = section(raw, 'rateLimit');
  const spotifyBucket = section(rateLimit, 'spotify');
  const spotify = section(raw, 'spotify');

  const cfg: AppConfig = {
    dryRun,
    lookbackDays: numberField(raw, 'lookbackDays', 'lookbackDays', d.lookbackDays),
    stations: parseStations(raw),
    cache: {
      dir: stringField(cache, 'dir', 'cache.dir', d.cache.dir),
      trackTtlDays: numberField(cache, 'trackTtlDays', 'cache.trackTtlDays', d.cache.trackTtlDays),
    },
    spins: { dir: stringField(spins, 'dir', 'spins.dir', d.spins.dir) },
    matching: {
      minSimilarity: numberField(matching, 'minSimilarity', 'matching.minSimilarity', d.matching.minSimilarity),
      artistWeight: numberField(matching, 'artistWeight', 'matching.artistWeight', d.matching.artistWeight),
    },
    retry: {
      maxAttempts: numberField(retry, 'maxAttempts', 'retry.maxAttempts', d.retry.maxAttempts),
      baseDelayMs: numberField(retry, 'baseDelayMs', 'retry.baseDelayMs', d.retry.baseDelayMs),
    },
    concurrency: { shows: numberField(concurrency, 'shows', 'concurrency.shows', d.concurrency.shows) },
    rateLimit: {
      spotify: {
        maxConcurrent: numberField(spotifyBucket, 'maxConcurrent', 'rateLimit.spotify.maxConcurrent', d.rateLimit.spotify.maxConcurrent),
        minTime: numberField(spotifyBucket, 'minTime', 'rateLimit.spotify.minTime', d.rateLimit.spotify.minTime),
      },
    },
    spotify: { market: stringField(spotify, 'market', 'spotify.market', d.spotify.market) },
  };

  if (cfg.lookbackDays < 1) {
    throw new ConfigError('Invalid configuration: "lookbackDays" must be at least 1.');
  }
  if (cfg.cache.trackTtlDays <= 0) {
    throw new ConfigError('Invalid configuration: "cache.trackTtlDays" must be a positive number.');
  }
  if (cfg.matching.minSimilarity < 0 || cfg.matching.minSimilarity > 1) {
    throw new ConfigError('Invalid configuration: "matching.minSimilarity" must be between 0 and 1.');
  }
  if (cfg.matching.artistWeight < 0 || cfg.matching.artistWeight > 1) {
    throw new ConfigError('Invalid configuration: "matching.artistWeight" must be between 0 and 1.');
  }
  if (cfg.retry.maxAttempts < 1) {
    throw new ConfigError('Invalid configuration: "retry.maxAttempts" must be at least 1.');
  }
  if (cfg.concurrency.shows < 1) {
    throw new ConfigError('Invalid configuration: "concurrency.shows" must be at least 1.');
  }

  return cfg;
}

export function loadConfig(filePath?: string): AppConfig {
  const cfgPath = filePath ? path.resolve(filePath) : resolveConfigPath();
  if (!fs.existsSync(cfgPath)) {
    throw new ConfigError(`Configuration file not found at: ${cfgPath}`);
  }
  const file = fs.readFileSync(cfgPath, 'utf8');
  const cfg = parseConfig(yaml.load(file));

  // Environment overrides (non-secret convenience)
  const envDryRun = (process.env.DRY_RUN || '').toLowerCase();
  if (envDryRun === '1' || envDryRun === 'true') {
    cfg.dryRun = true;
  }

  return cfg;
}

// Secrets never live in the YAML file
export function loadSpotifyCredentials(env: NodeJS.ProcessEnv = process.env): SpotifyCredentials {
  const clientId = env.SPOTIFY_CLIENT_ID?.trim();
  const clientSecret = env.SPOTIFY_CLIENT_SECRET?.trim();
  const refreshToken = env.SPOTIFY_REFRESH_TOKEN?.trim();
  if (!clientId) throw new ConfigError('SPOTIFY_CLIENT_ID environment variable not set.');
  if (!clientSecret) throw new ConfigError('SPOTIFY_CLIENT_SECRET environment variable not set.');
  if (!refreshToken) throw new ConfigError('SPOTIFY_REFRESH_TOKEN environment variable not set.');
  return { clientId, clientSecret, refreshToken };
}
