export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class MalformedSpinError extends Error {
  public readonly sourceId: string | number | null;
  public readonly showName: string | null;
  constructor(reason: string, sourceId: string | number | null, showName: string | null) {
    super(`Malformed spin ${sourceId ?? '?'} (${showName ?? 'unknown show'}): ${reason}`);
    this.name = 'MalformedSpinError';
    this.sourceId = sourceId;
    this.showName = showName;
  }
}

// Classified failure of one Spotify Web API request
export class SpotifyRequestError extends Error {
  public readonly statusCode: number | null;
  public readonly retryable: boolean;
  public readonly retryAfterSeconds: number;
  public readonly body?: unknown;
  constructor(
    message: string,
    opts: { statusCode?: number | null; retryable: boolean; retryAfterSeconds?: number; body?: unknown }
  ) {
    super(message);
    this.name = 'SpotifyRequestError';
    this.statusCode = opts.statusCode ?? null;
    this.retryable = opts.retryable;
    this.retryAfterSeconds = opts.retryAfterSeconds ?? 0;
    this.body = opts.body;
  }
}

export class ResolutionFailure extends Error {
  public readonly attempts: number;
  public readonly retryable: boolean;
  public readonly statusCode: number | null;
  constructor(query: string, attempts: number, retryable: boolean, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
    super(`Catalog search failed after ${attempts} attempt(s) for "${query}": ${detail}`);
    this.name = 'ResolutionFailure';
    this.attempts = attempts;
    this.retryable = retryable;
    this.statusCode = cause instanceof SpotifyRequestError ? cause.statusCode : null;
  }
}

export class PlaylistMutationFailure extends Error {
  public readonly playlistName: string;
  constructor(action: string, playlistName: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
    super(`Failed to ${action} playlist "${playlistName}": ${detail}`);
    this.name = 'PlaylistMutationFailure';
    this.playlistName = playlistName;
  }
}

export class CacheIOFailure extends Error {
  public readonly filePath: string;
  constructor(operation: 'read' | 'write', filePath: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
    super(`Could not ${operation} cache file ${filePath}: ${detail}`);
    this.name = 'CacheIOFailure';
    this.filePath = filePath;
  }
}
