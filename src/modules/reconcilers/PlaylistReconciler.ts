import { Logger } from '../../utils/logger.js';
import { PlaylistMutationFailure } from '../../types/errors.js';
import { MAX_NAME_LENGTH, buildDescription, buildPlaylistName } from '../../utils/playlistText.js';
import type { CatalogResolver } from '../resolvers/CatalogResolver.js';
import type { PlaylistStateCache } from '../caches/PlaylistStateCache.js';
import type {
  CanonicalTrackList,
  IPlaylistService,
  PlaylistRecord,
  ReconcileResult,
  ResolveOutcome,
  Spin,
} from '../../types/index.js';

export interface PlaylistReconcilerOptions {
  batchSize?: number; // Spotify accepts at most 100 URIs per add request
  now?: () => Date;
}

// Where each pending spin ended up; drives how far the watermark may move
type StepState = 'done' | 'queued' | 'blocked';

interface Step {
  spin: Spin;
  state: StepState;
}

export class PlaylistReconciler {
  private readonly batchSize: number;
  private readonly now: () => Date;

  constructor(
    private readonly state: PlaylistStateCache,
    private readonly resolver: CatalogResolver,
    private readonly playlists: IPlaylistService | null,
    opts: PlaylistReconcilerOptions = {}
  ) {
    this.batchSize = Math.max(1, Math.min(100, opts.batchSize ?? 100));
    this.now = opts.now ?? (() => new Date());
  }

  async reconcile(list: CanonicalTrackList): Promise<ReconcileResult> {
    const playlistName = buildPlaylistName(list.station, list.showName);
    const existing = this.state.get(list.station, list.showId);
    const result = this.emptyResult(list, playlistName, existing);

    const service = this.playlists;
    if (!service) {
      return this.fail(result, new PlaylistMutationFailure('reach', playlistName, 'no playlist service configured'));
    }

    // 1. Resolve or create the playlist
    let record: PlaylistRecord;
    let created = false;
    if (existing) {
      record = existing;
    } else {
      try {
        record = await this.createPlaylist(service, list, playlistName);
        created = true;
        result.playlistId = record.playlistId;
      } catch (err) {
        return this.fail(result, err);
      }
    }

    // 2. Partition around the watermark
    const pending = list.spins.filter((s) => s.sourceId > record.watermark);
    result.pending = pending.length;
    if (pending.length === 0) {
      result.status = created ? 'created' : 'unchanged';
      Logger.debug(`${playlistName}: nothing pending past watermark ${record.watermark}.`);
      return result;
    }

    // 3. Resolve pending spins in broadcast order
    const outcomes: Array<{ spin: Spin; outcome: ResolveOutcome }> = [];
    for (const spin of pending) {
      const outcome = await this.resolver.resolve(spin);
      outcomes.push({ spin, outcome });
      if (outcome.kind === 'found') result.resolved++;
      else if (outcome.kind === 'not_found') result.skipped++;
      else result.unavailable++;
    }

    // 4. Append what is not in the playlist yet
    let membership = new Set<string>();
    if (result.resolved > 0) {
      try {
        membership = await service.getPlaylistTrackIds(record.playlistId);
      } catch (err) {
        return this.fail(result, new PlaylistMutationFailure('read', playlistName, err));
      }
    }

    const queuedIds = new Set<string>();
    const queue: Array<{ step: Step; uri: string }> = [];
    const steps = outcomes.map(({ spin, outcome }): Step => {
      if (outcome.kind === 'not_found') {
        Logger.debug(`${playlistName}: skipping ${spin.sourceId} ${spin.artist} - ${spin.title} (not in catalog).`);
        return { spin, state: 'done' };
      }
      if (outcome.kind === 'unavailable') return { spin, state: 'blocked' };
      const { trackId, uri } = outcome.track;
      if (membership.has(trackId) || queuedIds.has(trackId)) {
        result.duplicates++;
        return { spin, state: 'done' };
      }
      queuedIds.add(trackId);
      const step: Step = { spin, state: 'queued' };
      queue.push({ step, uri });
      return step;
    });

    let appendError: unknown = null;
    for (let i = 0; i < queue.length; i += this.batchSize) {
      const batch = queue.slice(i, i + this.batchSize);
      try {
        await service.appendTracks(
          record.playlistId,
          batch.map((item) => item.uri)
        );
        for (const item of batch) item.step.state = 'done';
        result.appended += batch.length;
      } catch (err) {
        appendError = new PlaylistMutationFailure('append tracks to', playlistName, err);
        break;
      }
    }

    // 5. Advance the watermark through the contiguous run of finished spins
    let watermark = record.watermark;
    for (const step of steps) {
      if (step.state !== 'done') break;
      watermark = Math.max(watermark, step.spin.sourceId);
    }
    result.watermarkAfter = watermark;

    const advanced = watermark > record.watermark;
    if (advanced || result.appended > 0) {
      const updated: PlaylistRecord = {
        ...record,
        watermark,
        // Membership is only read when something resolved
        trackCount: result.resolved > 0 ? membership.size + result.appended : record.trackCount,
        updatedAt: this.now().toISOString(),
      };
      this.state.put(list.station, list.showId, updated);

      // Mirror the watermark into the description for --refresh-playlists
      if (advanced) {
        try {
          await service.setDescription(
            record.playlistId,
            buildDescription({ station: list.station, showName: list.showName, showId: list.showId, watermark, updatedAt: this.now() })
          );
        } catch (err) {
          Logger.warn(`${playlistName}: could not update description: ${err instanceof Error ? err.message : String(err)}`);
        }
      }
    }

    if (appendError) return this.fail(result, appendError);

    result.status = created ? 'created' : advanced || result.appended > 0 ? 'updated' : 'unchanged';
    Logger.info(
      `${playlistName}: pending=${result.pending} resolved=${result.resolved} skipped=${result.skipped} ` +
        `unavailable=${result.unavailable} appended=${result.appended} watermark ${result.watermarkBefore} -> ${result.watermarkAfter}`
    );
    return result;
  }

  // Dry run: what reconcile would do, using cached resolutions only. Mutates nothing.
  async preview(list: CanonicalTrackList): Promise<ReconcileResult> {
    const playlistName = buildPlaylistName(list.station, list.showName);
    const existing = this.state.get(list.station, list.showId);
    const result = this.emptyResult(list, playlistName, existing);
    result.status = 'preview';

    const watermark = existing?.watermark ?? 0;
    const pending = list.spins.filter((s) => s.sourceId > watermark);
    result.pending = pending.length;
    for (const spin of pending) {
      const outcome = await this.resolver.resolve(spin);
      if (outcome.kind === 'found') result.resolved++;
      else if (outcome.kind === 'not_found') result.skipped++;
      else result.unavailable++;
    }

    if (!existing) Logger.info(`[dryRun] Would create playlist: ${playlistName}`);
    Logger.info(
      `[dryRun] ${playlistName}: ${result.pending} pending spin(s); ${result.resolved} cached match(es), ` +
        `${result.skipped} cached miss(es), ${result.unavailable} not yet searched.`
    );
    for (const spin of pending.slice(0, 5)) {
      Logger.info(`[dryRun]   ${spin.sourceId} ${spin.artist} - ${spin.title}${spin.album ? ` (${spin.album})` : ''}`);
    }
    if (pending.length > 5) Logger.info(`[dryRun]   ... and ${pending.length - 5} more`);
    return result;
  }

  private async createPlaylist(service: IPlaylistService, list: CanonicalTrackList, name: string): Promise<PlaylistRecord> {
    if (name.length > MAX_NAME_LENGTH) {
      throw new PlaylistMutationFailure('create', name, `name is ${name.length} characters (max ${MAX_NAME_LENGTH})`);
    }
    if (name.endsWith(' - ')) {
      throw new PlaylistMutationFailure('create', name, 'show name is empty after sanitizing');
    }
    const description = buildDescription({
      station: list.station,
      showName: list.showName,
      showId: list.showId,
      watermark: 0,
      updatedAt: this.now(),
    });
    Logger.info(`Creating playlist: ${name}`);
    let created: { id: string; name: string; url?: string };
    try {
      created = await service.createPlaylist(name, description);
    } catch (err) {
      throw new PlaylistMutationFailure('create', name, err);
    }
    const record: PlaylistRecord = {
      playlistId: created.id,
      name: created.name || name,
      watermark: 0,
      trackCount: 0,
      updatedAt: this.now().toISOString(),
    };
    if (created.url) record.url = created.url;
    this.state.put(list.station, list.showId, record);
    return record;
  }

  private emptyResult(list: CanonicalTrackList, playlistName: string, record: PlaylistRecord | undefined): ReconcileResult {
    const watermark = record?.watermark ?? 0;
    return {
      station: list.station,
      showId: list.showId,
      playlistName,
      playlistId: record?.playlistId ?? null,
      status: 'unchanged',
      pending: 0,
      resolved: 0,
      skipped: 0,
      unavailable: 0,
      duplicates: 0,
      appended: 0,
      watermarkBefore: watermark,
      watermarkAfter: watermark,
    };
  }

  private fail(result: ReconcileResult, err: unknown): ReconcileResult {
    result.status = 'failed';
    result.error = err instanceof Error ? err.message : String(err);
    Logger.error(`Reconciliation failed for ${result.playlistName}.`, err);
    return result;
  }
}
