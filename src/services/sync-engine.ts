import { CatalogClient } from '../api/spotify';
import { Release, ReleaseKind } from '../types';
import { AppError, ErrorHandler, ErrorType, SyncError } from '../utils/error-handler';
import { parseRelease, toArtist } from '../utils/formatters';
import { Logger } from '../utils/logger';
import { ProgressCallback, noopProgress } from '../utils/progress';
import { formatReleaseKinds } from '../utils/release-kinds';
import { LocalStore, StoreEntry } from './database';
import { RateLimitedFetcher } from './fetcher';
import { SyncCheckpointService } from './sync-checkpoint';

export const ARTISTS_STATE = 'artists';

export function releasesStateKind(kinds: readonly ReleaseKind[]): string {
  return `releases:${formatReleaseKinds(kinds)}`;
}

export interface SyncEngineOptions {
  chunkSize?: number;
  chunkPauseMs?: number;
  onProgress?: ProgressCallback;
  clock?: () => Date;
}

export interface SyncResult {
  kind: string;
  resumed: boolean;
  processed: number; // items handled in this run
  written: number; // records stored in this run
  removed: number;
  skipped: number; // releases dropped for precision, malformed dates or kind
  requests: number;
}

/**
 * Union by release id; incoming entries replace cached ones with the same id.
 * Result is ordered by date, then id.
 */
export function mergeReleases(cached: Release[], incoming: Release[]): Release[] {
  const byId = new Map<string, Release>();
  for (const release of cached) {
    byId.set(release.id, release);
  }
  for (const release of incoming) {
    byId.set(release.id, release);
  }
  return [...byId.values()].sort((a, b) => {
    if (a.releaseDate !== b.releaseDate) {
      return a.releaseDate < b.releaseDate ? -1 : 1;
    }
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  });
}

function pageStage(cursor: string | null): string {
  return cursor === null ? 'first page' : `page at cursor ${cursor}`;
}

/**
 * Pulls followed artists and their releases into the local store, resumably.
 */
export class SyncEngine {
  private readonly chunkSize: number;
  private readonly chunkPauseMs: number;
  private readonly onProgress: ProgressCallback;
  private readonly clock: () => Date;

  constructor(
    private readonly store: LocalStore,
    private readonly fetcher: RateLimitedFetcher,
    private readonly catalog: CatalogClient,
    private readonly checkpoints: SyncCheckpointService,
    options: SyncEngineOptions = {},
  ) {
    this.chunkSize = Math.max(1, options.chunkSize ?? 20);
    this.chunkPauseMs = options.chunkPauseMs ?? 30000;
    this.onProgress = options.onProgress ?? noopProgress;
    this.clock = options.clock ?? (() => new Date());
  }

  async syncArtists(options: { force?: boolean } = {}): Promise<SyncResult> {
    const kind = ARTISTS_STATE;
    const traceId = Logger.startOperation('sync artists');
    const requestsBefore = this.fetcher.requestCount;

    let stage = 'start';
    let written = 0;

    try {
      let state = await this.checkpoints.beginOrResume(kind, options.force ?? false);
      const resumed = state.cursor !== null || state.processedIds.length > 0;
      stage = pageStage(state.cursor);

      for await (const page of this.fetcher.pages(this.catalog.followedArtists(), state.cursor)) {
        const cachedAt = this.clock().toISOString();
        const entries = page.items.map((artist): StoreEntry<'artists'> => [artist.id, toArtist(artist, cachedAt)]);

        await this.store.putMany('artists', entries);
        written += entries.length;
        state = await this.checkpoints.checkpoint(kind, {
          cursor: page.next,
          processedIds: entries.map(([id]) => id),
          totalCount: page.total ?? state.totalCount,
        });
        stage = pageStage(page.next);

        this.onProgress({
          stage: 'artists',
          current: state.processedIds.length,
          total: state.totalCount,
          currentPage: page.pageNumber,
        });
      }

      stage = 'pruning unfollowed artists';
      const seen = new Set(state.processedIds);
      const cached = await this.store.entries('artists');
      const removed = cached.map(([id]) => id).filter((id) => !seen.has(id));
      if (removed.length > 0) {
        await this.store.deleteMany('artists', removed);
        await this.store.deleteMany('releases', removed);
        Logger.info(`Removed ${removed.length} artists no longer followed`);
      }

      await this.checkpoints.finish(kind, 'completed');
      const result: SyncResult = {
        kind,
        resumed,
        processed: written,
        written,
        removed: removed.length,
        skipped: 0,
        requests: this.fetcher.requestCount - requestsBefore,
      };
      Logger.endOperation(traceId, true, { ...result });
      return result;
    } catch (error) {
      Logger.endOperation(traceId, false);
      throw await this.fail(kind, stage, error);
    }
  }

  async syncReleases(options: { kinds: readonly ReleaseKind[]; force?: boolean }): Promise<SyncResult> {
    const { kinds } = options;
    const force = options.force ?? false;
    if (kinds.length === 0) {
      throw new AppError(ErrorType.ValidationError, 'At least one release type is required');
    }

    const artists = await this.store.entries('artists');
    if (artists.length === 0) {
      throw new AppError(
        ErrorType.ValidationError,
        'No artists cached yet. Run "release-week artists --update" first.',
      );
    }

    const kind = releasesStateKind(kinds);
    const traceId = Logger.startOperation(`sync ${kind}`);
    const requestsBefore = this.fetcher.requestCount;

    let stage = 'start';
    let processed = 0;
    let written = 0;
    let skipped = 0;

    try {
      let state = await this.checkpoints.beginOrResume(kind, force);
      const resumed = state.processedIds.length > 0;
      const done = new Set(state.processedIds);
      const pending = artists
        .map(([id]) => id)
        .sort()
        .filter((id) => !done.has(id));
      state = await this.checkpoints.checkpoint(kind, { totalCount: artists.length });

      for (let offset = 0; offset < pending.length; offset += this.chunkSize) {
        if (offset > 0) {
          await this.fetcher.pause(this.chunkPauseMs);
        }

        for (const artistId of pending.slice(offset, offset + this.chunkSize)) {
          stage = `artist ${artistId} page 1`;
          const fetched: Release[] = [];

          for await (const page of this.fetcher.pages(this.catalog.artistReleases(artistId, kinds))) {
            for (const album of page.items) {
              const parsed = parseRelease(album, artistId);
              if (!parsed.ok) {
                skipped++;
                if (parsed.reason === 'precision') {
                  Logger.debug(`Dropping ${album.id}: date not day precision`, { date: parsed.detail });
                } else {
                  Logger.warn(`Skipping release ${album.id} of ${artistId}: ${parsed.reason} ${parsed.detail}`);
                }
                continue;
              }
              if (!kinds.includes(parsed.release.kind)) {
                skipped++;
                continue;
              }
              fetched.push(parsed.release);
            }
            stage = `artist ${artistId} page ${page.pageNumber + 1}`;
          }

          stage = `artist ${artistId}`;
          const cached = (await this.store.get('releases', artistId)) ?? [];
          const kept = force ? cached.filter((release) => !kinds.includes(release.kind)) : cached;
          const merged = mergeReleases(kept, fetched);
          await this.store.put('releases', artistId, merged);
          state = await this.checkpoints.checkpoint(kind, { processedIds: [artistId] });

          processed++;
          written += fetched.length;
          this.onProgress({
            stage: 'releases',
            current: state.processedIds.length,
            total: state.totalCount,
            message: artistId,
          });
        }
      }

      await this.checkpoints.finish(kind, 'completed');
      const result: SyncResult = {
        kind,
        resumed,
        processed,
        written,
        removed: 0,
        skipped,
        requests: this.fetcher.requestCount - requestsBefore,
      };
      Logger.endOperation(traceId, true, { ...result });
      return result;
    } catch (error) {
      Logger.endOperation(traceId, false);
      throw await this.fail(kind, stage, error);
    }
  }

  /**
   * Mark the run failed, keeping its checkpoint, and describe where it stopped
   */
  private async fail(kind: string, stage: string, error: unknown): Promise<SyncError> {
    const cause = ErrorHandler.parse(error, { operation: `sync ${kind}` });
    try {
      await this.checkpoints.finish(kind, 'failed', cause);
    } catch (finishError) {
      Logger.error(
        `Could not record failed state for ${kind}`,
        finishError instanceof Error ? finishError : undefined,
      );
    }
    ErrorHandler.log(cause);
    return new SyncError(kind, stage, cause);
  }
}
