import { ADD_TRACKS_LIMIT, SEVERAL_ALBUMS_LIMIT, SpotifyAPIClient } from '../api/spotify';
import { ReleaseKind, ReleaseWeek } from '../types';
import { AppError, ErrorHandler } from '../utils/error-handler';
import { generatePlaylistName } from '../utils/formatters';
import { Logger } from '../utils/logger';
import { ProgressCallback, noopProgress } from '../utils/progress';
import { RateLimitedFetcher } from './fetcher';
import { WeeklyAggregator } from './weekly-aggregator';

export type PlaylistClient = Pick<
  SpotifyAPIClient,
  'currentUserPlaylists' | 'getSeveralAlbums' | 'createPlaylist' | 'addTracks'
>;

export interface PlaylistOutcome {
  name: string;
  kind: ReleaseKind;
  week: ReleaseWeek;
  status: 'created' | 'exists' | 'empty';
  playlistId?: string;
  trackCount: number;
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Builds one "Weekly Picks" playlist per release kind and week from the
 * cached releases, holding the first track of every release.
 */
export class PlaylistService {
  constructor(
    private readonly client: PlaylistClient,
    private readonly fetcher: RateLimitedFetcher,
    private readonly aggregator: WeeklyAggregator,
    private readonly userId: string,
    private readonly onProgress: ProgressCallback = noopProgress,
  ) {}

  async existingPlaylistNames(): Promise<Set<string>> {
    const names = new Set<string>();
    for await (const playlist of this.fetcher.fetchAll(this.client.currentUserPlaylists())) {
      names.add(playlist.name);
    }
    return names;
  }

  async createWeeklyPlaylists(
    anchorDate: Date,
    previousWeeks: number,
    kinds: readonly ReleaseKind[],
  ): Promise<PlaylistOutcome[]> {
    const existing = await this.existingPlaylistNames();
    const outcomes: PlaylistOutcome[] = [];

    for (const kind of kinds) {
      for (const { week, releases } of await this.aggregator.releasesForWeeks(anchorDate, previousWeeks, [kind])) {
        const name = generatePlaylistName(week, kind);

        if (existing.has(name)) {
          Logger.info(`Playlist ${name} already exists`);
          outcomes.push({ name, kind, week, status: 'exists', trackCount: 0 });
          continue;
        }
        if (releases.length === 0) {
          outcomes.push({ name, kind, week, status: 'empty', trackCount: 0 });
          continue;
        }

        this.onProgress({ stage: 'playlist', current: 0, total: releases.length, message: name });
        const uris = await this.firstTrackUris(releases.map((release) => release.id));

        const playlist = await this.fetcher.request('create playlist', (token) =>
          this.client.createPlaylist(this.userId, name, `Releases of week ${week.week}/${week.year}`, token),
        );
        existing.add(name);

        let added = 0;
        try {
          for (const batch of chunk(uris, ADD_TRACKS_LIMIT)) {
            await this.fetcher.request('add playlist tracks', (token) => this.client.addTracks(playlist.id, batch, token));
            added += batch.length;
          }
        } catch (error) {
          // the name now exists remotely, so a rerun would skip this playlist
          const cause = ErrorHandler.parse(error, { operation: 'add playlist tracks', resource: playlist.id });
          Logger.error(`Playlist ${name} (${playlist.id}) left with ${added} of ${uris.length} tracks`, cause);
          throw new AppError(
            cause.type,
            `Playlist ${name} (${playlist.id}) was created with only ${added} of ${uris.length} tracks; delete it and run again. ${cause.message}`,
            cause.statusCode,
            cause,
            { operation: 'add playlist tracks', resource: playlist.id, details: { name, added, total: uris.length } },
          );
        }

        Logger.info(`Created playlist ${name}`, { tracks: uris.length });
        outcomes.push({ name, kind, week, status: 'created', playlistId: playlist.id, trackCount: uris.length });
      }
    }

    return outcomes;
  }

  /**
   * First track of each album, in the order the albums were given
   */
  private async firstTrackUris(albumIds: string[]): Promise<string[]> {
    const uris: string[] = [];
    for (const ids of chunk(albumIds, SEVERAL_ALBUMS_LIMIT)) {
      const albums = await this.fetcher.request('get several albums', (token) => this.client.getSeveralAlbums(ids, token));
      for (const album of albums) {
        const first = album.tracks[0];
        if (first) {
          uris.push(first.uri);
        } else {
          Logger.warn(`Release ${album.id} has no tracks`);
        }
      }
    }
    return uris;
  }
}
