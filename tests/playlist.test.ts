import { DatabaseManager } from '../src/services/database';
import { CatalogResource, RateLimitedFetcher } from '../src/services/fetcher';
import { PlaylistClient, PlaylistService } from '../src/services/playlist';
import { WeeklyAggregator } from '../src/services/weekly-aggregator';
import { Release, SpotifyAlbumTracks, SpotifyPlaylist, SpotifyTrack } from '../src/types';
import { Calendar } from '../src/utils/calendar';
import { ErrorType } from '../src/utils/error-handler';
import { StaticCredentials, httpError, recordingSleeper } from './helpers';

const release = (id: string, releaseDate: string, kind: Release['kind'] = 'album'): Release => ({
  id,
  artistId: 'a1',
  kind,
  releaseDate,
  title: `Title ${id}`,
  artists: ['Artist'],
});

class FakePlaylistClient implements PlaylistClient {
  readonly albumRequests: string[][] = [];
  readonly created: Array<{ userId: string; name: string; description: string }> = [];
  readonly added: Array<{ playlistId: string; uris: string[] }> = [];
  readonly tracks = new Map<string, SpotifyTrack[]>();
  createFailures: Error[] = [];
  addFailures: Error[] = [];

  constructor(private readonly playlists: SpotifyPlaylist[] = []) {}

  currentUserPlaylists(): CatalogResource<SpotifyPlaylist> {
    return {
      name: 'current user playlists',
      fetchPage: async () => ({ items: this.playlists, next: null }),
    };
  }

  async getSeveralAlbums(albumIds: string[]): Promise<SpotifyAlbumTracks[]> {
    this.albumRequests.push(albumIds);
    return albumIds.map((id) => ({
      id,
      name: `Title ${id}`,
      tracks: this.tracks.get(id) ?? [{ id: `t-${id}`, name: 'Opener', uri: `spotify:track:t-${id}` }],
    }));
  }

  async createPlaylist(userId: string, name: string, description: string): Promise<SpotifyPlaylist> {
    const failure = this.createFailures.shift();
    if (failure) {
      throw failure;
    }
    this.created.push({ userId, name, description });
    return { id: `p${this.created.length}`, name };
  }

  async addTracks(playlistId: string, uris: string[]): Promise<void> {
    const failure = this.addFailures.shift();
    if (failure) {
      throw failure;
    }
    this.added.push({ playlistId, uris });
  }
}

describe('PlaylistService', () => {
  let db: DatabaseManager;
  let aggregator: WeeklyAggregator;
  let sleeps: number[];
  let fetcher: RateLimitedFetcher;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();
    jest.spyOn(console, 'error').mockImplementation();
    db = new DatabaseManager(':memory:');
    await db.initialized;
    // Week 1 of 2024 runs 2024-01-06 to 2024-01-12, week 52 of 2023 ends 2024-01-05
    aggregator = new WeeklyAggregator(db, new Calendar('first-saturday'));
    const sleeper = recordingSleeper();
    sleeps = sleeper.calls;
    fetcher = new RateLimitedFetcher(new StaticCredentials(), { sleep: sleeper.sleep });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await db.close();
  });

  test('creates one playlist per kind and week from the first track of each release', async () => {
    await db.put('releases', 'a1', [
      release('alb1', '2024-01-06'),
      release('alb2', '2024-01-08'),
      release('sgl1', '2024-01-07', 'single'),
    ]);
    const client = new FakePlaylistClient([{ id: 'old', name: 'Weekly Picks 1/2024 (single)' }]);
    client.tracks.set('alb1', []);
    const service = new PlaylistService(client, fetcher, aggregator, 'user-1');

    const outcomes = await service.createWeeklyPlaylists(new Date('2024-01-10T00:00:00Z'), 1, ['album', 'single']);

    expect(outcomes.map((o) => [o.name, o.status, o.trackCount])).toEqual([
      ['Weekly Picks 1/2024 (album)', 'created', 1],
      ['Weekly Picks 52/2023 (album)', 'empty', 0],
      ['Weekly Picks 1/2024 (single)', 'exists', 0],
      ['Weekly Picks 52/2023 (single)', 'empty', 0],
    ]);
    expect(client.albumRequests).toEqual([['alb2', 'alb1']]);
    expect(client.created).toEqual([
      { userId: 'user-1', name: 'Weekly Picks 1/2024 (album)', description: 'Releases of week 1/2024' },
    ]);
    expect(client.added).toEqual([{ playlistId: 'p1', uris: ['spotify:track:t-alb2'] }]);
  });

  test('batches album lookups and track additions', async () => {
    const ids = Array.from({ length: 120 }, (_, i) => `r${String(i).padStart(3, '0')}`);
    await db.put(
      'releases',
      'a1',
      ids.map((id) => release(id, '2024-01-06')),
    );
    const client = new FakePlaylistClient();
    const service = new PlaylistService(client, fetcher, aggregator, 'user-1');

    const [outcome] = await service.createWeeklyPlaylists(new Date('2024-01-06T00:00:00Z'), 0, ['album']);

    expect(outcome).toMatchObject({ status: 'created', playlistId: 'p1', trackCount: 120 });
    expect(client.albumRequests.map((batch) => batch.length)).toEqual([20, 20, 20, 20, 20, 20]);
    expect(client.added.map((batch) => batch.uris.length)).toEqual([100, 20]);
    expect(client.added[0].uris[0]).toBe('spotify:track:t-r000');
  });

  test('playlist creation goes through the rate limiter', async () => {
    await db.put('releases', 'a1', [release('alb1', '2024-01-06')]);
    const client = new FakePlaylistClient();
    client.createFailures.push(httpError(429, { 'retry-after': '2' }));
    const service = new PlaylistService(client, fetcher, aggregator, 'user-1');

    const outcomes = await service.createWeeklyPlaylists(new Date('2024-01-06T00:00:00Z'), 0, ['album']);

    expect(outcomes[0].status).toBe('created');
    expect(sleeps).toEqual([2000]);
    expect(client.created).toHaveLength(1);
  });

  test('names the half-filled playlist when adding tracks fails', async () => {
    await db.put('releases', 'a1', [release('alb1', '2024-01-06')]);
    const client = new FakePlaylistClient();
    client.addFailures.push(httpError(400));
    const service = new PlaylistService(client, fetcher, aggregator, 'user-1');

    await expect(service.createWeeklyPlaylists(new Date('2024-01-06T00:00:00Z'), 0, ['album'])).rejects.toMatchObject({
      type: ErrorType.BadRequest,
      context: { resource: 'p1', details: { name: 'Weekly Picks 1/2024 (album)', added: 0, total: 1 } },
    });
    expect(client.created).toHaveLength(1);
  });
});
