import { SpotifyAPIClient } from './api/spotify';
import { AppConfig, requireSetting } from './config';
import { DatabaseManager } from './services/database';
import { RateLimitedFetcher } from './services/fetcher';
import { PlaylistService } from './services/playlist';
import { ReleaseTracker } from './services/release-view';
import { SpotifyOAuthService } from './services/spotify-oauth';
import { SyncCheckpointService } from './services/sync-checkpoint';
import { SyncEngine } from './services/sync-engine';
import { TokenManager } from './services/token-manager';
import { WeeklyAggregator } from './services/weekly-aggregator';
import { Calendar } from './utils/calendar';
import { ProgressCallback } from './utils/progress';
import { DEFAULT_RETRY_POLICY } from './utils/retry';

/**
 * Everything a command needs, wired from the loaded configuration
 */
export interface AppContext {
  config: AppConfig;
  store: DatabaseManager;
  calendar: Calendar;
  checkpoints: SyncCheckpointService;
  api: SpotifyAPIClient;
  tokens: TokenManager;
  fetcher: RateLimitedFetcher;
  aggregator: WeeklyAggregator;
  oauth(): SpotifyOAuthService;
  tracker(onProgress?: ProgressCallback): ReleaseTracker;
  playlists(onProgress?: ProgressCallback): PlaylistService;
}

export function createContext(config: AppConfig, store: DatabaseManager = new DatabaseManager(config.database.path)): AppContext {
  const calendar = new Calendar(config.calendar.anchor);
  const checkpoints = new SyncCheckpointService(store);
  const api = new SpotifyAPIClient(config.spotify.apiBaseUrl);
  const aggregator = new WeeklyAggregator(store, calendar);

  let oauthService: SpotifyOAuthService | null = null;
  const oauth = (): SpotifyOAuthService => {
    if (!oauthService) {
      oauthService = new SpotifyOAuthService({
        clientId: requireSetting(config.spotify.clientId, 'SPOTIFY_CLIENT_ID'),
        redirectUri: config.spotify.redirectUri,
        scope: config.spotify.scope,
        authorizeUrl: config.spotify.authorizeUrl,
        tokenUrl: config.spotify.tokenUrl,
      });
    }
    return oauthService;
  };

  const tokens = new TokenManager(store, { refreshToken: (refreshToken) => oauth().refreshToken(refreshToken) });
  const fetcher = new RateLimitedFetcher(tokens, {
    pacingMs: config.sync.pacingMs,
    policy: {
      ...DEFAULT_RETRY_POLICY,
      maxRetries: config.sync.maxRetries,
      rateLimitCapMs: config.sync.rateLimitCapMs,
    },
  });

  return {
    config,
    store,
    calendar,
    checkpoints,
    api,
    tokens,
    fetcher,
    aggregator,
    oauth,
    tracker: (onProgress) =>
      new ReleaseTracker(
        new SyncEngine(store, fetcher, api, checkpoints, {
          chunkSize: config.sync.chunkSize,
          chunkPauseMs: config.sync.chunkPauseMs,
          onProgress,
        }),
        aggregator,
        calendar,
      ),
    playlists: (onProgress) =>
      new PlaylistService(api, fetcher, aggregator, requireSetting(config.spotify.userId, 'SPOTIFY_USER_ID'), onProgress),
  };
}
