import { z } from 'zod';
import { WEEK_ANCHORS } from './utils/calendar';
import { AppError, ErrorType } from './utils/error-handler';
import { Logger } from './utils/logger';

const configSchema = z.object({
  spotify: z.object({
    clientId: z.string(),
    userId: z.string(),
    redirectUri: z.string().url(),
    scope: z.string(),
    apiBaseUrl: z.string().url(),
    authorizeUrl: z.string().url(),
    tokenUrl: z.string().url(),
  }),
  database: z.object({
    path: z.string().min(1),
  }),
  calendar: z.object({
    anchor: z.enum(WEEK_ANCHORS),
  }),
  sync: z.object({
    chunkSize: z.coerce.number().int().positive(),
    chunkPauseMs: z.coerce.number().int().nonnegative(),
    pacingMs: z.coerce.number().int().nonnegative(),
    maxRetries: z.coerce.number().int().nonnegative(),
    rateLimitCapMs: z.coerce.number().int().positive(),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    directory: z.string(),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

export type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const rawConfig = {
    spotify: {
      clientId: env.SPOTIFY_CLIENT_ID || '',
      userId: env.SPOTIFY_USER_ID || '',
      redirectUri: env.SPOTIFY_REDIRECT_URI || 'http://127.0.0.1:8888/callback',
      scope: env.SPOTIFY_SCOPE || 'user-follow-read playlist-read-private playlist-modify-private playlist-modify-public',
      apiBaseUrl: env.SPOTIFY_API_URL || 'https://api.spotify.com/v1',
      authorizeUrl: env.SPOTIFY_AUTHORIZE_URL || 'https://accounts.spotify.com/authorize',
      tokenUrl: env.SPOTIFY_TOKEN_URL || 'https://accounts.spotify.com/api/token',
    },
    database: {
      path: env.DB_PATH || './data/release-week.db',
    },
    calendar: {
      anchor: env.WEEK_ANCHOR || 'contains-jan-1',
    },
    sync: {
      chunkSize: env.SYNC_CHUNK_SIZE || '20',
      chunkPauseMs: env.SYNC_CHUNK_PAUSE_MS || '30000',
      pacingMs: env.SYNC_PACING_MS || '0',
      maxRetries: env.SYNC_MAX_RETRIES || '3',
      rateLimitCapMs: env.RATE_LIMIT_CAP_MS || '120000',
    },
    logging: {
      level: (env.LOG_LEVEL || 'info').toLowerCase(),
      directory: env.LOG_DIR || './logs',
    },
  };

  const parsed = configSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new AppError(ErrorType.ConfigurationError, `Invalid configuration (${problems.join('; ')})`);
  }
  return parsed.data;
}

export function applyLogging(config: AppConfig): void {
  Logger.configure({
    level: Logger.parseLogLevel(config.logging.level),
    directory: config.logging.directory,
  });
}

/**
 * Fail early when a command needs credentials the environment does not provide
 */
export function requireSetting(value: string, variable: string): string {
  if (!value) {
    throw new AppError(ErrorType.ConfigurationError, `${variable} is not set. Add it to your .env file (see .env.example).`);
  }
  return value;
}
