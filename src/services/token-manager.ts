import { CacheToken } from '../types';
import { AppError, ErrorType } from '../utils/error-handler';
import { Logger } from '../utils/logger';
import { LocalStore } from './database';
import { CredentialsProvider } from './fetcher';

export const TOKEN_KEY = 'spotify';
export const REFRESH_THRESHOLD_MS = 4 * 60 * 1000;

/**
 * Token endpoint operations the manager needs
 */
export interface TokenRefresher {
  refreshToken(refreshToken: string): Promise<CacheToken>;
}

/**
 * Keeps the cached Spotify token fresh and hands it to the fetcher
 */
export class TokenManager implements CredentialsProvider {
  constructor(
    private readonly store: LocalStore,
    private readonly refresher: TokenRefresher,
    private readonly now: () => number = Date.now,
  ) {}

  async load(): Promise<CacheToken | null> {
    return this.store.get('token', TOKEN_KEY);
  }

  async save(token: CacheToken): Promise<void> {
    await this.store.put('token', TOKEN_KEY, token);
  }

  async clear(): Promise<void> {
    await this.store.delete('token', TOKEN_KEY);
  }

  needsRefresh(token: CacheToken): boolean {
    return this.now() >= token.expiresAt - REFRESH_THRESHOLD_MS;
  }

  async getAccessToken(): Promise<string> {
    const token = await this.require();
    if (this.needsRefresh(token)) {
      Logger.info('Access token expiring soon, refreshing');
      return (await this.rotate(token)).accessToken;
    }
    return token.accessToken;
  }

  async refresh(): Promise<string> {
    const token = await this.require();
    return (await this.rotate(token)).accessToken;
  }

  private async rotate(token: CacheToken): Promise<CacheToken> {
    let fresh: CacheToken;
    try {
      fresh = await this.refresher.refreshToken(token.refreshToken);
    } catch (error) {
      if (error instanceof AppError && (error.type === ErrorType.BadRequest || error.type === ErrorType.AuthExpired)) {
        throw new AppError(
          ErrorType.AuthExpired,
          'Refresh token was rejected. Run "release-week auth" again.',
          error.statusCode,
          error,
          { operation: 'refresh token' },
        );
      }
      throw error;
    }
    const rotated: CacheToken = {
      ...fresh,
      refreshToken: fresh.refreshToken || token.refreshToken,
    };
    await this.save(rotated);
    return rotated;
  }

  private async require(): Promise<CacheToken> {
    const token = await this.load();
    if (!token) {
      throw new AppError(ErrorType.AuthExpired, 'No Spotify token stored. Run "release-week auth" first.', undefined, undefined, {
        operation: 'load token',
      });
    }
    return token;
  }
}
