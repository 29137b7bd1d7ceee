/**
 * Spotify Authorization Code flow with PKCE for a CLI (public client, no secret)
 */

import axios, { AxiosInstance } from 'axios';
import axiosRetry from 'axios-retry';
import crypto from 'crypto';
import { z } from 'zod';
import { CacheToken } from '../types';
import { AppError, ErrorHandler, ErrorType } from '../utils/error-handler';
import { Logger } from '../utils/logger';
import { TokenRefresher } from './token-manager';

export interface OAuthSettings {
  clientId: string;
  redirectUri: string;
  scope: string;
  authorizeUrl: string;
  tokenUrl: string;
}

const tokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string(),
  expires_in: z.number(),
  scope: z.string().default(''),
  refresh_token: z.string().optional(),
});

function base64Url(buffer: Buffer): string {
  return buffer.toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=/g, '');
}

export function generatePKCE(): { codeVerifier: string; codeChallenge: string } {
  const codeVerifier = base64Url(crypto.randomBytes(32));
  const codeChallenge = base64Url(crypto.createHash('sha256').update(codeVerifier).digest());
  return { codeVerifier, codeChallenge };
}

/**
 * Random state for CSRF protection
 */
function generateState(): string {
  return crypto.randomBytes(16).toString('hex');
}

export class SpotifyOAuthService implements TokenRefresher {
  private client: AxiosInstance;

  constructor(
    private readonly settings: OAuthSettings,
    private readonly now: () => number = Date.now,
  ) {
    if (!settings.clientId) {
      throw new AppError(ErrorType.ConfigurationError, 'SPOTIFY_CLIENT_ID is not set');
    }
    this.client = axios.create({
      timeout: 30000,
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });

    // Token requests are retried on network errors and 5xx only
    axiosRetry(this.client, {
      retries: 3,
      retryDelay: axiosRetry.exponentialDelay,
      retryCondition: (error) => !error.response || error.response.status >= 500,
    });
  }

  getAuthorizationUrl(): { url: string; codeVerifier: string; state: string } {
    const { codeVerifier, codeChallenge } = generatePKCE();
    const state = generateState();

    const params = new URLSearchParams({
      client_id: this.settings.clientId,
      response_type: 'code',
      redirect_uri: this.settings.redirectUri,
      code_challenge_method: 'S256',
      code_challenge: codeChallenge,
      state,
      scope: this.settings.scope,
    });

    return { url: `${this.settings.authorizeUrl}?${params.toString()}`, codeVerifier, state };
  }

  async exchangeCodeForToken(code: string, codeVerifier: string): Promise<CacheToken> {
    const token = await this.requestToken('exchange authorization code', {
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.settings.redirectUri,
      client_id: this.settings.clientId,
      code_verifier: codeVerifier,
    });
    Logger.info('Obtained Spotify access token');
    return token;
  }

  /**
   * Spotify may omit refresh_token on refresh; the returned token then has an
   * empty refreshToken and the caller keeps the previous one.
   */
  async refreshToken(refreshToken: string): Promise<CacheToken> {
    const token = await this.requestToken('refresh access token', {
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
      client_id: this.settings.clientId,
    });
    Logger.info('Refreshed Spotify access token');
    return token;
  }

  private async requestToken(operation: string, form: Record<string, string>): Promise<CacheToken> {
    return ErrorHandler.wrapAsync(async () => {
      const response = await this.client.post(this.settings.tokenUrl, new URLSearchParams(form).toString());
      const data = tokenResponseSchema.parse(response.data);
      return {
        accessToken: data.access_token,
        refreshToken: data.refresh_token ?? '',
        scope: data.scope,
        expiresAt: this.now() + data.expires_in * 1000,
      };
    }, { operation });
  }
}
