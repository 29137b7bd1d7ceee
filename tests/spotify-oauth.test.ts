import { InternalAxiosRequestConfig } from 'axios';
import crypto from 'crypto';
import { OAuthSettings, SpotifyOAuthService, generatePKCE } from '../src/services/spotify-oauth';
import { ErrorType } from '../src/utils/error-handler';
import { StubResponse, stubAxios } from './helpers';

const NOW = 1_700_000_000_000;

const settings: OAuthSettings = {
  clientId: 'test-client',
  redirectUri: 'http://127.0.0.1:8888/callback',
  scope: 'user-follow-read playlist-modify-private',
  authorizeUrl: 'https://accounts.example.test/authorize',
  tokenUrl: 'https://accounts.example.test/api/token',
};

describe('generatePKCE', () => {
  test('derives the challenge from the verifier', () => {
    const { codeVerifier, codeChallenge } = generatePKCE();
    const expected = crypto.createHash('sha256').update(codeVerifier).digest('base64url');

    expect(codeVerifier).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(codeChallenge).toBe(expected);
  });
});

describe('SpotifyOAuthService', () => {
  let responses: StubResponse[];
  let requests: InternalAxiosRequestConfig[];
  let service: SpotifyOAuthService;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation();
    jest.spyOn(console, 'error').mockImplementation();
    responses = [];
    requests = stubAxios(() => responses.shift() ?? { data: {} });
    service = new SpotifyOAuthService(settings, () => NOW);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('needs a client id', () => {
    expect(() => new SpotifyOAuthService({ ...settings, clientId: '' })).toThrow('SPOTIFY_CLIENT_ID is not set');
  });

  test('builds a PKCE authorization url', () => {
    const { url, codeVerifier, state } = service.getAuthorizationUrl();
    const parsed = new URL(url);

    expect(`${parsed.origin}${parsed.pathname}`).toBe(settings.authorizeUrl);
    expect(parsed.searchParams.get('client_id')).toBe('test-client');
    expect(parsed.searchParams.get('response_type')).toBe('code');
    expect(parsed.searchParams.get('redirect_uri')).toBe(settings.redirectUri);
    expect(parsed.searchParams.get('scope')).toBe(settings.scope);
    expect(parsed.searchParams.get('state')).toBe(state);
    expect(parsed.searchParams.get('code_challenge_method')).toBe('S256');
    expect(parsed.searchParams.get('code_challenge')).toBe(
      crypto.createHash('sha256').update(codeVerifier).digest('base64url'),
    );
  });

  test('exchanges an authorization code', async () => {
    responses.push({
      data: {
        access_token: 'test-token',
        token_type: 'Bearer',
        expires_in: 3600,
        scope: 'user-follow-read',
        refresh_token: 'test-refresh',
      },
    });

    const token = await service.exchangeCodeForToken('test-code', 'test-verifier');

    expect(token).toEqual({
      accessToken: 'test-token',
      refreshToken: 'test-refresh',
      scope: 'user-follow-read',
      expiresAt: NOW + 3600 * 1000,
    });
    expect(requests[0].url).toBe(settings.tokenUrl);
    const form = new URLSearchParams(requests[0].data);
    expect(form.get('grant_type')).toBe('authorization_code');
    expect(form.get('code')).toBe('test-code');
    expect(form.get('code_verifier')).toBe('test-verifier');
    expect(form.get('client_id')).toBe('test-client');
  });

  test('a refresh without a new refresh token returns an empty one', async () => {
    responses.push({ data: { access_token: 'test-token-2', token_type: 'Bearer', expires_in: 60 } });

    const token = await service.refreshToken('test-refresh');

    expect(token).toEqual({ accessToken: 'test-token-2', refreshToken: '', scope: '', expiresAt: NOW + 60000 });
    expect(new URLSearchParams(requests[0].data).get('refresh_token')).toBe('test-refresh');
  });

  test('reports a rejected refresh token as a bad request', async () => {
    responses.push({ status: 400, data: { error: 'invalid_grant', error_description: 'Invalid refresh token' } });

    await expect(service.refreshToken('test-refresh')).rejects.toMatchObject({
      type: ErrorType.BadRequest,
      message: 'HTTP 400: Invalid refresh token',
    });
    expect(requests).toHaveLength(1);
  });

  test('reports an unexpected token response as malformed', async () => {
    responses.push({ data: { token_type: 'Bearer' } });

    await expect(service.refreshToken('test-refresh')).rejects.toMatchObject({ type: ErrorType.MalformedData });
  });
});
