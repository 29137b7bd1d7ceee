import { DatabaseManager } from '../src/services/database';
import { REFRESH_THRESHOLD_MS, TOKEN_KEY, TokenManager, TokenRefresher } from '../src/services/token-manager';
import { CacheToken } from '../src/types';
import { AppError, ErrorType } from '../src/utils/error-handler';

const NOW = 1_700_000_000_000;

const storedToken = (expiresAt: number): CacheToken => ({
  accessToken: 'test-token',
  refreshToken: 'test-refresh',
  scope: 'user-follow-read',
  expiresAt,
});

describe('TokenManager', () => {
  let db: DatabaseManager;
  let refresher: jest.Mocked<TokenRefresher>;
  let manager: TokenManager;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation();
    db = new DatabaseManager(':memory:');
    await db.initialized;
    refresher = { refreshToken: jest.fn() };
    manager = new TokenManager(db, refresher, () => NOW);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await db.close();
  });

  test('hands out the stored token while it is fresh', async () => {
    await manager.save(storedToken(NOW + 60 * 60 * 1000));

    await expect(manager.getAccessToken()).resolves.toBe('test-token');
    expect(refresher.refreshToken).not.toHaveBeenCalled();
  });

  test('refreshes a token close to expiry and keeps the old refresh token', async () => {
    await manager.save(storedToken(NOW + REFRESH_THRESHOLD_MS - 1));
    refresher.refreshToken.mockResolvedValue({
      accessToken: 'test-token-2',
      refreshToken: '',
      scope: 'user-follow-read',
      expiresAt: NOW + 3600 * 1000,
    });

    await expect(manager.getAccessToken()).resolves.toBe('test-token-2');
    expect(refresher.refreshToken).toHaveBeenCalledWith('test-refresh');
    await expect(db.get('token', TOKEN_KEY)).resolves.toEqual({
      accessToken: 'test-token-2',
      refreshToken: 'test-refresh',
      scope: 'user-follow-read',
      expiresAt: NOW + 3600 * 1000,
    });
  });

  test('stores a rotated refresh token', async () => {
    await manager.save(storedToken(NOW + 60 * 60 * 1000));
    refresher.refreshToken.mockResolvedValue({
      accessToken: 'test-token-3',
      refreshToken: 'test-refresh-3',
      scope: 'user-follow-read',
      expiresAt: NOW + 3600 * 1000,
    });

    await expect(manager.refresh()).resolves.toBe('test-token-3');
    await expect(manager.load()).resolves.toMatchObject({ refreshToken: 'test-refresh-3' });
  });

  test('a rejected refresh token asks for a new login', async () => {
    await manager.save(storedToken(NOW - 1));
    refresher.refreshToken.mockRejectedValue(new AppError(ErrorType.BadRequest, 'HTTP 400: invalid_grant', 400));

    await expect(manager.getAccessToken()).rejects.toMatchObject({
      type: ErrorType.AuthExpired,
      message: 'Refresh token was rejected. Run "release-week auth" again.',
    });
  });

  test('other refresh failures pass through', async () => {
    await manager.save(storedToken(NOW - 1));
    const failure = new AppError(ErrorType.NetworkError, 'socket hang up');
    refresher.refreshToken.mockRejectedValue(failure);

    await expect(manager.refresh()).rejects.toBe(failure);
  });

  test('without a stored token the user must authenticate', async () => {
    await expect(manager.getAccessToken()).rejects.toMatchObject({ type: ErrorType.AuthExpired });

    await manager.save(storedToken(NOW + 60 * 60 * 1000));
    await manager.clear();
    await expect(manager.load()).resolves.toBeNull();
  });
});
