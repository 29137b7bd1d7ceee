import { createArtistsCommand, renderArtistList } from '../src/commands/artists';
import { createAuthCommand } from '../src/commands/auth';
import { createInfoCommand, renderArtistCounts, renderStates, renderWeekInfo } from '../src/commands/info';
import { createPlaylistCommand, renderPlaylistOutcomes } from '../src/commands/playlist';
import { createReleasesCommand, renderWeeklyReleases } from '../src/commands/releases';
import { loadConfig } from '../src/config';
import { AppContext, createContext } from '../src/context';
import { DatabaseManager } from '../src/services/database';
import { Artist } from '../src/types';
import { Calendar } from '../src/utils/calendar';
import { CommandBuilder } from '../src/utils/command-builder';
import { AppError, ErrorType } from '../src/utils/error-handler';

// Mock chalk and ora to keep terminal codes out of assertions
jest.mock('chalk', () => ({
  __esModule: true,
  default: {
    green: (str: string) => str,
    red: (str: string) => str,
    cyan: (str: string) => str,
    yellow: (str: string) => str,
    gray: (str: string) => str,
    bold: (str: string) => str,
  },
}));

jest.mock('ora', () => ({
  __esModule: true,
  default: () => ({
    start: jest.fn().mockReturnThis(),
    succeed: jest.fn().mockReturnThis(),
    fail: jest.fn().mockReturnThis(),
    stop: jest.fn().mockReturnThis(),
  }),
}));

const artist = (id: string, name: string, genres: string[] = []): Artist => ({
  id,
  name,
  genres,
  cachedAt: '2024-01-01T00:00:00.000Z',
});

describe('CLI Commands', () => {
  let db: DatabaseManager;
  let ctx: AppContext;

  beforeEach(() => {
    db = new DatabaseManager(':memory:');
    ctx = createContext(loadConfig({ SPOTIFY_USER_ID: 'user-1' }), db);
  });

  afterEach(async () => {
    await db.close();
  });

  const longOptions = (cmd: { options: readonly { long?: string }[] }) => cmd.options.map((opt) => opt.long);

  test('artists command', () => {
    const cmd = createArtistsCommand(ctx);
    expect(cmd.name()).toBe('artists');
    expect(longOptions(cmd)).toEqual(['--update', '--force', '--search']);
  });

  test('releases command', () => {
    const cmd = createReleasesCommand(ctx);
    expect(cmd.name()).toBe('releases');
    expect(longOptions(cmd)).toEqual(['--update', '--force', '--type', '--date', '--previous-weeks']);
  });

  test('info command', () => {
    const cmd = createInfoCommand(ctx);
    expect(cmd.name()).toBe('info');
    expect(longOptions(cmd)).toEqual(['--release-week', '--artists', '--state', '--date', '--previous-weeks']);
  });

  test('playlist command', () => {
    const cmd = createPlaylistCommand(ctx);
    expect(cmd.name()).toBe('playlist');
    expect(cmd.description()).toContain('Weekly Picks');
    expect(longOptions(cmd)).toEqual(['--type', '--date', '--previous-weeks']);
  });

  test('auth command', () => {
    const cmd = createAuthCommand(ctx);
    expect(cmd.name()).toBe('auth');
    expect(cmd.description()).toContain('PKCE');
  });

  test('the OAuth service needs a client id', () => {
    expect(() => ctx.oauth()).toThrow('SPOTIFY_CLIENT_ID is not set');
  });
});

describe('renderArtistList', () => {
  const artists = [artist('1', 'Zed', ['rock']), artist('2', 'Alpha', ['jazz', 'soul', 'funk', 'pop'])];

  test('lists artists by name with a count', () => {
    expect(renderArtistList(artists)).toEqual(['Alpha (jazz, soul, funk)', 'Zed (rock)', '', '2 of 2 artists']);
  });

  test('filters by search term', () => {
    expect(renderArtistList(artists, 'ze')).toEqual(['Zed (rock)', '', '1 of 2 artists']);
    expect(renderArtistList(artists, 'nobody')).toEqual(['No cached artists match "nobody".']);
  });

  test('explains an empty cache', () => {
    expect(renderArtistList([])).toEqual(['No artists cached. Run with --update first.']);
  });
});

describe('renderWeeklyReleases', () => {
  test('prints a header per week and its releases', () => {
    const calendar = new Calendar('contains-jan-1');
    const lines = renderWeeklyReleases([
      {
        week: calendar.releaseWeek(2024, 2),
        releases: [
          { id: 'r1', artistId: 'a1', kind: 'album', releaseDate: '2024-01-06', title: 'Record', artists: ['Alpha'] },
        ],
      },
      { week: calendar.releaseWeek(2024, 1), releases: [] },
    ]);

    expect(lines).toEqual([
      'Week 2/2024 (2024-01-06 - 2024-01-12)',
      '  2024-01-06  Alpha - Record [album]',
      'Week 1/2024 (2023-12-30 - 2024-01-05)',
      '  no releases',
    ]);
  });
});

describe('info rendering', () => {
  test('week ranges', () => {
    const weeks = new Calendar('contains-jan-1').weeksEndingAt(new Date('2023-10-17T00:00:00Z'), 1);
    expect(renderWeekInfo(weeks)).toEqual([
      'Release week 42/2023: 2023-10-14 - 2023-10-20',
      'Release week 41/2023: 2023-10-07 - 2023-10-13',
    ]);
  });

  test('artist counts', () => {
    expect(renderArtistCounts(8, 10)).toEqual([
      'Artist count cache: 8',
      'Artist count remote: 10',
      'Artist cache is outdated by 2.',
    ]);
    expect(renderArtistCounts(10, 10)).toEqual(['Artist count cache: 10', 'Artist count remote: 10']);
    expect(renderArtistCounts(3, null)).toEqual(['Artist count cache: 3', 'Artist count remote: unavailable']);
  });

  test('update states', () => {
    expect(renderStates([])).toEqual(['No unfinished updates.']);
    expect(
      renderStates([
        {
          kind: 'artists',
          cursor: 'a9',
          processedIds: ['a1'],
          totalCount: null,
          startedAt: '2024-01-01T00:00:00.000Z',
          updatedAt: '2024-01-01T00:05:00.000Z',
          status: 'in_progress',
        },
      ]),
    ).toEqual(['artists: in_progress, 1 processed, updated 2024-01-01T00:05:00.000Z']);
  });
});

describe('renderPlaylistOutcomes', () => {
  test('describes each playlist', () => {
    const week = new Calendar('first-saturday').releaseWeek(2024, 1);
    expect(
      renderPlaylistOutcomes([
        { name: 'Weekly Picks 1/2024 (album)', kind: 'album', week, status: 'created', playlistId: 'p1', trackCount: 4 },
        { name: 'Weekly Picks 1/2024 (single)', kind: 'single', week, status: 'exists', trackCount: 0 },
        { name: 'Weekly Picks 1/2024 (compilation)', kind: 'compilation', week, status: 'empty', trackCount: 0 },
      ]),
    ).toEqual([
      'Created Weekly Picks 1/2024 (album) with 4 tracks',
      'Playlist Weekly Picks 1/2024 (single) already exists',
      'No compilation releases in week 1/2024, skipped Weekly Picks 1/2024 (compilation)',
    ]);
  });
});

describe('CommandBuilder', () => {
  test('describes application errors with their user message', () => {
    expect(CommandBuilder.describeError(new AppError(ErrorType.NotFound, 'gone'))).toBe('Resource not found.');
    expect(CommandBuilder.describeError(new Error('plain'))).toBe('plain');
  });

  test('writes progress into the spinner text', () => {
    const spinner = CommandBuilder.createSpinner();
    CommandBuilder.createProgressCallback(spinner)({ stage: 'artists', current: 50, total: 200, currentPage: 1 });
    expect(spinner.text).toBe('artists: 50/200 (25%) (page 1)');
  });
});
