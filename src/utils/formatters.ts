import { Artist, Release, ReleaseKind, ReleaseWeek, SpotifyAlbum, SpotifyArtist, UpdateState } from '../types';
import { formatDate, parseDayPrecisionDate } from './calendar';
import { releaseKindOf } from './release-kinds';

export type ParsedRelease =
  | { ok: true; release: Release }
  | { ok: false; reason: 'precision' | 'malformed' | 'kind'; detail: string };

export function toArtist(data: SpotifyArtist, cachedAt: string): Artist {
  return {
    id: data.id,
    name: data.name,
    genres: data.genres,
    cachedAt,
  };
}

/**
 * Turn an album entry from the artist albums endpoint into a cached Release.
 * Only day-precision dates are accepted.
 */
export function parseRelease(album: SpotifyAlbum, artistId: string): ParsedRelease {
  if (album.release_date_precision !== 'day') {
    return { ok: false, reason: 'precision', detail: `${album.release_date} (${album.release_date_precision})` };
  }
  if (parseDayPrecisionDate(album.release_date) === null) {
    return { ok: false, reason: 'malformed', detail: album.release_date };
  }
  const kind = releaseKindOf(album.album_group, album.album_type);
  if (kind === null) {
    return { ok: false, reason: 'kind', detail: album.album_group ?? album.album_type };
  }
  return {
    ok: true,
    release: {
      id: album.id,
      artistId,
      kind,
      releaseDate: album.release_date,
      title: album.name,
      artists: album.artists.map((a) => a.name),
    },
  };
}

/**
 * Display order: newest first, then by first artist name (case-insensitive)
 */
export function compareForDisplay(a: Release, b: Release): number {
  if (a.releaseDate !== b.releaseDate) {
    return a.releaseDate < b.releaseDate ? 1 : -1;
  }
  const nameA = (a.artists[0] ?? '').toLowerCase();
  const nameB = (b.artists[0] ?? '').toLowerCase();
  if (nameA !== nameB) {
    return nameA < nameB ? -1 : 1;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function formatGenreList(genres: string[], limit: number = 3): string {
  return genres.slice(0, limit).join(', ');
}

export function formatWeekHeader(week: ReleaseWeek): string {
  return `Week ${week.week}/${week.year} (${formatDate(week.start)} - ${formatDate(week.end)})`;
}

export function formatReleaseLine(release: Release): string {
  return `${release.releaseDate}  ${release.artists.join(', ')} - ${release.title} [${release.kind}]`;
}

export function generatePlaylistName(week: ReleaseWeek, kind: ReleaseKind): string {
  return `Weekly Picks ${week.week}/${week.year} (${kind})`;
}

export function filterArtists(artists: Artist[], search?: string): Artist[] {
  const term = search?.toLowerCase();
  return artists
    .filter((artist) => term === undefined || artist.name.toLowerCase().includes(term))
    .sort((a, b) => a.name.localeCompare(b.name) || (a.id < b.id ? -1 : 1));
}

export function formatArtistLine(artist: Artist): string {
  const genres = formatGenreList(artist.genres);
  return genres ? `${artist.name} (${genres})` : artist.name;
}

export function formatUpdateState(state: UpdateState): string {
  const total = state.totalCount !== null ? `/${state.totalCount}` : '';
  const error = state.lastError ? ` - ${state.lastError}` : '';
  return `${state.kind}: ${state.status}, ${state.processedIds.length}${total} processed, updated ${state.updatedAt}${error}`;
}
