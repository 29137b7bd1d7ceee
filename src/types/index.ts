export const RELEASE_KINDS = ['album', 'single', 'appears_on', 'compilation'] as const;

export type ReleaseKind = (typeof RELEASE_KINDS)[number];

export interface Artist {
  id: string;
  name: string;
  genres: string[];
  cachedAt: string;
}

/**
 * A release cached under its owning artist. `releaseDate` is always a
 * day-precision ISO date (YYYY-MM-DD).
 */
export interface Release {
  id: string;
  artistId: string;
  kind: ReleaseKind;
  releaseDate: string;
  title: string;
  artists: string[];
}

export interface WeekCoordinate {
  year: number;
  week: number;
}

export interface ReleaseWeek extends WeekCoordinate {
  start: Date;
  end: Date;
}

export interface WeeklyReleases {
  week: ReleaseWeek;
  releases: Release[];
}

export type UpdateStatus = 'in_progress' | 'completed' | 'failed';

/**
 * Persisted progress of a bulk update (artist sync or release sync)
 */
export interface UpdateState {
  kind: string;
  cursor: string | null;
  processedIds: string[];
  totalCount: number | null;
  startedAt: string;
  updatedAt: string;
  status: UpdateStatus;
  lastError?: string;
}

export interface CacheToken {
  accessToken: string;
  refreshToken: string;
  scope: string;
  expiresAt: number; // Unix timestamp (ms)
}

export interface SpotifyArtist {
  id: string;
  name: string;
  genres: string[];
}

export interface SpotifyAlbum {
  id: string;
  name: string;
  release_date: string;
  release_date_precision: string;
  album_type: string;
  album_group?: string;
  artists: Array<{ id: string; name: string }>;
}

export interface SpotifyTrack {
  id: string;
  name: string;
  uri: string;
}

export interface SpotifyAlbumTracks {
  id: string;
  name: string;
  tracks: SpotifyTrack[];
}

export interface SpotifyPlaylist {
  id: string;
  name: string;
}
