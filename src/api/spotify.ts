import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import {
  ReleaseKind,
  SpotifyAlbum,
  SpotifyAlbumTracks,
  SpotifyArtist,
  SpotifyPlaylist,
} from '../types';
import { CatalogResource, Page } from '../services/fetcher';
import { Logger } from '../utils/logger';

export const SPOTIFY_PAGE_LIMIT = 50;
export const SEVERAL_ALBUMS_LIMIT = 20;
export const ADD_TRACKS_LIMIT = 100;

const artistSchema: z.ZodType<SpotifyArtist, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  name: z.string(),
  genres: z.array(z.string()).default([]),
});

const followingSchema = z.object({
  artists: z.object({
    items: z.array(artistSchema),
    next: z.string().nullable(),
    total: z.number().nullish(),
    cursors: z.object({ after: z.string().nullish() }).nullish(),
  }),
});

const albumSchema: z.ZodType<SpotifyAlbum, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  name: z.string(),
  release_date: z.string(),
  release_date_precision: z.string(),
  album_type: z.string(),
  album_group: z.string().optional(),
  artists: z.array(z.object({ id: z.string(), name: z.string() })),
});

const albumPageSchema = z.object({
  items: z.array(z.unknown()),
  next: z.string().nullable(),
  total: z.number().nullish(),
});

const severalAlbumsSchema = z.object({
  albums: z.array(
    z
      .object({
        id: z.string(),
        name: z.string(),
        tracks: z.object({
          items: z.array(z.object({ id: z.string(), name: z.string(), uri: z.string() })),
        }),
      })
      .nullable(),
  ),
});

const playlistSchema: z.ZodType<SpotifyPlaylist, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  name: z.string(),
});

const playlistPageSchema = z.object({
  items: z.array(playlistSchema.nullable()),
  next: z.string().nullable(),
  total: z.number().nullish(),
});

/**
 * Catalog resources the sync engine walks
 */
export interface CatalogClient {
  followedArtists(): CatalogResource<SpotifyArtist>;
  artistReleases(artistId: string, kinds: readonly ReleaseKind[]): CatalogResource<SpotifyAlbum>;
}

/**
 * Thin Spotify Web API client. Every call takes the access token from the
 * caller; retries and rate limiting live in RateLimitedFetcher.
 */
export class SpotifyAPIClient implements CatalogClient {
  private client: AxiosInstance;

  constructor(baseURL: string = 'https://api.spotify.com/v1') {
    this.client = axios.create({
      baseURL,
      timeout: 30000,
    });
  }

  private auth(accessToken: string) {
    return { Authorization: `Bearer ${accessToken}` };
  }

  followedArtists(): CatalogResource<SpotifyArtist> {
    return {
      name: 'followed artists',
      fetchPage: async (cursor, accessToken): Promise<Page<SpotifyArtist>> => {
        const response = await this.client.get('/me/following', {
          headers: this.auth(accessToken),
          params: {
            type: 'artist',
            limit: SPOTIFY_PAGE_LIMIT,
            ...(cursor !== null ? { after: cursor } : {}),
          },
        });
        const { artists } = followingSchema.parse(response.data);
        return {
          items: artists.items,
          next: artists.next !== null ? (artists.cursors?.after ?? null) : null,
          total: artists.total ?? null,
        };
      },
    };
  }

  /**
   * Albums of one artist restricted to the given groups. The cursor is the
   * absolute `next` URL returned by the previous page.
   */
  artistReleases(artistId: string, kinds: readonly ReleaseKind[]): CatalogResource<SpotifyAlbum> {
    return {
      name: `releases of ${artistId}`,
      fetchPage: async (cursor, accessToken): Promise<Page<SpotifyAlbum>> => {
        const response =
          cursor === null
            ? await this.client.get(`/artists/${encodeURIComponent(artistId)}/albums`, {
                headers: this.auth(accessToken),
                params: { include_groups: kinds.join(','), limit: SPOTIFY_PAGE_LIMIT },
              })
            : await this.client.get(cursor, { headers: this.auth(accessToken) });

        const page = albumPageSchema.parse(response.data);
        const items: SpotifyAlbum[] = [];
        for (const raw of page.items) {
          const parsed = albumSchema.safeParse(raw);
          if (parsed.success) {
            items.push(parsed.data);
          } else {
            Logger.warn(`Skipping unreadable release entry for artist ${artistId}`, {
              issue: parsed.error.issues[0]?.message,
            });
          }
        }
        return { items, next: page.next, total: page.total ?? null };
      },
    };
  }

  currentUserPlaylists(): CatalogResource<SpotifyPlaylist> {
    return {
      name: 'current user playlists',
      fetchPage: async (cursor, accessToken): Promise<Page<SpotifyPlaylist>> => {
        const response =
          cursor === null
            ? await this.client.get('/me/playlists', {
                headers: this.auth(accessToken),
                params: { limit: SPOTIFY_PAGE_LIMIT },
              })
            : await this.client.get(cursor, { headers: this.auth(accessToken) });
        const page = playlistPageSchema.parse(response.data);
        return {
          items: page.items.filter((item): item is SpotifyPlaylist => item !== null),
          next: page.next,
          total: page.total ?? null,
        };
      },
    };
  }

  /**
   * Number of followed artists as reported by the API
   */
  async followedArtistTotal(accessToken: string): Promise<number | null> {
    const response = await this.client.get('/me/following', {
      headers: this.auth(accessToken),
      params: { type: 'artist', limit: 1 },
    });
    return followingSchema.parse(response.data).artists.total ?? null;
  }

  async getSeveralAlbums(albumIds: string[], accessToken: string): Promise<SpotifyAlbumTracks[]> {
    if (albumIds.length > SEVERAL_ALBUMS_LIMIT) {
      throw new RangeError(`At most ${SEVERAL_ALBUMS_LIMIT} albums per request`);
    }
    const response = await this.client.get('/albums', {
      headers: this.auth(accessToken),
      params: { ids: albumIds.join(',') },
    });
    const { albums } = severalAlbumsSchema.parse(response.data);
    return albums
      .filter((album): album is NonNullable<typeof album> => album !== null)
      .map((album) => ({ id: album.id, name: album.name, tracks: album.tracks.items }));
  }

  async createPlaylist(
    userId: string,
    name: string,
    description: string,
    accessToken: string,
  ): Promise<SpotifyPlaylist> {
    const response = await this.client.post(
      `/users/${encodeURIComponent(userId)}/playlists`,
      { name, description, public: false },
      { headers: this.auth(accessToken) },
    );
    return playlistSchema.parse(response.data);
  }

  async addTracks(playlistId: string, uris: string[], accessToken: string): Promise<void> {
    if (uris.length > ADD_TRACKS_LIMIT) {
      throw new RangeError(`At most ${ADD_TRACKS_LIMIT} tracks per request`);
    }
    await this.client.post(
      `/playlists/${encodeURIComponent(playlistId)}/tracks`,
      { uris },
      { headers: this.auth(accessToken) },
    );
  }
}
