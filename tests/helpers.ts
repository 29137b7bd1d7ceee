import axios, { AxiosAdapter, AxiosError, AxiosHeaders, InternalAxiosRequestConfig } from 'axios';
import { CatalogClient } from '../src/api/spotify';
import { CatalogResource, CredentialsProvider, Page } from '../src/services/fetcher';
import { SpotifyAlbum, SpotifyArtist } from '../src/types';

export function httpError(status: number, headers: Record<string, string> = {}, data: unknown = {}): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, {
    data,
    status,
    statusText: String(status),
    headers,
    config,
  });
}

export function networkError(code: string = 'ECONNRESET'): AxiosError {
  return new AxiosError(`socket hang up (${code})`, code);
}

export interface StubResponse {
  status?: number;
  data: unknown;
}

/**
 * Route every axios instance created from now on through an in-process
 * adapter. Call from a test with jest.restoreAllMocks() in afterEach.
 */
export function stubAxios(respond: (config: InternalAxiosRequestConfig) => StubResponse) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const { status = 200, data } = respond(config);
    const response = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', config, undefined, response);
    }
    return response;
  };
  const create = axios.create.bind(axios);
  jest.spyOn(axios, 'create').mockImplementation((config) => create({ ...config, adapter }));
  return requests;
}

export class StaticCredentials implements CredentialsProvider {
  refreshes = 0;

  constructor(private token: string = 'test-token') {}

  async getAccessToken(): Promise<string> {
    return this.token;
  }

  async refresh(): Promise<string> {
    this.refreshes++;
    this.token = `test-token-${this.refreshes}`;
    return this.token;
  }
}

export function recordingSleeper() {
  const calls: number[] = [];
  const sleep = async (ms: number) => {
    calls.push(ms);
  };
  return { calls, sleep };
}

export function artist(id: string, name: string = id, genres: string[] = []): SpotifyArtist {
  return { id, name, genres };
}

export function album(
  id: string,
  releaseDate: string,
  options: { precision?: string; type?: string; group?: string; artists?: string[]; name?: string } = {},
): SpotifyAlbum {
  return {
    id,
    name: options.name ?? `Title ${id}`,
    release_date: releaseDate,
    release_date_precision: options.precision ?? 'day',
    album_type: options.type ?? 'album',
    album_group: options.group ?? options.type ?? 'album',
    artists: (options.artists ?? ['Artist']).map((name, index) => ({ id: `${id}-a${index}`, name })),
  };
}

/**
 * In-process stand-in for the Spotify catalog. Each resource is a list of
 * pages; cursors are page indexes rendered as strings. `failOnce` queues an
 * error thrown in place of one page request.
 */
export class FakeCatalog implements CatalogClient {
  readonly calls: string[] = [];
  private followed: SpotifyArtist[][] = [];
  private releases = new Map<string, SpotifyAlbum[][]>();
  private failures = new Map<string, Error[]>();

  setFollowed(pages: SpotifyArtist[][]): this {
    this.followed = pages;
    return this;
  }

  setReleases(artistId: string, pages: SpotifyAlbum[][]): this {
    this.releases.set(artistId, pages);
    return this;
  }

  failOnce(resource: string, cursor: string | null, error: Error): this {
    const key = `${resource}@${cursor ?? 'start'}`;
    this.failures.set(key, [...(this.failures.get(key) ?? []), error]);
    return this;
  }

  followedArtists(): CatalogResource<SpotifyArtist> {
    return this.resource('followed', this.followed);
  }

  artistReleases(artistId: string): CatalogResource<SpotifyAlbum> {
    return this.resource(`releases:${artistId}`, this.releases.get(artistId) ?? []);
  }

  private resource<T>(name: string, pages: T[][]): CatalogResource<T> {
    return {
      name,
      fetchPage: async (cursor): Promise<Page<T>> => {
        const key = `${name}@${cursor ?? 'start'}`;
        this.calls.push(key);
        const failure = this.failures.get(key)?.shift();
        if (failure) {
          throw failure;
        }
        const index = cursor === null ? 0 : Number(cursor);
        return {
          items: pages[index] ?? [],
          next: index + 1 < pages.length ? String(index + 1) : null,
          total: pages.reduce((sum, page) => sum + page.length, 0),
        };
      },
    };
  }
}
