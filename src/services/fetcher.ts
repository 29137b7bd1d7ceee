import { AppError, ErrorHandler, ErrorType } from '../utils/error-handler';
import { Logger } from '../utils/logger';
import {
  DEFAULT_RETRY_POLICY,
  RandomSource,
  RetryPolicy,
  Sleeper,
  calculateBackoffDelay,
  rateLimitBackoff,
  sleep,
} from '../utils/retry';

/**
 * Supplies bearer tokens to the fetcher. `refresh` is called at most once per
 * request, after the API answered 401.
 */
export interface CredentialsProvider {
  getAccessToken(): Promise<string>;
  refresh(): Promise<string>;
}

export interface Page<T> {
  items: T[];
  next: string | null;
  total?: number | null;
}

export interface FetchedPage<T> extends Page<T> {
  cursor: string | null; // cursor the page was requested with
  pageNumber: number;
}

/**
 * A cursor-paginated remote collection
 */
export interface CatalogResource<T> {
  name: string;
  fetchPage(cursor: string | null, accessToken: string): Promise<Page<T>>;
}

export interface FetcherOptions {
  policy?: RetryPolicy;
  pacingMs?: number;
  sleep?: Sleeper;
  random?: RandomSource;
}

/**
 * Issues catalog requests with pacing, rate-limit handling, transient-error
 * retries and a single token refresh on 401. Pages are retried, never skipped.
 */
export class RateLimitedFetcher {
  private readonly policy: RetryPolicy;
  private readonly pacingMs: number;
  private readonly sleeper: Sleeper;
  private readonly random: RandomSource;
  private requests = 0;

  constructor(
    private readonly credentials: CredentialsProvider,
    options: FetcherOptions = {},
  ) {
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.pacingMs = options.pacingMs ?? 0;
    this.sleeper = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  get requestCount(): number {
    return this.requests;
  }

  async request<T>(operation: string, call: (accessToken: string) => Promise<T>): Promise<T> {
    let accessToken = await this.credentials.getAccessToken();
    let attempt = 0;
    let rateLimitHits = 0;
    let refreshed = false;

    for (;;) {
      if (this.pacingMs > 0) {
        await this.sleeper(this.pacingMs);
      }
      this.requests++;

      try {
        return await call(accessToken);
      } catch (error) {
        const appError = ErrorHandler.parse(error, { operation });

        if (appError.type === ErrorType.RateLimit) {
          rateLimitHits++;
          const delay = appError.retryAfterMs ?? rateLimitBackoff(rateLimitHits, this.policy);
          if (delay > this.policy.rateLimitCapMs) {
            throw new AppError(
              ErrorType.RateLimit,
              `${operation}: server asked to wait ${Math.ceil(delay / 1000)}s, more than the ${this.policy.rateLimitCapMs / 1000}s limit`,
              appError.statusCode,
              appError,
              { operation },
              delay,
            );
          }
          // an advisory wait under the cap is always honored
          if (appError.retryAfterMs === undefined && rateLimitHits > this.policy.maxRateLimitRetries) {
            throw new AppError(
              ErrorType.RateLimit,
              `${operation}: still rate limited after ${this.policy.maxRateLimitRetries} waits`,
              appError.statusCode,
              appError,
              { operation },
            );
          }
          Logger.warn(`Rate limited on ${operation}, waiting ${(delay / 1000).toFixed(1)}s`, {
            hit: rateLimitHits,
            retryAfterMs: appError.retryAfterMs,
          });
          await this.sleeper(delay);
          continue;
        }
        rateLimitHits = 0;

        if (appError.type === ErrorType.AuthExpired) {
          if (refreshed) {
            throw appError;
          }
          refreshed = true;
          Logger.info(`Access token rejected on ${operation}, refreshing`);
          accessToken = await this.credentials.refresh();
          continue;
        }

        if (appError.isRetryable()) {
          if (attempt >= this.policy.maxRetries) {
            throw new AppError(
              appError.type,
              `${operation} failed after ${attempt + 1} attempts: ${appError.message}`,
              appError.statusCode,
              appError,
              { operation },
            );
          }
          const delay = calculateBackoffDelay(attempt, this.policy, this.random);
          attempt++;
          Logger.warn(`Retry ${attempt}/${this.policy.maxRetries} for ${operation} in ${(delay / 1000).toFixed(1)}s`, {
            type: appError.type,
            status: appError.statusCode,
          });
          await this.sleeper(delay);
          continue;
        }

        throw appError;
      }
    }
  }

  page<T>(resource: CatalogResource<T>, cursor: string | null): Promise<Page<T>> {
    return this.request(`fetch ${resource.name}`, (accessToken) => resource.fetchPage(cursor, accessToken));
  }

  /**
   * Walk a resource page by page starting at `from`. Each yielded page carries
   * the cursor it was requested with and the continuation cursor in `next`.
   */
  async *pages<T>(resource: CatalogResource<T>, from: string | null = null): AsyncGenerator<FetchedPage<T>> {
    let cursor = from;
    let pageNumber = 0;
    do {
      const page = await this.page(resource, cursor);
      pageNumber++;
      if (page.next !== null && page.next === cursor) {
        throw new AppError(ErrorType.MalformedData, `${resource.name} returned its own cursor as next page`, undefined, undefined, {
          operation: `fetch ${resource.name}`,
          details: { cursor },
        });
      }
      yield { ...page, cursor, pageNumber };
      cursor = page.next;
    } while (cursor !== null);
  }

  async *fetchAll<T>(resource: CatalogResource<T>, from: string | null = null): AsyncGenerator<T> {
    for await (const page of this.pages(resource, from)) {
      yield* page.items;
    }
  }

  async pause(ms: number): Promise<void> {
    if (ms > 0) {
      Logger.debug(`Pausing ${ms}ms between chunks`);
      await this.sleeper(ms);
    }
  }
}
