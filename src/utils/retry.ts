/**
 * Retry policy with exponential backoff and jitter
 */

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number; // 0-1, adds randomness to delay
  rateLimitCapMs: number; // longest Retry-After the fetcher will wait out
  rateLimitBaseDelayMs: number; // first wait when a 429 carries no Retry-After
  maxRateLimitRetries: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  rateLimitCapMs: 120000,
  rateLimitBaseDelayMs: 5000,
  maxRateLimitRetries: 8,
};

export type Sleeper = (ms: number) => Promise<void>;

export type RandomSource = () => number;

/**
 * Delay before retry number `attempt` (0-based) of a transient failure
 * Formula: min(baseDelay * 2^attempt * (1 +/- jitter), maxDelay)
 */
export function calculateBackoffDelay(
  attempt: number,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  random: RandomSource = Math.random,
): number {
  const exponentialDelay = policy.baseDelayMs * Math.pow(2, attempt);
  const jitterMultiplier = 1 + (random() - 0.5) * 2 * policy.jitterFactor;
  return Math.round(Math.min(exponentialDelay * jitterMultiplier, policy.maxDelayMs));
}

/**
 * Wait after the `hit`-th consecutive 429 (1-based) when no Retry-After was sent
 */
export function rateLimitBackoff(hit: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): number {
  return Math.min(policy.rateLimitBaseDelayMs * Math.pow(2, Math.max(0, hit - 1)), policy.rateLimitCapMs);
}

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
