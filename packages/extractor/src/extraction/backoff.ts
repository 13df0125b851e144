import { RateLimitError } from '../errors';

export interface BackoffPolicy {
  baseMs: number;
  maxMs: number;
  /** Base delay after a RateLimitError */
  rateLimitBaseMs: number;
  rateLimitMaxMs: number;
  /** Longest Retry-After honoured */
  retryAfterMaxMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseMs: 1000,
  maxMs: 30_000,
  rateLimitBaseMs: 5000,
  rateLimitMaxMs: 60_000,
  retryAfterMaxMs: 120_000,
};

/**
 * Delay before the attempt following failed attempt `attempt` (1-based).
 * Rate limits back off longer, or as long as the server asked if that is
 * longer, up to `retryAfterMaxMs`.
 */
export function computeBackoff(attempt: number, error: unknown, policy: BackoffPolicy = DEFAULT_BACKOFF): number {
  const exponent = Math.max(0, attempt - 1);

  if (error instanceof RateLimitError) {
    const delay = Math.min(policy.rateLimitBaseMs * 2 ** exponent, policy.rateLimitMaxMs);
    return Math.max(delay, Math.min(error.retryAfterMs ?? 0, policy.retryAfterMaxMs));
  }

  return Math.min(policy.baseMs * 2 ** exponent, policy.maxMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
