/** Metadata key written by @RateLimit() and read by RateLimitGuard */
export const RATE_LIMIT_METADATA = 'rate-limit:policy';

/** Injection token for the primary RateLimitStorage */
export const RATE_LIMIT_STORAGE = 'RATE_LIMIT_STORAGE';

export interface RateLimitPolicy {
  /** Requests allowed per window */
  limit: number;
  windowMs: number;
}

/** Route classes. Reads are capped more generously than creation. */
export const RateLimitPolicies = {
  READ: { limit: 10, windowMs: 60_000 },
  CREATE: { limit: 3, windowMs: 5 * 60_000 },
} as const satisfies Record<string, RateLimitPolicy>;
