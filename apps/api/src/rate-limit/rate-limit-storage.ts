import { Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';

/** Counter state after one hit. */
export interface RateLimitHit {
  /** Requests counted in the current window, this one included */
  count: number;
  /** Milliseconds until the window resets */
  resetInMs: number;
}

/**
 * Fixed-window counter store used by RateLimitGuard.
 */
export interface RateLimitStorage {
  readonly kind: 'memory' | 'redis';
  increment(key: string, windowMs: number): Promise<RateLimitHit>;
  /** Resolves when the backing store answers; rejects otherwise. */
  ping(): Promise<void>;
}

interface WindowRecord {
  count: number;
  /** Epoch ms at which this record's own window closes */
  expiresAt: number;
}

const PRUNE_INTERVAL_MS = 60_000;

/** The ioredis commands the Redis store issues. */
export type RateLimitRedisClient = Pick<
  Redis,
  'incr' | 'pexpire' | 'pttl' | 'ping' | 'quit' | 'disconnect' | 'status'
>;

/**
 * Process-local counters. Used in tests, with RATE_LIMIT_STORE=memory, and
 * as the fallback when Redis is unreachable.
 *
 * Keys of different route classes share the map, so each record expires on
 * its own window, never on the window of the hit that triggers a prune.
 */
export class InMemoryRateLimitStorage implements RateLimitStorage {
  readonly kind = 'memory';
  private readonly store = new Map<string, WindowRecord>();
  private lastPrune: number;

  constructor(private readonly now: () => number = Date.now) {
    this.lastPrune = now();
  }

  async increment(key: string, windowMs: number): Promise<RateLimitHit> {
    const now = this.now();
    this.pruneExpired(now);

    let record = this.store.get(key);
    if (!record || now >= record.expiresAt) {
      record = { count: 0, expiresAt: now + windowMs };
      this.store.set(key, record);
    }

    record.count++;
    return {
      count: record.count,
      resetInMs: record.expiresAt - now,
    };
  }

  async ping(): Promise<void> {}

  private pruneExpired(now: number): void {
    if (now - this.lastPrune < PRUNE_INTERVAL_MS) return;
    this.lastPrune = now;
    for (const [key, record] of this.store.entries()) {
      if (now >= record.expiresAt) {
        this.store.delete(key);
      }
    }
  }
}

/**
 * Redis-backed counters shared by every API instance.
 *
 * INCR creates the key; the first hit of a window sets its expiry. A key
 * that somehow lost its TTL gets a fresh one instead of counting forever.
 */
export class RedisRateLimitStorage implements RateLimitStorage, OnModuleDestroy {
  readonly kind = 'redis';
  private readonly logger = new Logger(RedisRateLimitStorage.name);

  constructor(private readonly client: RateLimitRedisClient) {}

  async increment(key: string, windowMs: number): Promise<RateLimitHit> {
    const count = await this.client.incr(key);
    if (count === 1) {
      await this.client.pexpire(key, windowMs);
      return { count, resetInMs: windowMs };
    }

    const ttl = await this.client.pttl(key);
    if (ttl < 0) {
      await this.client.pexpire(key, windowMs);
      return { count, resetInMs: windowMs };
    }

    return { count, resetInMs: ttl };
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }

  async onModuleDestroy(): Promise<void> {
    // Lazy connection that was never used: nothing to close gracefully
    if (this.client.status === 'wait') {
      this.client.disconnect();
      return;
    }
    this.logger.log('Closing Redis rate-limit connection');
    await this.client.quit();
  }
}
