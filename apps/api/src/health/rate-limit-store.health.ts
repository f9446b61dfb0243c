import { Inject, Injectable, Logger } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { RATE_LIMIT_STORAGE } from '../rate-limit/rate-limit.constants';
import type { RateLimitStorage } from '../rate-limit/rate-limit-storage';

/**
 * Reports which rate-limit store is active and whether it answers.
 *
 * Always healthy: RateLimitGuard counts in memory while Redis is down, so
 * an unreachable store degrades limits but does not take the API down.
 */
@Injectable()
export class RateLimitStoreHealthIndicator extends HealthIndicator {
  private readonly logger = new Logger(RateLimitStoreHealthIndicator.name);

  constructor(
    @Inject(RATE_LIMIT_STORAGE)
    private readonly storage: RateLimitStorage,
  ) {
    super();
  }

  async check(key: string): Promise<HealthIndicatorResult> {
    const store = this.storage.kind;

    try {
      await this.storage.ping();
      return this.getStatus(key, true, { store, reachable: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Rate limit store "${store}" unreachable: ${message}`);
      return this.getStatus(key, true, {
        store,
        reachable: false,
        countingIn: 'memory',
      });
    }
  }
}
