import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { RedisModule, REDIS_CLIENT } from '@contacts/redis';
import { RATE_LIMIT_STORAGE } from './rate-limit.constants';
import {
  InMemoryRateLimitStorage,
  RateLimitStorage,
  RedisRateLimitStorage,
} from './rate-limit-storage';
import { RateLimitGuard } from './rate-limit.guard';

/**
 * RateLimitModule — admission control shared by every feature module.
 *
 * Global so that `@UseGuards(RateLimitGuard)` resolves its storage in any
 * controller without re-importing this module.
 *
 * RATE_LIMIT_STORE selects the primary store:
 *   - "redis" (default): counters shared across instances
 *   - "memory": process-local counters, no Redis connection is opened
 */
@Global()
@Module({
  imports: [RedisModule.forRoot()],
  providers: [
    {
      provide: InMemoryRateLimitStorage,
      useFactory: () => new InMemoryRateLimitStorage(),
    },
    {
      provide: RATE_LIMIT_STORAGE,
      inject: [ConfigService, InMemoryRateLimitStorage, REDIS_CLIENT],
      useFactory: (
        configService: ConfigService,
        memory: InMemoryRateLimitStorage,
        redis: Redis,
      ): RateLimitStorage => {
        const store = configService.get<string>('RATE_LIMIT_STORE', 'redis');
        return store === 'memory' ? memory : new RedisRateLimitStorage(redis);
      },
    },
    RateLimitGuard,
  ],
  exports: [RATE_LIMIT_STORAGE, InMemoryRateLimitStorage, RateLimitGuard],
})
export class RateLimitModule {}
