import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { RateLimitStoreHealthIndicator } from './rate-limit-store.health';

/** Relies on the global RateLimitModule for RATE_LIMIT_STORAGE. */
@Module({
  imports: [TerminusModule],
  controllers: [HealthController],
  providers: [RateLimitStoreHealthIndicator],
})
export class HealthModule {}
