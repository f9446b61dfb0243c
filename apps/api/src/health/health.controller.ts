import { Controller, Get } from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckService,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { RateLimitStoreHealthIndicator } from './rate-limit-store.health';

/** Postgres must answer within this many ms */
const DB_PING_TIMEOUT_MS = 3000;

/**
 * GET /api/health (public, not rate limited)
 *
 * 503 when Postgres is unreachable. The rate-limit store is reported
 * for information only.
 */
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly postgres: TypeOrmHealthIndicator,
    private readonly rateLimitStore: RateLimitStoreHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    return this.health.check([
      () => this.postgres.pingCheck('postgres', { timeout: DB_PING_TIMEOUT_MS }),
      () => this.rateLimitStore.check('rate_limit_store'),
    ]);
  }
}
