/**
 * Shared Redis infrastructure.
 *
 * Exports:
 *   - RedisModule.forRoot()  — import into any NestJS module
 *   - REDIS_CLIENT           — ioredis injection token
 */
export { RedisModule } from './redis.module';
export { REDIS_CLIENT } from './redis.constants';
