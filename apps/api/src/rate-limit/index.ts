export { RateLimitModule } from './rate-limit.module';
export { RateLimitGuard } from './rate-limit.guard';
export { RateLimit } from './rate-limit.decorator';
export { RateLimitPolicies } from './rate-limit.constants';
export type { RateLimitPolicy } from './rate-limit.constants';
