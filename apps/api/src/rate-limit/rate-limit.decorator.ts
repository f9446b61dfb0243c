import { SetMetadata } from '@nestjs/common';
import { RATE_LIMIT_METADATA, RateLimitPolicy } from './rate-limit.constants';

/**
 * Declares the rate-limit class of a handler (or of every handler in a
 * controller). Enforced by RateLimitGuard.
 *
 * ```ts
 * @Get()
 * @UseGuards(RateLimitGuard, JwtAuthGuard)
 * @RateLimit(RateLimitPolicies.READ)
 * list(): Promise<ContactResponseDto[]> { ... }
 * ```
 */
export const RateLimit = (policy: RateLimitPolicy) =>
  SetMetadata(RATE_LIMIT_METADATA, policy);
