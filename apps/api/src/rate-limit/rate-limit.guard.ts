import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { IncomingHttpHeaders } from 'http';
import type { Request, Response } from 'express';
import {
  RATE_LIMIT_METADATA,
  RATE_LIMIT_STORAGE,
  RateLimitPolicy,
} from './rate-limit.constants';
import {
  InMemoryRateLimitStorage,
  RateLimitHit,
  RateLimitStorage,
} from './rate-limit-storage';
import { RateLimitExceededException } from './rate-limit.exceptions';

/**
 * Admission control for routes tagged with @RateLimit().
 *
 * Counters are keyed per client IP and route, so each route class has its
 * own budget. Apply it before JwtAuthGuard so over-limit clients are
 * rejected before any token or database work.
 *
 * If the primary store throws, the hit is counted in the process-local
 * store instead of failing the request.
 */
@Injectable()
export class RateLimitGuard implements CanActivate {
  private readonly logger = new Logger(RateLimitGuard.name);

  constructor(
    private readonly reflector: Reflector,
    @Inject(RATE_LIMIT_STORAGE)
    private readonly storage: RateLimitStorage,
    private readonly fallback: InMemoryRateLimitStorage,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const policy = this.reflector.getAllAndOverride<RateLimitPolicy | undefined>(
      RATE_LIMIT_METADATA,
      [context.getHandler(), context.getClass()],
    );
    if (!policy) return true;

    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const key = buildRateLimitKey(request);

    const hit = await this.count(key, policy.windowMs);
    if (hit.count <= policy.limit) return true;

    const retryAfterSeconds = Math.max(1, Math.ceil(hit.resetInMs / 1000));
    http.getResponse<Response>().setHeader('Retry-After', String(retryAfterSeconds));

    this.logger.warn(`Rate limit exceeded for ${key} (${hit.count}/${policy.limit})`);
    throw new RateLimitExceededException(retryAfterSeconds);
  }

  private async count(key: string, windowMs: number): Promise<RateLimitHit> {
    if (this.storage === this.fallback) {
      return this.fallback.increment(key, windowMs);
    }

    try {
      return await this.storage.increment(key, windowMs);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Rate limit store failed, counting in memory instead: ${message}`,
      );
      return this.fallback.increment(key, windowMs);
    }
  }
}

/** The request fields a rate-limit key is built from. */
export interface RateLimitKeySource {
  headers: IncomingHttpHeaders;
  method: string;
  path: string;
  ip?: string;
  route?: { path?: unknown };
  socket?: { remoteAddress?: string };
}

/** `ratelimit:<ip>:<METHOD>:<route path>` */
export function buildRateLimitKey(request: RateLimitKeySource): string {
  const routePath: unknown = request.route?.path;
  const path = typeof routePath === 'string' ? routePath : request.path;
  return `ratelimit:${getClientIp(request)}:${request.method}:${path}`;
}

function getClientIp(request: RateLimitKeySource): string {
  const forwarded = request.headers['x-forwarded-for'];
  const header = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  if (header) {
    const first = header.split(',')[0]?.trim();
    if (first) return first;
  }
  return request.ip ?? request.socket?.remoteAddress ?? 'unknown';
}
