import { Injectable, UnauthorizedException, Logger } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

/** passport-jwt / jsonwebtoken error names mapped to client-facing messages */
const FAILURE_MESSAGES: Record<string, string> = {
  TokenExpiredError: 'Authentication token has expired',
  JsonWebTokenError: 'Invalid authentication token',
  NotBeforeError: 'Authentication token is not active yet',
};

/**
 * Guards routes that need an access token (Authorization: Bearer <token>).
 *
 * Contact routes combine it with RateLimitGuard:
 * ```ts
 * @UseGuards(RateLimitGuard, JwtAuthGuard)
 * ```
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(JwtAuthGuard.name);

  handleRequest<TUser>(
    err: Error | null,
    user: TUser | false,
    info: Error | undefined,
  ): TUser {
    if (err) {
      this.logger.warn(`JWT auth error: ${err.message}`);
      throw err instanceof UnauthorizedException
        ? err
        : new UnauthorizedException(err.message);
    }

    if (!user) {
      const message = this.getFailureMessage(info);
      this.logger.debug(`JWT auth rejected: ${message}`);
      throw new UnauthorizedException(message);
    }

    return user;
  }

  private getFailureMessage(info: Error | undefined): string {
    // passport-jwt reports a missing header as a plain Error
    if (!info || info.message === 'No auth token') {
      return 'Authentication token is missing';
    }
    return FAILURE_MESSAGES[info.name] ?? (info.message || 'Authentication failed');
  }
}
