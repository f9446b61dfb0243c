import { Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { parseNumber } from '../common/parse-number';
import type { JwtPayload, TokenScope } from './interfaces';

/** Lifetimes in seconds, overridable through JWT_*_EXPIRATION */
const DEFAULT_EXPIRATION: Record<TokenScope, number> = {
  access_token: 15 * 60,
  refresh_token: 7 * 24 * 60 * 60,
  email_token: 7 * 24 * 60 * 60,
};

const EXPIRATION_KEYS: Record<TokenScope, string> = {
  access_token: 'JWT_ACCESS_EXPIRATION',
  refresh_token: 'JWT_REFRESH_EXPIRATION',
  email_token: 'JWT_EMAIL_EXPIRATION',
};

/**
 * TokenService — issues and verifies the three token kinds.
 *
 * All tokens are HS256 JWTs signed with JWT_SECRET, carrying the user's
 * email as `sub` and the token kind as `scope`. A token is only accepted
 * for the scope it was issued with.
 */
@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
  ) {}

  createAccessToken(email: string): Promise<string> {
    return this.sign(email, 'access_token');
  }

  createRefreshToken(email: string): Promise<string> {
    return this.sign(email, 'refresh_token');
  }

  createEmailToken(email: string): Promise<string> {
    return this.sign(email, 'email_token');
  }

  /**
   * Returns the email the token was issued to, or null when the token is
   * malformed, expired, badly signed, or of another scope.
   */
  async verify(token: string, scope: TokenScope): Promise<string | null> {
    let payload: Partial<JwtPayload>;
    try {
      payload = await this.jwtService.verifyAsync<JwtPayload>(token);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Rejected ${scope}: ${message}`);
      return null;
    }

    if (payload.scope !== scope || typeof payload.sub !== 'string') {
      this.logger.debug(`Rejected ${scope}: token scope is ${String(payload.scope)}`);
      return null;
    }

    return payload.sub;
  }

  // ── Private Helpers ───────────────────────────────────────

  private sign(email: string, scope: TokenScope): Promise<string> {
    const payload: JwtPayload = { sub: email, scope };
    const expiresIn = parseNumber(
      this.configService.get<string>(EXPIRATION_KEYS[scope]),
      DEFAULT_EXPIRATION[scope],
    );
    return this.jwtService.signAsync(payload, { expiresIn });
  }
}
