import { Injectable, UnauthorizedException, Logger } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { Strategy, ExtractJwt } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { UsersService } from '../../users/users.service';
import type { JwtPayload, RequestUser } from '../interfaces';

/**
 * JWT Strategy — resolves the caller of protected routes.
 *
 * Accepts only access tokens, then re-loads the user by email so that a
 * deleted or unconfirmed account is rejected even with a valid signature.
 * The resulting RequestUser is the owner identity for contact operations.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(
    configService: ConfigService,
    private readonly usersService: UsersService,
  ) {
    const secret = configService.get<string>('JWT_SECRET');

    if (!secret) {
      throw new Error('JWT_SECRET is not defined in environment variables.');
    }

    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: secret,
    });
  }

  async validate(payload: JwtPayload): Promise<RequestUser> {
    if (payload.scope !== 'access_token') {
      this.logger.warn(`JWT validation failed: scope ${payload.scope} used as access token`);
      throw new UnauthorizedException('Invalid scope for token');
    }

    const user = await this.usersService.getUserByEmail(payload.sub);

    if (!user) {
      this.logger.warn(`JWT validation failed: user ${payload.sub} not found`);
      throw new UnauthorizedException('Could not validate credentials');
    }

    if (!user.confirmed) {
      this.logger.warn(`JWT validation failed: user ${user.id} is not confirmed`);
      throw new UnauthorizedException('Email not confirmed');
    }

    return {
      userId: user.id,
      email: user.email,
    };
  }
}
