import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import { UsersModule } from '../users/users.module';
import { MailModule } from '../mail/mail.module';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { TokenService } from './token.service';
import { JwtStrategy } from './strategies/jwt.strategy';

/**
 * AuthModule — account lifecycle and the Passport JWT strategy.
 *
 * The strategy is registered with Passport globally, so any module can use
 * @UseGuards(JwtAuthGuard) without importing AuthModule.
 */
@Module({
  imports: [
    UsersModule,
    MailModule,

    PassportModule.register({ defaultStrategy: 'jwt' }),

    // Signing secret; lifetimes are set per token kind by TokenService
    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const secret = configService.get<string>('JWT_SECRET');

        if (!secret) {
          throw new Error('JWT_SECRET is not defined. Check your .env file.');
        }

        return {
          secret,
          signOptions: { algorithm: 'HS256' as const },
        };
      },
    }),
  ],
  controllers: [AuthController],
  providers: [AuthService, TokenService, JwtStrategy],
  exports: [AuthService, PassportModule],
})
export class AuthModule {}
