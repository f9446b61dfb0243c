import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DatabaseModule } from '@contacts/database';
import { parseNumber } from './common/parse-number';
import { HealthModule } from './health/health.module';
import { RateLimitModule } from './rate-limit/rate-limit.module';
import { AuthModule } from './auth';
import { UsersModule } from './users/users.module';
import { ContactsModule } from './contacts/contacts.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
    }),

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres' as const,
        host: configService.get<string>('POSTGRES_HOST', 'localhost'),
        port: parseNumber(configService.get<string>('POSTGRES_PORT'), 5432),
        username: configService.get<string>('POSTGRES_USER', 'contacts'),
        password: configService.get<string>(
          'POSTGRES_PASSWORD',
          'contacts_secret',
        ),
        database: configService.get<string>('POSTGRES_DB', 'contacts'),
        entities: [...DatabaseModule.entities],
        synchronize: false,
        logging: configService.get<string>('NODE_ENV') !== 'production',
      }),
    }),

    // ── Cross-cutting ─────────────────────────────────────
    RateLimitModule,
    HealthModule,

    // ── Feature Modules ───────────────────────────────────
    AuthModule,
    UsersModule,
    ContactsModule,
  ],
})
export class AppModule {}
