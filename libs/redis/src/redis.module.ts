import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';

/**
 * RedisModule — provides a single ioredis connection.
 *
 * Usage:
 *   RedisModule.forRoot()  — in any feature module that needs Redis
 *
 * The connection is lazy: no socket is opened until the first command, so
 * importing the module costs nothing when the consumer ends up not using
 * Redis (e.g. RATE_LIMIT_STORE=memory). The consumer that issues commands
 * is responsible for closing the connection on shutdown.
 */
@Module({})
export class RedisModule {
  static forRoot(): DynamicModule {
    const clientProvider = {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Redis => {
        return new Redis({
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: Number(configService.get<string>('REDIS_PORT', '6379')),
          // Retry strategy: exponential back-off capped at 10 s
          retryStrategy: (times: number) => Math.min(times * 100, 10_000),
          enableReadyCheck: true,
          maxRetriesPerRequest: 3,
          lazyConnect: true,
        });
      },
    };

    return {
      module: RedisModule,
      imports: [ConfigModule],
      providers: [clientProvider],
      exports: [clientProvider],
      global: false,
    };
  }
}
