import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import * as Minio from 'minio';
import { parseNumber } from '../common/parse-number';
import { MINIO_CLIENT } from './storage.constants';
import { StorageService } from './storage.service';

/**
 * StorageModule — object storage for user avatars, backed by MinIO
 * (S3-compatible).
 */
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: MINIO_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Minio.Client =>
        new Minio.Client({
          endPoint: configService.get<string>('MINIO_ENDPOINT', 'localhost'),
          port: parseNumber(configService.get<string>('MINIO_PORT'), 9000),
          useSSL: configService.get<string>('MINIO_USE_SSL', 'false') === 'true',
          accessKey: configService.get<string>('MINIO_ACCESS_KEY', 'minioadmin'),
          secretKey: configService.get<string>(
            'MINIO_SECRET_KEY',
            'minioadmin_secret',
          ),
        }),
    },
    StorageService,
  ],
  exports: [StorageService],
})
export class StorageModule {}
