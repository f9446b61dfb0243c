import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as Minio from 'minio';
import { parseNumber } from '../common/parse-number';
import { MINIO_CLIENT } from './storage.constants';
import { StorageUploadException } from './storage.exceptions';

/**
 * StorageService — avatar storage in a MinIO bucket.
 *
 * Object key pattern:  avatars/{userId}
 * Each user has exactly one avatar object; a new upload overwrites it and
 * the returned URL carries a `v` query so clients do not keep a stale copy.
 *
 * The bucket is made anonymously readable so avatar URLs can be used
 * directly in <img> tags.
 */
@Injectable()
export class StorageService implements OnModuleInit {
  private readonly logger = new Logger(StorageService.name);
  private readonly bucket: string;
  private readonly publicUrl: string;

  constructor(
    @Inject(MINIO_CLIENT)
    private readonly client: Minio.Client,
    private readonly configService: ConfigService,
  ) {
    this.bucket = this.configService.get<string>(
      'MINIO_BUCKET',
      'contacts-avatars',
    );
    this.publicUrl = this.resolvePublicUrl();
  }

  async onModuleInit(): Promise<void> {
    await this.ensureBucketExists();
    this.logger.log(`StorageService ready — bucket: "${this.bucket}"`);
  }

  /**
   * Stores the avatar image for a user and returns its public URL.
   *
   * @throws StorageUploadException on any MinIO error
   */
  async uploadAvatar(
    userId: number,
    buffer: Buffer,
    mimeType: string,
  ): Promise<string> {
    const objectKey = `avatars/${userId}`;

    this.logger.debug(`Uploading ${objectKey} (${buffer.length} bytes)`);

    try {
      await this.client.putObject(this.bucket, objectKey, buffer, buffer.length, {
        'Content-Type': mimeType,
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Failed to upload "${objectKey}" to MinIO: ${cause.message}`,
      );
      throw new StorageUploadException(objectKey, cause);
    }

    this.logger.log(`Uploaded "${objectKey}" (${buffer.length} bytes)`);
    return `${this.publicUrl}/${this.bucket}/${objectKey}?v=${Date.now()}`;
  }

  // ── Helpers ────────────────────────────────────────────────

  private resolvePublicUrl(): string {
    const configured = this.configService.get<string>('MINIO_PUBLIC_URL');
    if (configured) return configured.replace(/\/+$/, '');

    const endpoint = this.configService.get<string>('MINIO_ENDPOINT', 'localhost');
    const port = parseNumber(this.configService.get<string>('MINIO_PORT'), 9000);
    const useSSL =
      this.configService.get<string>('MINIO_USE_SSL', 'false') === 'true';
    return `${useSSL ? 'https' : 'http'}://${endpoint}:${port}`;
  }

  /**
   * Creates the bucket with a public-read policy if it does not exist yet.
   */
  private async ensureBucketExists(): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (exists) return;

      await this.client.makeBucket(this.bucket, 'us-east-1');
      await this.client.setBucketPolicy(
        this.bucket,
        JSON.stringify({
          Version: '2012-10-17',
          Statement: [
            {
              Effect: 'Allow',
              Principal: { AWS: ['*'] },
              Action: ['s3:GetObject'],
              Resource: [`arn:aws:s3:::${this.bucket}/avatars/*`],
            },
          ],
        }),
      );
      this.logger.log(`Created bucket "${this.bucket}"`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      // Non-fatal during init; uploads then fail with StorageUploadException
      this.logger.error(
        `Failed to ensure bucket "${this.bucket}" exists: ${message}`,
      );
    }
  }
}
