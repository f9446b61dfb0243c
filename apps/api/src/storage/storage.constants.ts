/** Injection token for the MinIO client used by StorageService */
export const MINIO_CLIENT = 'MINIO_CLIENT';
