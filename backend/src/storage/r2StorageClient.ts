import { randomUUID } from 'node:crypto';
import { DeleteObjectCommand, PutObjectCommand, S3Client, type PutObjectCommandInput } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { StorageConfig } from '../config.js';
import { createLogger } from '../logger.js';
import type { StorageClient, UploadUrlResponse } from '../types/storage.js';
import { retry, type RetryOptions } from '../utils/retry.js';

const logger = createLogger('R2StorageClient');

const UPLOAD_PREFIX = 'uploads/';

// 3 attempts, 2s then 4s apart, never more than 10s.
const DEFAULT_RETRY: RetryOptions = { retries: 2, baseDelayMs: 2_000, maxDelayMs: 10_000 };

export interface R2StorageClientOptions {
  client?: S3Client;
  retry?: RetryOptions;
}

export function createS3Client(settings: StorageConfig): S3Client {
  return new S3Client({
    region: settings.region,
    endpoint: settings.endpointUrl,
    forcePathStyle: true,
    credentials: {
      accessKeyId: settings.accessKeyId,
      secretAccessKey: settings.secretAccessKey,
    },
  });
}

export function normaliseUploadKey(key: string | null | undefined): string {
  if (!key) {
    return `${UPLOAD_PREFIX}${randomUUID()}`;
  }
  return key.startsWith(UPLOAD_PREFIX) ? key : `${UPLOAD_PREFIX}${key}`;
}

export function createR2StorageClient(settings: StorageConfig, options: R2StorageClientOptions = {}): StorageClient {
  const s3 = options.client ?? createS3Client(settings);
  const retryOptions = options.retry ?? DEFAULT_RETRY;

  function withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return retry(fn, {
      ...retryOptions,
      onRetry: (err, attempt) => {
        logger.warn({ err, attempt }, `Retrying ${operation} (attempt ${attempt})`);
      },
    });
  }

  return {
    getUploadUrl(rawKey, metadata) {
      return withRetry('get_upload_url', async (): Promise<UploadUrlResponse> => {
        const key = normaliseUploadKey(rawKey);
        const params: PutObjectCommandInput = {
          Bucket: settings.bucketName,
          Key: key,
        };

        const contentType = metadata?.['content-type'];
        if (contentType) {
          params.ContentType = contentType;
        }
        if (metadata && Object.keys(metadata).length > 0) {
          params.Metadata = { ...metadata };
        }

        const url = await getSignedUrl(s3, new PutObjectCommand(params), {
          expiresIn: settings.presignedUrlExpiration,
        });

        return {
          url,
          method: 'PUT',
          key,
          metadata: metadata ?? null,
          expires_in: settings.presignedUrlExpiration,
          public_url: `${settings.publicUrl}/${key}`,
        };
      });
    },

    deleteFile(key: string) {
      return withRetry('delete_file', async () => {
        await s3.send(new DeleteObjectCommand({ Bucket: settings.bucketName, Key: key }));
        return true;
      });
    },
  };
}
