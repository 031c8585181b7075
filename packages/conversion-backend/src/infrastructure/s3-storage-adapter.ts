// packages/conversion-backend/src/infrastructure/s3-storage-adapter.ts
// S3-compatible remote store for published conversion results.

import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { Readable } from 'node:stream';

import { PublishError } from '@docuqueue/contracts';

import type { ConversionBackendConfig } from '../config/env.js';
import { errorMessage, logger } from './logger.js';

export interface S3StorageConfig {
  endpoint?: string; // MinIO and other S3-compatible stores
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
  pathPrefix?: string;
  forcePathStyle?: boolean;
}

export interface FileUploadResult {
  key: string;
  etag?: string;
}

/**
 * Object store surface the publisher and token store depend on.
 */
export interface RemoteObjectStore {
  uploadFile(key: string, content: Readable | Buffer, mimeType: string): Promise<FileUploadResult>;
  generatePresignedUrl(key: string, expiresIn?: number): Promise<string>;
}

export class S3StorageAdapter implements RemoteObjectStore {
  private readonly s3Client: S3Client;

  constructor(private readonly config: S3StorageConfig) {
    this.s3Client = new S3Client({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle ?? Boolean(config.endpoint),
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    });
  }

  /**
   * Multipart-capable upload. `key` is relative to the configured prefix.
   */
  async uploadFile(
    key: string,
    content: Readable | Buffer,
    mimeType: string,
  ): Promise<FileUploadResult> {
    const fullKey = this.getFullKey(key);
    try {
      const upload = new Upload({
        client: this.s3Client,
        params: {
          Bucket: this.config.bucket,
          Key: fullKey,
          Body: content,
          ContentType: mimeType,
        },
      });
      const result = await upload.done();

      logger.debug('File uploaded to S3', {
        bucket: this.config.bucket,
        key: fullKey,
        etag: result.ETag,
      });
      return { key: fullKey, etag: result.ETag };
    } catch (error) {
      logger.error('Failed to upload file to S3', {
        bucket: this.config.bucket,
        key: fullKey,
        error: errorMessage(error),
      });
      throw new PublishError(`S3 upload failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Time-limited GET link. `key` is the full object key as returned by `uploadFile`.
   */
  async generatePresignedUrl(key: string, expiresIn = 3600): Promise<string> {
    try {
      const command = new GetObjectCommand({ Bucket: this.config.bucket, Key: key });
      return await getSignedUrl(this.s3Client, command, { expiresIn });
    } catch (error) {
      throw new PublishError(`Presigned URL generation failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  getFullKey(key: string): string {
    if (this.config.pathPrefix) {
      return `${this.config.pathPrefix}/${key}`.replace(/^\/+/, '');
    }
    return key;
  }
}

/**
 * Build the adapter from loaded config; null when remote publishing is not configured.
 */
export function createS3StorageAdapter(
  publish: ConversionBackendConfig['publish'],
): S3StorageAdapter | null {
  const { s3 } = publish;
  if (!s3.bucket || !s3.accessKeyId || !s3.secretAccessKey) {
    return null;
  }
  return new S3StorageAdapter({
    endpoint: s3.endpoint,
    region: s3.region,
    accessKeyId: s3.accessKeyId,
    secretAccessKey: s3.secretAccessKey,
    bucket: s3.bucket,
    pathPrefix: s3.prefix,
  });
}
