import { randomUUID } from 'crypto';
import { GetObjectCommand, PutObjectCommand } from '@aws-sdk/client-s3';
import type { S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { StorageError, errorMessage, logger } from '@keepsake/shared';

export interface BlobStore {
  /** Stores the bytes under a fresh key and returns a time-limited read URL. */
  upload(bytes: Uint8Array, fileName: string, contentType: string): Promise<string>;
}

export interface S3BlobStoreOptions {
  prefix?: string;
  urlTtlSeconds?: number;
}

const EXTENSION_BY_CONTENT_TYPE: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'image/webp': 'webp',
  'image/gif': 'gif',
  'image/heic': 'heic',
  'application/pdf': 'pdf',
  'text/plain': 'txt',
};

/**
 * Pick a file extension from the original name, then from the content type,
 * defaulting to jpg.
 */
export function fileExtension(fileName: string, contentType?: string): string {
  const base = fileName.split(/[?#]/)[0] ?? '';
  const dot = base.lastIndexOf('.');
  if (dot > 0 && dot < base.length - 1) {
    return base.slice(dot + 1).toLowerCase();
  }
  const mime = contentType?.split(';')[0]?.trim().toLowerCase();
  return (mime && EXTENSION_BY_CONTENT_TYPE[mime]) || 'jpg';
}

export class S3BlobStore implements BlobStore {
  private readonly prefix: string;
  private readonly urlTtlSeconds: number;

  constructor(
    private readonly s3: S3Client,
    private readonly bucket: string,
    options: S3BlobStoreOptions = {}
  ) {
    this.prefix = options.prefix ?? 'uploads/';
    this.urlTtlSeconds = options.urlTtlSeconds ?? 60 * 60;
  }

  async upload(bytes: Uint8Array, fileName: string, contentType: string): Promise<string> {
    const key = `${this.prefix}${randomUUID()}.${fileExtension(fileName, contentType)}`;

    logger.debug('Uploading blob', { bucket: this.bucket, key, contentType, size: bytes.byteLength });
    try {
      await this.s3.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: bytes,
          ContentType: contentType,
        })
      );
    } catch (err) {
      throw new StorageError(`Failed to upload file to storage: ${errorMessage(err)}`, { cause: err });
    }

    try {
      return await getSignedUrl(this.s3, new GetObjectCommand({ Bucket: this.bucket, Key: key }), {
        expiresIn: this.urlTtlSeconds,
      });
    } catch (err) {
      throw new StorageError(`Failed to create signed URL: ${errorMessage(err)}`, { cause: err });
    }
  }
}
