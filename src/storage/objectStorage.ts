import {
  CreateBucketCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { AppConfig } from '../config';
import { StorageError, errorMessage, type StorageErrorKind } from '../lib/errors';
import { logger as defaultLogger, type Logger } from '../lib/logger';
import type { Clock } from '../types';
import { MAX_SIGNED_URL_SECONDS } from './signedUrl';

export type SignedUrlMode = 'read' | 'write';

export type StoredObject = {
  bucket: string;
  key: string;
  size: number;
  etag?: string;
};

export type ObjectInfo = {
  key: string;
  size: number;
  lastModified?: Date;
  etag?: string;
};

export type FetchedObject = {
  body: Buffer;
  contentType?: string;
  metadata: Record<string, string>;
};

export type SignedUrl = {
  url: string;
  bucket: string;
  key: string;
  mode: SignedUrlMode;
  expiresAt: Date;
};

export type ObjectStorageOptions = {
  client: S3Client;
  now?: Clock;
  logger?: Logger;
};

const NOT_FOUND = new Set(['NoSuchKey', 'NoSuchBucket', 'NotFound']);
const DENIED = new Set(['AccessDenied', 'Forbidden', 'InvalidAccessKeyId', 'SignatureDoesNotMatch', 'AllAccessDisabled']);

export function toStorageError(error: unknown, context: string): StorageError {
  if (error instanceof StorageError) return error;
  let kind: StorageErrorKind = 'Unreachable';
  if (error instanceof S3ServiceException) {
    const status = error.$metadata.httpStatusCode;
    if (NOT_FOUND.has(error.name) || status === 404) kind = 'NotFound';
    else if (DENIED.has(error.name) || status === 401 || status === 403) kind = 'PermissionDenied';
  }
  return new StorageError(kind, `${context}: ${errorMessage(error)}`, { cause: error });
}

/**
 * Object storage over the S3 API, for MinIO or any S3-compatible service.
 * Keys are overwritten in place; there is no versioning.
 */
export class ObjectStorage {
  private readonly client: S3Client;
  private readonly now: Clock;
  private readonly logger: Logger;

  constructor(options: ObjectStorageOptions) {
    this.client = options.client;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;
  }

  async put(
    bucket: string,
    key: string,
    bytes: Uint8Array | string,
    options: { contentType?: string; metadata?: Record<string, string> } = {},
  ): Promise<StoredObject> {
    const body = typeof bytes === 'string' ? Buffer.from(bytes) : bytes;
    const output = await this.call(`put ${bucket}/${key}`, () =>
      this.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentLength: body.byteLength,
          ContentType: options.contentType,
          Metadata: options.metadata,
        }),
      ),
    );
    return { bucket, key, size: body.byteLength, etag: output.ETag };
  }

  async get(bucket: string, key: string): Promise<FetchedObject> {
    return this.call(`get ${bucket}/${key}`, async () => {
      const output = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!output.Body) throw new StorageError('NotFound', `get ${bucket}/${key}: empty response body`);
      const bytes = await output.Body.transformToByteArray();
      return { body: Buffer.from(bytes), contentType: output.ContentType, metadata: output.Metadata ?? {} };
    });
  }

  /** Deleting a missing key succeeds. */
  async delete(bucket: string, key: string): Promise<void> {
    await this.call(`delete ${bucket}/${key}`, () => this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key })));
  }

  async exists(bucket: string, key: string): Promise<boolean> {
    try {
      await this.call(`head ${bucket}/${key}`, () => this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key })));
      return true;
    } catch (error) {
      if (error instanceof StorageError && error.kind === 'NotFound') return false;
      throw error;
    }
  }

  async list(bucket: string, prefix?: string): Promise<ObjectInfo[]> {
    const objects: ObjectInfo[] = [];
    let token: string | undefined;
    do {
      const page = await this.call(`list ${bucket}/${prefix ?? ''}`, () =>
        this.client.send(new ListObjectsV2Command({ Bucket: bucket, Prefix: prefix, ContinuationToken: token })),
      );
      for (const item of page.Contents ?? []) {
        if (item.Key === undefined) continue;
        objects.push({ key: item.Key, size: item.Size ?? 0, lastModified: item.LastModified, etag: item.ETag });
      }
      token = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (token);
    return objects;
  }

  /** Creates the bucket unless it already exists. */
  async ensureBucket(bucket: string): Promise<void> {
    try {
      await this.call(`head bucket ${bucket}`, () => this.client.send(new HeadBucketCommand({ Bucket: bucket })));
    } catch (error) {
      if (!(error instanceof StorageError) || error.kind !== 'NotFound') throw error;
      this.logger.info({ bucket }, 'creating bucket');
      await this.call(`create bucket ${bucket}`, () => this.client.send(new CreateBucketCommand({ Bucket: bucket })));
    }
  }

  /**
   * Presigned URL valid until `now + expirySeconds`, computed locally from the
   * credentials. Only `verifyExists` makes a network call.
   */
  async signedUrl(
    bucket: string,
    key: string,
    expirySeconds: number,
    mode: SignedUrlMode = 'read',
    options: { verifyExists?: boolean } = {},
  ): Promise<SignedUrl> {
    if (!Number.isInteger(expirySeconds) || expirySeconds < 0 || expirySeconds > MAX_SIGNED_URL_SECONDS) {
      throw new RangeError(`expirySeconds must be an integer between 0 and ${MAX_SIGNED_URL_SECONDS}, got ${expirySeconds}`);
    }
    if (options.verifyExists && mode === 'read' && !(await this.exists(bucket, key))) {
      throw new StorageError('NotFound', `${bucket}/${key} does not exist`);
    }

    const signingDate = new Date(Math.floor(this.now() / 1000) * 1000);
    const url = await this.call(`sign ${bucket}/${key}`, () =>
      mode === 'read'
        ? getSignedUrl(this.client, new GetObjectCommand({ Bucket: bucket, Key: key }), { expiresIn: expirySeconds, signingDate })
        : getSignedUrl(this.client, new PutObjectCommand({ Bucket: bucket, Key: key }), { expiresIn: expirySeconds, signingDate }),
    );
    return { url, bucket, key, mode, expiresAt: new Date(signingDate.getTime() + expirySeconds * 1000) };
  }

  private async call<T>(context: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      const mapped = toStorageError(error, context);
      if (mapped.kind === 'NotFound') this.logger.debug({ err: mapped.message }, 'object not found');
      else this.logger.warn({ kind: mapped.kind, err: mapped.message }, 'object storage call failed');
      throw mapped;
    }
  }
}

export function createS3Client(config: AppConfig['storage']): S3Client {
  return new S3Client({
    endpoint: config.endpoint,
    region: config.region,
    forcePathStyle: true,
    credentials: { accessKeyId: config.accessKey, secretAccessKey: config.secretKey },
    // MinIO does not accept the SDK's default CRC32 trailers on every request.
    requestChecksumCalculation: 'WHEN_REQUIRED',
    responseChecksumValidation: 'WHEN_REQUIRED',
  });
}
