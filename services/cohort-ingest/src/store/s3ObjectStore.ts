import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client
} from '@aws-sdk/client-s3';
import type { ObjectHead, ObjectStore, PutObjectOptions } from './types';
import { ObjectNotFoundError } from './types';

export type S3ObjectStoreConfig = {
  bucket: string;
  region?: string;
  endpoint?: string | null;
  forcePathStyle?: boolean;
};

export type S3CommandSender = Pick<S3Client, 'send'>;

type AsyncByteStream = AsyncIterable<Uint8Array | string>;

function isAsyncByteStream(value: unknown): value is AsyncByteStream {
  return typeof value === 'object' && value !== null && Symbol.asyncIterator in value;
}

function hasTransformToByteArray(value: unknown): value is { transformToByteArray(): Promise<Uint8Array> } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'transformToByteArray' in value &&
    typeof value.transformToByteArray === 'function'
  );
}

async function bodyToBuffer(body: unknown, key: string): Promise<Buffer> {
  if (body === undefined || body === null) {
    throw new ObjectNotFoundError(key);
  }
  if (Buffer.isBuffer(body)) {
    return body;
  }
  if (typeof body === 'string' || body instanceof Uint8Array) {
    return Buffer.from(body);
  }
  if (hasTransformToByteArray(body)) {
    return Buffer.from(await body.transformToByteArray());
  }
  if (isAsyncByteStream(body)) {
    const chunks: Buffer[] = [];
    for await (const chunk of body) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }
  throw new Error(`S3 response body for ${key} is not readable`);
}

function isNotFound(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  const name = 'name' in error ? error.name : undefined;
  if (name === 'NoSuchKey' || name === 'NotFound') {
    return true;
  }
  const metadata = '$metadata' in error ? error.$metadata : undefined;
  return (
    typeof metadata === 'object' &&
    metadata !== null &&
    'httpStatusCode' in metadata &&
    metadata.httpStatusCode === 404
  );
}

export function createS3Client(config: S3ObjectStoreConfig): S3Client {
  return new S3Client({
    region: config.region ?? 'eu-north-1',
    endpoint: config.endpoint ?? undefined,
    forcePathStyle: config.forcePathStyle ?? false
  });
}

export class S3ObjectStore implements ObjectStore {
  private readonly bucket: string;
  private readonly client: S3CommandSender;

  constructor(config: S3ObjectStoreConfig, client?: S3CommandSender) {
    this.bucket = config.bucket;
    this.client = client ?? createS3Client(config);
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;
    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken
        })
      );
      for (const entry of response.Contents ?? []) {
        if (entry.Key) {
          keys.push(entry.Key);
        }
      }
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);
    return keys;
  }

  async head(key: string): Promise<ObjectHead> {
    try {
      const response = await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return {
        key,
        sizeBytes: response.ContentLength ?? null,
        contentType: response.ContentType ?? null,
        metadata: { ...(response.Metadata ?? {}) }
      };
    } catch (error) {
      if (isNotFound(error)) {
        throw new ObjectNotFoundError(key);
      }
      throw error;
    }
  }

  async get(key: string): Promise<Buffer> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      return await bodyToBuffer(response.Body, key);
    } catch (error) {
      if (isNotFound(error)) {
        throw new ObjectNotFoundError(key);
      }
      throw error;
    }
  }

  async put(key: string, body: Buffer, options: PutObjectOptions = {}): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: options.contentType,
        Metadata: options.metadata
      })
    );
  }
}
