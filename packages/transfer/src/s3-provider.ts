import { Readable } from 'stream';

import {
  DeleteObjectCommand,
  GetObjectCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  S3Client,
  S3ServiceException,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { BucketFerryError, ErrorFactory, isRetryableError, toError } from '@bucketferry/errors';
import { Logger, LoggerFactory } from '@bucketferry/logging';

import type { RangeResponse, RemoteObject, StorageProvider } from './types.js';

export interface S3ConnectionOptions {
  region?: string;
  /** Custom endpoint for S3-compatible stores */
  endpoint?: string;
  forcePathStyle?: boolean;
}

/**
 * Create an S3 client. Credentials come from the SDK's default provider chain.
 */
export function createS3Client(options: S3ConnectionOptions = {}): S3Client {
  const config: S3ClientConfig = {
    followRegionRedirects: true,
    ...(options.region && { region: options.region }),
    ...(options.endpoint && { endpoint: options.endpoint }),
    ...(options.forcePathStyle !== undefined && { forcePathStyle: options.forcePathStyle }),
  };

  return new S3Client(config);
}

const NOT_FOUND_ERRORS = new Set(['NoSuchKey', 'NoSuchBucket', 'NotFound']);
const ACCESS_DENIED_ERRORS = new Set([
  'AccessDenied',
  'Forbidden',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'ExpiredToken',
  'AllAccessDisabled',
]);
const TRANSIENT_ERRORS = new Set([
  'SlowDown',
  'Throttling',
  'ThrottlingException',
  'RequestTimeout',
  'RequestTimeTooSkewed',
  'InternalError',
  'ServiceUnavailable',
  'TimeoutError',
]);

/**
 * Map an SDK failure onto the error taxonomy the transfer engine classifies
 */
export function mapS3Error(error: unknown, operation: string, target: string): Error {
  const err = toError(error);
  if (err instanceof BucketFerryError || err.name === 'AbortError') {
    return err;
  }

  const context = { component: 's3-provider', operation, metadata: { target } };
  const message = `${operation} ${target} failed: ${err.message}`;

  if (err instanceof S3ServiceException) {
    const status = err.$metadata.httpStatusCode;

    if (NOT_FOUND_ERRORS.has(err.name) || status === 404) {
      return ErrorFactory.externalService(message, {
        code: 'NOT_FOUND',
        statusCode: 404,
        cause: err,
        context,
      });
    }
    if (ACCESS_DENIED_ERRORS.has(err.name) || status === 401 || status === 403) {
      return ErrorFactory.authentication(message, { code: 'ACCESS_DENIED', cause: err, context });
    }
    if (err.name === 'InvalidRange' || status === 416) {
      return ErrorFactory.externalService(message, {
        code: 'INVALID_RANGE',
        statusCode: 416,
        cause: err,
        context,
      });
    }
    if (TRANSIENT_ERRORS.has(err.name) || status === 429 || (status !== undefined && status >= 500)) {
      return ErrorFactory.network(message, { code: 'S3_TRANSIENT', cause: err, context });
    }

    return ErrorFactory.externalService(message, {
      ...(status !== undefined && { statusCode: status }),
      cause: err,
      context,
    });
  }

  if (TRANSIENT_ERRORS.has(err.name) || isRetryableError(err)) {
    return ErrorFactory.network(message, { cause: err, context });
  }

  return err;
}

/**
 * Parse the total length out of a `Content-Range: bytes 0-99/1234` header
 */
export function parseContentRangeTotal(contentRange: string | undefined): number | undefined {
  const match = contentRange?.match(/^bytes \d+-\d+\/(\d+)$/);
  return match?.[1] !== undefined ? parseInt(match[1], 10) : undefined;
}

async function* readableChunks(stream: Readable): AsyncGenerator<Uint8Array> {
  for await (const chunk of stream) {
    if (chunk instanceof Uint8Array) {
      yield chunk;
    } else if (typeof chunk === 'string') {
      yield Buffer.from(chunk);
    } else {
      throw ErrorFactory.validation(`Unexpected chunk type in object body: ${typeof chunk}`);
    }
  }
}

/**
 * StorageProvider over the AWS SDK v3 S3 client
 */
export class S3StorageProvider implements StorageProvider {
  private readonly logger: Logger;

  constructor(
    private readonly client: S3Client,
    logger?: Logger
  ) {
    this.logger = logger ?? LoggerFactory.createSilentLogger('s3-provider');
  }

  async listBuckets(): Promise<string[]> {
    const buckets: string[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const response = await this.client.send(
          new ListBucketsCommand({ ContinuationToken: continuationToken })
        );
        for (const bucket of response.Buckets ?? []) {
          if (bucket.Name) {
            buckets.push(bucket.Name);
          }
        }
        continuationToken = response.ContinuationToken;
      } while (continuationToken);
    } catch (error) {
      throw mapS3Error(error, 'ListBuckets', '*');
    }

    this.logger.debug(`Listed ${buckets.length} buckets`);
    return buckets;
  }

  async listObjects(bucket: string): Promise<RemoteObject[]> {
    const objects: RemoteObject[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const response = await this.client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            ContinuationToken: continuationToken,
            MaxKeys: 1000,
          })
        );

        for (const item of response.Contents ?? []) {
          if (item.Key !== undefined) {
            objects.push({ bucket, key: item.Key, size: item.Size ?? 0 });
          }
        }

        continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      throw mapS3Error(error, 'ListObjectsV2', bucket);
    }

    this.logger.debug(`Listed ${objects.length} objects in ${bucket}`);
    return objects;
  }

  async getObjectRange(
    bucket: string,
    key: string,
    start: number,
    endInclusive: number,
    signal?: AbortSignal
  ): Promise<RangeResponse> {
    const target = `${bucket}/${key}`;

    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: bucket, Key: key, Range: `bytes=${start}-${endInclusive}` }),
        signal ? { abortSignal: signal } : {}
      );

      const body = response.Body;
      if (!body) {
        throw ErrorFactory.network(`GetObject ${target} returned no body`, { code: 'EMPTY_BODY' });
      }

      const totalSize = parseContentRangeTotal(response.ContentRange);
      const chunks =
        body instanceof Readable
          ? readableChunks(body)
          : (async function* () {
              yield await body.transformToByteArray();
            })();

      return {
        body: mapStreamErrors(chunks, target),
        ...(totalSize !== undefined && { totalSize }),
      };
    } catch (error) {
      throw mapS3Error(error, 'GetObject', target);
    }
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
    } catch (error) {
      throw mapS3Error(error, 'DeleteObject', `${bucket}/${key}`);
    }
  }
}

async function* mapStreamErrors(
  chunks: AsyncIterable<Uint8Array>,
  target: string
): AsyncGenerator<Uint8Array> {
  try {
    yield* chunks;
  } catch (error) {
    throw mapS3Error(error, 'GetObject', target);
  }
}
