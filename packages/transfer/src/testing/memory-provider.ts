import { ErrorFactory } from '@bucketferry/errors';

import type { RangeResponse, RemoteObject, StorageProvider } from '../types.js';

export type ProviderCall =
  | { method: 'listBuckets' }
  | { method: 'listObjects'; bucket: string }
  | { method: 'getObjectRange'; bucket: string; key: string; start: number; endInclusive: number }
  | { method: 'deleteObject'; bucket: string; key: string };

/**
 * Misbehaviour applied to the next ranged read
 */
export type RangeFault =
  /** The request itself fails */
  | { type: 'reject'; error: Error }
  /** The body stops after `afterBytes`, either cleanly or by throwing `error` */
  | { type: 'truncate'; afterBytes: number; error?: Error }
  /** The body carries `extraBytes` beyond the requested range */
  | { type: 'overflow'; extraBytes: number }
  /** The response advertises a different total object size */
  | { type: 'advertise'; totalSize: number };

export interface InMemoryStorageProviderOptions {
  /** Size of the chunks a range body is split into */
  chunkSize?: number;
}

/**
 * In-memory storage provider for tests. Records every call and can inject
 * faults into ranged reads, listings and deletions.
 */
export class InMemoryStorageProvider implements StorageProvider {
  readonly calls: ProviderCall[] = [];

  private buckets = new Map<string, Map<string, Uint8Array>>();
  private rangeFaults: RangeFault[] = [];
  private listingFailures = new Map<string, Error>();
  private deletionFailures = new Map<string, Error>();
  private bucketListingFailure: Error | undefined;
  private readonly chunkSize: number;

  constructor(options: InMemoryStorageProviderOptions = {}) {
    this.chunkSize = options.chunkSize ?? 4;
  }

  addBucket(bucket: string): this {
    if (!this.buckets.has(bucket)) {
      this.buckets.set(bucket, new Map());
    }
    return this;
  }

  putObject(bucket: string, key: string, data: Uint8Array | string): this {
    this.addBucket(bucket);
    const bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data;
    this.buckets.get(bucket)?.set(key, bytes);
    return this;
  }

  hasObject(bucket: string, key: string): boolean {
    return this.buckets.get(bucket)?.has(key) ?? false;
  }

  /** Queue a fault for the next ranged read; faults are consumed in order */
  injectRangeFault(fault: RangeFault): this {
    this.rangeFaults.push(fault);
    return this;
  }

  failBucketListing(error: Error): this {
    this.bucketListingFailure = error;
    return this;
  }

  failListing(bucket: string, error: Error): this {
    this.listingFailures.set(bucket, error);
    return this;
  }

  failDeletion(bucket: string, key: string, error: Error): this {
    this.deletionFailures.set(`${bucket}/${key}`, error);
    return this;
  }

  callsTo<M extends ProviderCall['method']>(method: M): Extract<ProviderCall, { method: M }>[] {
    return this.calls.filter((call): call is Extract<ProviderCall, { method: M }> => call.method === method);
  }

  async listBuckets(): Promise<string[]> {
    this.calls.push({ method: 'listBuckets' });
    if (this.bucketListingFailure) {
      throw this.bucketListingFailure;
    }
    return Array.from(this.buckets.keys());
  }

  async listObjects(bucket: string): Promise<RemoteObject[]> {
    this.calls.push({ method: 'listObjects', bucket });

    const failure = this.listingFailures.get(bucket);
    if (failure) {
      throw failure;
    }

    const objects = this.requireBucket(bucket);
    return Array.from(objects.entries()).map(([key, data]) => ({
      bucket,
      key,
      size: data.byteLength,
    }));
  }

  async getObjectRange(
    bucket: string,
    key: string,
    start: number,
    endInclusive: number,
    signal?: AbortSignal
  ): Promise<RangeResponse> {
    this.calls.push({ method: 'getObjectRange', bucket, key, start, endInclusive });
    signal?.throwIfAborted();

    const data = this.requireBucket(bucket).get(key);
    if (!data) {
      throw ErrorFactory.externalService(`NoSuchKey: ${bucket}/${key}`, {
        code: 'NOT_FOUND',
        statusCode: 404,
      });
    }

    const fault = this.rangeFaults.shift();
    if (fault?.type === 'reject') {
      throw fault.error;
    }

    let slice = data.slice(start, endInclusive + 1);
    if (fault?.type === 'overflow') {
      const padded = new Uint8Array(slice.byteLength + fault.extraBytes);
      padded.set(slice);
      slice = padded;
    }

    let failAfterBody: Error | undefined;
    if (fault?.type === 'truncate') {
      slice = slice.slice(0, fault.afterBytes);
      failAfterBody = fault.error;
    }

    return {
      body: this.chunks(slice, failAfterBody),
      totalSize: fault?.type === 'advertise' ? fault.totalSize : data.byteLength,
    };
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    this.calls.push({ method: 'deleteObject', bucket, key });

    const failure = this.deletionFailures.get(`${bucket}/${key}`);
    if (failure) {
      throw failure;
    }

    this.buckets.get(bucket)?.delete(key);
  }

  /** Forget recorded calls */
  clearCalls(): void {
    this.calls.length = 0;
  }

  private requireBucket(bucket: string): Map<string, Uint8Array> {
    const objects = this.buckets.get(bucket);
    if (!objects) {
      throw ErrorFactory.externalService(`NoSuchBucket: ${bucket}`, {
        code: 'NOT_FOUND',
        statusCode: 404,
      });
    }
    return objects;
  }

  private async *chunks(data: Uint8Array, failWith?: Error): AsyncGenerator<Uint8Array> {
    for (let offset = 0; offset < data.byteLength; offset += this.chunkSize) {
      yield data.slice(offset, offset + this.chunkSize);
    }
    if (failWith) {
      throw failWith;
    }
  }
}
