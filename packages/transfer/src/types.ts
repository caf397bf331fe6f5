/**
 * Transfer data model and storage provider contract
 */

/**
 * An object as returned by a listing. `size` is the authoritative total length.
 */
export interface RemoteObject {
  readonly bucket: string;
  readonly key: string;
  readonly size: number;
}

/**
 * Resume state of a destination, derived from the filesystem alone
 */
export interface TransferState {
  readonly destinationPath: string;
  /** Current length of the destination file, 0 when absent */
  readonly bytesWritten: number;
}

export const TRANSFER_STATUSES = ['completed', 'partial_will_retry', 'failed'] as const;
export type TransferStatus = (typeof TRANSFER_STATUSES)[number];

export const TRANSFER_FAILURE_REASONS = [
  'size_exceeds_expected',
  'size_mismatch',
  'not_found',
  'access_denied',
  'filesystem',
  'invalid_key',
  'destination_conflict',
  'retries_exhausted',
  'cancelled',
  'unknown',
] as const;
export type TransferFailureReason = (typeof TRANSFER_FAILURE_REASONS)[number];

interface OutcomeCounters {
  /** Length of the destination file when the attempt ended */
  readonly bytesWritten: number;
  /** Bytes appended during this attempt */
  readonly bytesTransferred: number;
}

export type TransferOutcome =
  | (OutcomeCounters & { readonly status: 'completed' })
  | (OutcomeCounters & { readonly status: 'partial_will_retry'; readonly error: Error })
  | (OutcomeCounters & {
      readonly status: 'failed';
      readonly reason: TransferFailureReason;
      readonly message: string;
      readonly error?: Error;
    });

export type FailedTransferOutcome = Extract<TransferOutcome, { status: 'failed' }>;

export interface TransferProgress {
  readonly object: RemoteObject;
  readonly bytesWritten: number;
  readonly totalBytes: number;
  /** Whole percent of the object on disk */
  readonly percentage: number;
}

export interface TransferOptions {
  signal?: AbortSignal;
  onProgress?: (progress: TransferProgress) => void;
}

/**
 * Response to a ranged read
 */
export interface RangeResponse {
  /** Chunks of the requested range, in order */
  readonly body: AsyncIterable<Uint8Array>;
  /** Total object size advertised by the provider (Content-Range), when known */
  readonly totalSize?: number;
}

/**
 * What the transfer engine, orchestrator and deleter need from a storage backend.
 *
 * Implementations report failures with the `@bucketferry/errors` taxonomy:
 * `NetworkError` for transient faults, `ExternalServiceError` (statusCode 404)
 * for missing buckets and objects, `AuthenticationError` for denied access.
 */
export interface StorageProvider {
  listBuckets(): Promise<string[]>;
  listObjects(bucket: string): Promise<RemoteObject[]>;
  getObjectRange(
    bucket: string,
    key: string,
    start: number,
    endInclusive: number,
    signal?: AbortSignal
  ): Promise<RangeResponse>;
  deleteObject(bucket: string, key: string): Promise<void>;
}
