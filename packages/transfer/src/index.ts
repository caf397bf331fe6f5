/**
 * @bucketferry/transfer - Storage provider contract and resumable transfer engine
 */

export {
  TRANSFER_STATUSES,
  TRANSFER_FAILURE_REASONS,
  type RemoteObject,
  type TransferState,
  type TransferStatus,
  type TransferFailureReason,
  type TransferOutcome,
  type FailedTransferOutcome,
  type TransferProgress,
  type TransferOptions,
  type RangeResponse,
  type StorageProvider,
} from './types.js';

export {
  ResumableTransferEngine,
  DEFAULT_SEGMENT_SIZE,
  type TransferEngineConfig,
} from './engine.js';

export {
  S3StorageProvider,
  createS3Client,
  mapS3Error,
  parseContentRangeTotal,
  type S3ConnectionOptions,
} from './s3-provider.js';
