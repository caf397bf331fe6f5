import { extractErrorInfo, toError } from '@bucketferry/errors';
import type { Logger } from '@bucketferry/logging';
import type { RemoteObject, StorageProvider, TransferOutcome } from '@bucketferry/transfer';

export type DeletionResult =
  | { readonly status: 'skipped'; readonly reason: 'deletion_disabled' | 'transfer_incomplete' }
  | { readonly status: 'deleted' }
  | { readonly status: 'failed'; readonly error: Error };

/**
 * Removes remote objects once their local copy is complete
 */
export class PostTransferDeleter {
  constructor(
    private readonly provider: StorageProvider,
    private readonly logger: Logger
  ) {}

  /**
   * Delete the object only for a completed transfer with deletion enabled.
   * A failed delete is reported, never turned into a transfer failure.
   */
  async deleteIfConfigured(
    object: RemoteObject,
    outcome: TransferOutcome,
    deleteEnabled: boolean
  ): Promise<DeletionResult> {
    if (outcome.status !== 'completed') {
      return { status: 'skipped', reason: 'transfer_incomplete' };
    }
    if (!deleteEnabled) {
      return { status: 'skipped', reason: 'deletion_disabled' };
    }

    try {
      await this.provider.deleteObject(object.bucket, object.key);
      this.logger.info(`Deleted s3://${object.bucket}/${object.key}`);
      return { status: 'deleted' };
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Failed to delete s3://${object.bucket}/${object.key}`, err, {
        ...extractErrorInfo(err),
      });
      return { status: 'failed', error: err };
    }
  }
}
