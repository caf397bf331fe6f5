import path from 'path';

import pMap from 'p-map';

import { formatSize, percentOf } from '@bucketferry/common';
import { ValidationError, extractErrorInfo, toError } from '@bucketferry/errors';
import { ensureDirectoryResolvingConflicts } from '@bucketferry/files';
import type { Logger } from '@bucketferry/logging';
import { DEFAULT_RETRY_CONFIGS, RetryExecutor, type RetryConfig } from '@bucketferry/retry';
import type {
  FailedTransferOutcome,
  RemoteObject,
  ResumableTransferEngine,
  StorageProvider,
  TransferFailureReason,
  TransferOutcome,
} from '@bucketferry/transfer';

import { evaluateBucket, type IgnoreRuleSet } from './bucket-filter.js';
import type { DeletionResult, PostTransferDeleter } from './deleter.js';
import { destinationFor, isDirectoryMarker } from './destination.js';

export interface RetrySettings {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface OrchestratorConfig {
  targetPath: string;
  ignoreRules: IgnoreRuleSet;
  deleteAfterDownload: boolean;
  /** Objects transferred at once within a bucket */
  concurrency: number;
  retry: RetrySettings;
  /** List and filter only; nothing is downloaded, created or deleted */
  dryRun?: boolean;
}

export interface RunFailure {
  /** Absent when the bucket list itself could not be read */
  bucket?: string;
  key?: string;
  reason: TransferFailureReason | 'listing_failed';
  message: string;
}

export interface RunSummary {
  bucketsProcessed: number;
  bucketsSkipped: number;
  bucketsFailed: number;
  objectsCompleted: number;
  objectsFailed: number;
  /** Objects a dry run would have downloaded */
  objectsPlanned: number;
  /** Objects left untouched because the run was cancelled */
  objectsNotStarted: number;
  directoriesCreated: number;
  bytesTransferred: number;
  deletions: number;
  deletionFailures: number;
  failures: RunFailure[];
  cancelled: boolean;
}

/** Outcome after retries: partial transfers have been resumed or given up on */
export type FinalOutcome = Exclude<TransferOutcome, { status: 'partial_will_retry' }>;

export type ObjectResult =
  | { kind: 'planned'; object: RemoteObject; destinationPath: string }
  | {
      kind: 'transferred';
      object: RemoteObject;
      destinationPath?: string;
      outcome: FinalOutcome;
      attempts: number;
      /** Bytes appended across all attempts */
      bytesTransferred: number;
      deletion?: DeletionResult;
    };

/**
 * Raised inside the retry loop so that only partial transfers are retried
 */
class IncompleteTransferError extends Error {
  constructor(readonly outcome: TransferOutcome & { status: 'partial_will_retry' }) {
    super(outcome.error.message);
    this.name = 'IncompleteTransferError';
  }
}

export function createRunSummary(): RunSummary {
  return {
    bucketsProcessed: 0,
    bucketsSkipped: 0,
    bucketsFailed: 0,
    objectsCompleted: 0,
    objectsFailed: 0,
    objectsPlanned: 0,
    objectsNotStarted: 0,
    directoriesCreated: 0,
    bytesTransferred: 0,
    deletions: 0,
    deletionFailures: 0,
    failures: [],
    cancelled: false,
  };
}

function failedOutcome(
  reason: TransferFailureReason,
  message: string,
  counters: { bytesWritten: number; bytesTransferred: number } = { bytesWritten: 0, bytesTransferred: 0 }
): FailedTransferOutcome {
  return { status: 'failed', reason, message, ...counters };
}

/**
 * Drives buckets through filter, listing, transfer and deletion.
 *
 * Every bucket and object is attempted: a listing failure skips its bucket, a
 * failed object is recorded and the batch moves on.
 */
export class DownloadOrchestrator {
  private readonly targetRoot: string;

  constructor(
    private readonly provider: StorageProvider,
    private readonly engine: ResumableTransferEngine,
    private readonly deleter: PostTransferDeleter,
    private readonly config: OrchestratorConfig,
    private readonly logger: Logger
  ) {
    this.targetRoot = path.resolve(config.targetPath);
  }

  async run(signal?: AbortSignal): Promise<RunSummary> {
    const summary = createRunSummary();

    let buckets: string[];
    try {
      buckets = await this.provider.listBuckets();
    } catch (error) {
      const err = toError(error);
      this.logger.error('Failed to list buckets', err, { ...extractErrorInfo(err) });
      summary.failures.push({ reason: 'listing_failed', message: err.message });
      return summary;
    }

    this.logger.info(`Found ${buckets.length} buckets`);

    for (const bucket of buckets) {
      if (signal?.aborted) {
        summary.cancelled = true;
        break;
      }

      const decision = evaluateBucket(bucket, this.config.ignoreRules);
      if (!decision.included) {
        this.logger.info(`Skipping bucket ${bucket}: ${decision.rule} "${decision.pattern}"`);
        summary.bucketsSkipped++;
        continue;
      }

      this.logger.info(`Processing bucket ${bucket}`);
      await this.processBucket(bucket, summary, signal);
    }

    summary.cancelled ||= signal?.aborted ?? false;
    return summary;
  }

  async processBucket(bucket: string, summary: RunSummary, signal?: AbortSignal): Promise<void> {
    let listed: RemoteObject[];
    try {
      listed = await this.provider.listObjects(bucket);
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Failed to list bucket ${bucket}`, err, { ...extractErrorInfo(err) });
      summary.bucketsFailed++;
      summary.failures.push({ bucket, reason: 'listing_failed', message: err.message });
      return;
    }

    summary.bucketsProcessed++;

    const files = listed.filter(object => !isDirectoryMarker(object.key));
    const markers = listed.filter(object => isDirectoryMarker(object.key));
    const totalBytes = files.reduce((sum, object) => sum + object.size, 0);

    this.logger.info(
      `Bucket ${bucket}: ${files.length} objects, ${formatSize(totalBytes)} total` +
        (markers.length > 0 ? `, ${markers.length} directory markers` : '')
    );

    const { transferable, conflicts } = this.claimDestinations(files);
    for (const { object, destinationPath, owner } of conflicts) {
      const message = `${destinationPath} is already the destination of ${owner.bucket}/${owner.key}`;
      this.logger.error(`Not downloading ${object.bucket}/${object.key}: ${message}`);
      this.recordFailure(summary, object, 'destination_conflict', message);
    }

    let started = 0;
    let handledBytes = 0;
    const transferBytes = transferable.reduce((sum, object) => sum + object.size, 0);

    await pMap(
      transferable,
      async object => {
        if (signal?.aborted) {
          summary.objectsNotStarted++;
          return;
        }

        // Runs before the first await, so positions follow listing order
        started++;
        const position = `${started}/${transferable.length}, ${percentOf(handledBytes, transferBytes)}%`;
        handledBytes += object.size;

        const result = await this.processObject(object, position, signal);
        this.record(result, summary);
      },
      { concurrency: this.config.concurrency }
    );

    for (const marker of markers) {
      if (signal?.aborted) {
        summary.objectsNotStarted++;
        continue;
      }
      await this.processDirectoryMarker(marker, summary);
    }
  }

  /**
   * Keys that normalise to the same local path (`a//b`, `a/./b`, `a/b`) would
   * share one file. The first listed key keeps the path; the others are never
   * transferred or deleted. Keys that cannot be mapped at all are passed on so
   * processObject reports them.
   */
  private claimDestinations(files: RemoteObject[]): {
    transferable: RemoteObject[];
    conflicts: { object: RemoteObject; destinationPath: string; owner: RemoteObject }[];
  } {
    const owners = new Map<string, RemoteObject>();
    const transferable: RemoteObject[] = [];
    const conflicts: { object: RemoteObject; destinationPath: string; owner: RemoteObject }[] = [];

    for (const object of files) {
      let destinationPath: string;
      try {
        destinationPath = destinationFor(this.targetRoot, object.bucket, object.key);
      } catch {
        transferable.push(object);
        continue;
      }

      const owner = owners.get(destinationPath);
      if (owner) {
        conflicts.push({ object, destinationPath, owner });
      } else {
        owners.set(destinationPath, object);
        transferable.push(object);
      }
    }

    return { transferable, conflicts };
  }

  /**
   * Transfer one object with retries, then delete it remotely if configured
   */
  async processObject(
    object: RemoteObject,
    position: string,
    signal?: AbortSignal
  ): Promise<ObjectResult> {
    let destinationPath: string;
    try {
      destinationPath = destinationFor(this.targetRoot, object.bucket, object.key);
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Rejected object key ${object.bucket}/${object.key}: ${err.message}`);
      return {
        kind: 'transferred',
        object,
        outcome: failedOutcome(err instanceof ValidationError ? 'invalid_key' : 'unknown', err.message),
        attempts: 0,
        bytesTransferred: 0,
      };
    }

    if (this.config.dryRun) {
      this.logger.info(
        `Would download ${formatSize(object.size)} (${position}) ${object.key} ---> ${destinationPath}`
      );
      return { kind: 'planned', object, destinationPath };
    }

    try {
      const conflicts = await ensureDirectoryResolvingConflicts(
        path.dirname(destinationPath),
        this.targetRoot
      );
      for (const conflict of conflicts) {
        this.logger.warn(`Renamed conflicting file ${conflict.path} to ${conflict.renamedTo}`);
      }
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Cannot create directory for ${destinationPath}`, err);
      return {
        kind: 'transferred',
        object,
        destinationPath,
        outcome: failedOutcome('filesystem', err.message),
        attempts: 0,
        bytesTransferred: 0,
      };
    }

    this.logger.info(
      `Downloading ${formatSize(object.size)} (${position}) ${object.key} ---> ${destinationPath}`
    );

    const { outcome, attempts, bytesTransferred } = await this.transferWithRetry(
      object,
      destinationPath,
      signal
    );

    if (outcome.status === 'completed') {
      this.logger.info(`Completed ${object.bucket}/${object.key} (${formatSize(object.size)})`);
    } else {
      this.logger.error(
        `Failed ${object.bucket}/${object.key}: ${outcome.reason}: ${outcome.message}`,
        outcome.error,
        { bytesWritten: outcome.bytesWritten, size: object.size, attempts }
      );
    }

    const deletion = await this.deleter.deleteIfConfigured(
      object,
      outcome,
      this.config.deleteAfterDownload
    );

    return { kind: 'transferred', object, destinationPath, outcome, attempts, bytesTransferred, deletion };
  }

  private async transferWithRetry(
    object: RemoteObject,
    destinationPath: string,
    signal?: AbortSignal
  ): Promise<{ outcome: FinalOutcome; attempts: number; bytesTransferred: number }> {
    let bytesTransferred = 0;

    const retryConfig: RetryConfig = {
      ...DEFAULT_RETRY_CONFIGS.TRANSFER,
      ...this.config.retry,
      ...(signal && { signal }),
      shouldRetry: error => error instanceof IncompleteTransferError,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(
          `Transfer of ${object.bucket}/${object.key} interrupted on attempt ${attempt}, resuming in ${delayMs}ms`,
          { error: toError(error).message }
        );
      },
    };

    const result = await new RetryExecutor<FinalOutcome>(retryConfig).execute(async () => {
      const outcome = await this.engine.transfer(object, destinationPath, {
        ...(signal && { signal }),
        onProgress: progress => {
          this.logger.debug(
            `${object.key}: ${formatSize(progress.bytesWritten, 1)}/${formatSize(progress.totalBytes, 1)} (${progress.percentage}%)`
          );
        },
      });

      bytesTransferred += outcome.bytesTransferred;

      if (outcome.status === 'partial_will_retry') {
        throw new IncompleteTransferError(outcome);
      }
      return outcome;
    });

    if (result.success) {
      return { outcome: result.data, attempts: result.totalAttempts, bytesTransferred };
    }

    const { error, totalAttempts } = result;
    if (error instanceof IncompleteTransferError) {
      const counters = { bytesWritten: error.outcome.bytesWritten, bytesTransferred };
      const outcome = result.exhausted
        ? failedOutcome(
            'retries_exhausted',
            `Gave up after ${totalAttempts} attempts: ${error.message}`,
            counters
          )
        : failedOutcome('cancelled', `Cancelled: ${error.message}`, counters);
      return { outcome, attempts: totalAttempts, bytesTransferred };
    }

    return {
      outcome: failedOutcome('unknown', toError(error).message),
      attempts: totalAttempts,
      bytesTransferred,
    };
  }

  private async processDirectoryMarker(marker: RemoteObject, summary: RunSummary): Promise<void> {
    let directory: string;
    try {
      directory = destinationFor(this.targetRoot, marker.bucket, marker.key);
    } catch (error) {
      this.recordFailure(summary, marker, 'invalid_key', toError(error).message);
      return;
    }

    if (this.config.dryRun) {
      this.logger.info(`Would create directory ${directory}`);
      return;
    }

    try {
      await ensureDirectoryResolvingConflicts(directory, this.targetRoot);
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Cannot create directory ${directory}`, err);
      this.recordFailure(summary, marker, 'filesystem', err.message);
      return;
    }

    summary.directoriesCreated++;
    this.logger.debug(`Created directory ${directory}`);

    const deletion = await this.deleter.deleteIfConfigured(
      marker,
      { status: 'completed', bytesWritten: 0, bytesTransferred: 0 },
      this.config.deleteAfterDownload
    );
    this.recordDeletion(deletion, summary);
  }

  private record(result: ObjectResult, summary: RunSummary): void {
    if (result.kind === 'planned') {
      summary.objectsPlanned++;
      return;
    }

    summary.bytesTransferred += result.bytesTransferred;

    if (result.outcome.status === 'completed') {
      summary.objectsCompleted++;
    } else {
      this.recordFailure(summary, result.object, result.outcome.reason, result.outcome.message);
    }

    if (result.deletion) {
      this.recordDeletion(result.deletion, summary);
    }
  }

  private recordFailure(
    summary: RunSummary,
    object: RemoteObject,
    reason: TransferFailureReason,
    message: string
  ): void {
    summary.objectsFailed++;
    summary.failures.push({ bucket: object.bucket, key: object.key, reason, message });
  }

  private recordDeletion(deletion: DeletionResult, summary: RunSummary): void {
    if (deletion.status === 'deleted') {
      summary.deletions++;
    } else if (deletion.status === 'failed') {
      summary.deletionFailures++;
    }
  }
}
