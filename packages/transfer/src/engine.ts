import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';

import { percentOf } from '@bucketferry/common';
import {
  AuthenticationError,
  ErrorFactory,
  ExternalServiceError,
  FileSystemError,
  TransferIntegrityError,
  isRetryableError,
  toError,
} from '@bucketferry/errors';
import { getFileSize } from '@bucketferry/files';
import { Logger, LoggerFactory } from '@bucketferry/logging';

import type {
  RemoteObject,
  StorageProvider,
  TransferFailureReason,
  TransferOptions,
  TransferOutcome,
  TransferState,
} from './types.js';

export const DEFAULT_SEGMENT_SIZE = 8 * 1024 * 1024;

export interface TransferEngineConfig {
  /** Bytes requested per ranged read */
  segmentSize?: number;
  logger?: Logger;
}

/** Bytes on disk for the transfer in progress; only advanced after a synced append */
interface Cursor {
  readonly startedAt: number;
  written: number;
}

/**
 * Resumable transfer engine.
 *
 * The length of the destination file is the only resume marker: every attempt
 * starts from it, requests the rest of the object in ranged segments, and
 * appends each chunk with a sync before counting it. The engine makes a single
 * attempt per call; retrying a `partial_will_retry` outcome is left to the caller.
 */
export class ResumableTransferEngine {
  private readonly segmentSize: number;
  private readonly logger: Logger;

  constructor(
    private readonly provider: StorageProvider,
    config: TransferEngineConfig = {}
  ) {
    this.segmentSize = config.segmentSize ?? DEFAULT_SEGMENT_SIZE;
    this.logger = config.logger ?? LoggerFactory.createSilentLogger('transfer-engine');

    if (!Number.isInteger(this.segmentSize) || this.segmentSize <= 0) {
      throw ErrorFactory.validation(`Segment size must be a positive integer, got ${this.segmentSize}`);
    }
  }

  async readTransferState(destinationPath: string): Promise<TransferState> {
    try {
      return { destinationPath, bytesWritten: await getFileSize(destinationPath) };
    } catch (error) {
      if (error instanceof FileSystemError) {
        throw error;
      }
      throw ErrorFactory.filesystem(`Cannot read ${destinationPath}`, {
        cause: toError(error),
        data: { path: destinationPath },
      });
    }
  }

  async transfer(
    object: RemoteObject,
    destinationPath: string,
    options: TransferOptions = {}
  ): Promise<TransferOutcome> {
    let state: TransferState;
    try {
      state = await this.readTransferState(destinationPath);
    } catch (error) {
      return failed('filesystem', toError(error), { startedAt: 0, written: 0 });
    }

    const cursor: Cursor = { startedAt: state.bytesWritten, written: state.bytesWritten };

    if (state.bytesWritten > object.size) {
      const error = ErrorFactory.integrity(
        `Local file is ${state.bytesWritten} bytes but ${object.bucket}/${object.key} is ${object.size} bytes`,
        { code: 'SIZE_EXCEEDS_EXPECTED', data: { path: destinationPath } }
      );
      return failed('size_exceeds_expected', error, cursor);
    }

    if (state.bytesWritten === object.size) {
      if (object.size === 0) {
        try {
          await fs.appendFile(destinationPath, new Uint8Array(0));
        } catch (error) {
          return failed('filesystem', wrapFileSystemError(error, destinationPath), cursor);
        }
      }
      this.logger.debug(`Already complete: ${object.bucket}/${object.key}`, {
        path: destinationPath,
        size: object.size,
      });
      return { status: 'completed', bytesWritten: cursor.written, bytesTransferred: 0 };
    }

    if (options.signal?.aborted) {
      return partial(abortReason(options.signal), cursor);
    }

    const target = new AppendTarget(destinationPath);

    try {
      if (cursor.written > 0) {
        this.logger.debug(`Resuming ${object.bucket}/${object.key} at byte ${cursor.written}`);
      }

      while (cursor.written < object.size) {
        const start = cursor.written;
        const endInclusive = Math.min(start + this.segmentSize, object.size) - 1;
        await this.transferSegment(target, object, start, endInclusive, cursor, options);
      }

      return {
        status: 'completed',
        bytesWritten: cursor.written,
        bytesTransferred: cursor.written - cursor.startedAt,
      };
    } catch (error) {
      return this.classify(error, cursor, options.signal);
    } finally {
      await target.close().catch((error: unknown) => {
        this.logger.warn(`Failed to close ${destinationPath}`, { error: toError(error).message });
      });
    }
  }

  private async transferSegment(
    target: AppendTarget,
    object: RemoteObject,
    start: number,
    endInclusive: number,
    cursor: Cursor,
    options: TransferOptions
  ): Promise<void> {
    this.logger.debug(`Requesting bytes ${start}-${endInclusive} of ${object.bucket}/${object.key}`);
    const response = await this.provider.getObjectRange(
      object.bucket,
      object.key,
      start,
      endInclusive,
      options.signal
    );

    if (response.totalSize !== undefined && response.totalSize !== object.size) {
      throw ErrorFactory.integrity(
        `${object.bucket}/${object.key} is now ${response.totalSize} bytes, listed as ${object.size}`,
        { code: 'SIZE_MISMATCH', data: { advertised: response.totalSize, listed: object.size } }
      );
    }

    for await (const chunk of response.body) {
      if (options.signal?.aborted) {
        throw abortReason(options.signal);
      }

      const remaining = endInclusive + 1 - cursor.written;
      if (chunk.byteLength > remaining) {
        throw ErrorFactory.integrity(
          `${object.bucket}/${object.key} returned more bytes than requested for ${start}-${endInclusive}`,
          { code: 'SIZE_MISMATCH', data: { received: chunk.byteLength, remaining } }
        );
      }

      await target.append(chunk);
      cursor.written += chunk.byteLength;

      options.onProgress?.({
        object,
        bytesWritten: cursor.written,
        totalBytes: object.size,
        percentage: percentOf(cursor.written, object.size),
      });
    }

    if (cursor.written <= endInclusive) {
      throw ErrorFactory.network(
        `Response for ${object.bucket}/${object.key} ended at byte ${cursor.written}, expected ${endInclusive + 1}`,
        { code: 'INCOMPLETE_BODY' }
      );
    }
  }

  private classify(error: unknown, cursor: Cursor, signal?: AbortSignal): TransferOutcome {
    if (signal?.aborted) {
      return partial(abortReason(signal), cursor);
    }

    const err = toError(error);

    if (err instanceof TransferIntegrityError) {
      return failed('size_mismatch', err, cursor);
    }
    if (err instanceof ExternalServiceError) {
      if (err.statusCode === 404) return failed('not_found', err, cursor);
      if (err.statusCode === 416) return failed('size_mismatch', err, cursor);
    }
    if (err instanceof AuthenticationError) {
      return failed('access_denied', err, cursor);
    }
    if (err instanceof FileSystemError) {
      return failed('filesystem', err, cursor);
    }
    if (isRetryableError(err)) {
      this.logger.debug(`Transient failure after ${cursor.written} bytes: ${err.message}`);
      return partial(err, cursor);
    }

    return failed('unknown', err, cursor);
  }
}

/**
 * Destination file, opened in append mode on the first chunk
 */
class AppendTarget {
  private handle: FileHandle | undefined;

  constructor(private readonly destinationPath: string) {}

  /** Write the whole chunk and sync it to disk */
  async append(chunk: Uint8Array): Promise<void> {
    try {
      this.handle ??= await fs.open(this.destinationPath, 'a');

      let offset = 0;
      while (offset < chunk.byteLength) {
        const { bytesWritten } = await this.handle.write(chunk, offset, chunk.byteLength - offset);
        offset += bytesWritten;
      }
      await this.handle.sync();
    } catch (error) {
      throw wrapFileSystemError(error, this.destinationPath);
    }
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;
    await handle?.close();
  }
}

function wrapFileSystemError(error: unknown, destinationPath: string): FileSystemError {
  if (error instanceof FileSystemError) {
    return error;
  }
  const cause = toError(error);
  return ErrorFactory.filesystem(`Cannot write ${destinationPath}: ${cause.message}`, {
    cause,
    data: { path: destinationPath },
  });
}

function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) {
    return signal.reason;
  }
  const error = new Error('Transfer aborted');
  error.name = 'AbortError';
  return error;
}

function partial(error: Error, cursor: Cursor): TransferOutcome {
  return {
    status: 'partial_will_retry',
    error,
    bytesWritten: cursor.written,
    bytesTransferred: cursor.written - cursor.startedAt,
  };
}

function failed(reason: TransferFailureReason, error: Error, cursor: Cursor): TransferOutcome {
  return {
    status: 'failed',
    reason,
    message: error.message,
    error,
    bytesWritten: cursor.written,
    bytesTransferred: cursor.written - cursor.startedAt,
  };
}
