import { mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ErrorFactory, ValidationError } from '@bucketferry/errors';

import { ResumableTransferEngine, type RemoteObject, type TransferProgress } from '../index.js';
import { InMemoryStorageProvider } from '../testing/index.js';

const CONTENT = 'abcdefghij';

describe('ResumableTransferEngine', () => {
  let root: string;
  let destination: string;
  let provider: InMemoryStorageProvider;
  let engine: ResumableTransferEngine;
  const object: RemoteObject = { bucket: 'photos', key: '2026/a.jpg', size: CONTENT.length };

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'bucketferry-engine-'));
    destination = path.join(root, 'a.jpg');
    provider = new InMemoryStorageProvider().putObject('photos', '2026/a.jpg', CONTENT);
    engine = new ResumableTransferEngine(provider, { segmentSize: 4 });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should download a new object in ranged segments', async () => {
    const outcome = await engine.transfer(object, destination);

    expect(outcome).toEqual({ status: 'completed', bytesWritten: 10, bytesTransferred: 10 });
    expect(await readFile(destination, 'utf8')).toBe(CONTENT);
    expect(provider.callsTo('getObjectRange').map(call => [call.start, call.endInclusive])).toEqual([
      [0, 3],
      [4, 7],
      [8, 9],
    ]);
  });

  it('should resume from any interruption point', async () => {
    for (let k = 0; k <= CONTENT.length; k++) {
      const file = path.join(root, `resume-${k}.bin`);
      await writeFile(file, CONTENT.slice(0, k));
      provider.clearCalls();

      const outcome = await engine.transfer(object, file);

      expect(outcome).toEqual({
        status: 'completed',
        bytesWritten: CONTENT.length,
        bytesTransferred: CONTENT.length - k,
      });
      expect(await readFile(file, 'utf8')).toBe(CONTENT);

      const ranges = provider.callsTo('getObjectRange');
      expect(ranges).toHaveLength(Math.ceil((CONTENT.length - k) / 4));
      if (k < CONTENT.length) {
        expect(ranges[0]?.start).toBe(k);
      }
    }
  });

  it('should make no provider calls when the file is already complete', async () => {
    await engine.transfer(object, destination);
    provider.clearCalls();

    const outcome = await engine.transfer(object, destination);

    expect(outcome).toEqual({ status: 'completed', bytesWritten: 10, bytesTransferred: 0 });
    expect(provider.calls).toEqual([]);
  });

  it('should fail without truncating when the local file is larger than the object', async () => {
    await writeFile(destination, `${CONTENT}XYZ`);

    const outcome = await engine.transfer(object, destination);

    expect(outcome.status).toBe('failed');
    expect(outcome.status === 'failed' && outcome.reason).toBe('size_exceeds_expected');
    expect(outcome.bytesWritten).toBe(13);
    expect(await readFile(destination, 'utf8')).toBe(`${CONTENT}XYZ`);
    expect(provider.calls).toEqual([]);
  });

  it('should create an empty file for an empty object without fetching', async () => {
    provider.putObject('photos', 'empty', '');
    const target = path.join(root, 'empty');

    const outcome = await engine.transfer({ bucket: 'photos', key: 'empty', size: 0 }, target);

    expect(outcome).toEqual({ status: 'completed', bytesWritten: 0, bytesTransferred: 0 });
    expect((await stat(target)).size).toBe(0);
    expect(provider.calls).toEqual([]);
  });

  it('should report progress after every appended chunk', async () => {
    const progress: TransferProgress[] = [];

    await engine.transfer(object, destination, { onProgress: p => progress.push(p) });

    expect(progress.map(p => [p.bytesWritten, p.percentage])).toEqual([
      [4, 40],
      [8, 80],
      [10, 100],
    ]);
  });

  describe('transient failures', () => {
    it('should keep the received prefix when a body ends early', async () => {
      provider.injectRangeFault({ type: 'truncate', afterBytes: 2 });

      const outcome = await engine.transfer(object, destination);

      expect(outcome.status).toBe('partial_will_retry');
      expect(outcome.bytesWritten).toBe(2);
      expect(await readFile(destination, 'utf8')).toBe('ab');

      provider.clearCalls();
      const resumed = await engine.transfer(object, destination);

      expect(resumed).toEqual({ status: 'completed', bytesWritten: 10, bytesTransferred: 8 });
      expect(provider.callsTo('getObjectRange')[0]?.start).toBe(2);
      expect(await readFile(destination, 'utf8')).toBe(CONTENT);
    });

    it('should report a connection reset mid-body as retryable', async () => {
      const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
      provider.injectRangeFault({ type: 'truncate', afterBytes: 3, error: reset });

      const outcome = await engine.transfer(object, destination);

      expect(outcome).toEqual({
        status: 'partial_will_retry',
        error: reset,
        bytesWritten: 3,
        bytesTransferred: 3,
      });
    });

    it('should report a throttled request as retryable', async () => {
      provider.injectRangeFault({ type: 'reject', error: ErrorFactory.network('SlowDown') });

      const outcome = await engine.transfer(object, destination);

      expect(outcome.status).toBe('partial_will_retry');
      expect(outcome.bytesWritten).toBe(0);
    });
  });

  describe('permanent failures', () => {
    it('should fail with not_found when the object is gone', async () => {
      const outcome = await engine.transfer({ bucket: 'photos', key: 'gone', size: 5 }, destination);

      expect(outcome.status === 'failed' && outcome.reason).toBe('not_found');
      expect(outcome.bytesWritten).toBe(0);
    });

    it('should fail with access_denied on permission errors', async () => {
      provider.injectRangeFault({
        type: 'reject',
        error: ErrorFactory.authentication('AccessDenied'),
      });

      const outcome = await engine.transfer(object, destination);

      expect(outcome.status === 'failed' && outcome.reason).toBe('access_denied');
    });

    it('should fail with size_mismatch when the advertised size changed', async () => {
      provider.injectRangeFault({ type: 'advertise', totalSize: 11 });

      const outcome = await engine.transfer(object, destination);

      expect(outcome.status === 'failed' && outcome.reason).toBe('size_mismatch');
      expect(outcome.bytesWritten).toBe(0);
    });

    it('should never write bytes beyond the requested range', async () => {
      provider.injectRangeFault({ type: 'overflow', extraBytes: 2 });

      const outcome = await engine.transfer(object, destination);

      expect(outcome.status === 'failed' && outcome.reason).toBe('size_mismatch');
      expect(outcome.bytesWritten).toBe(4);
      expect(await readFile(destination, 'utf8')).toBe('abcd');
    });

    it('should fail with filesystem when the destination is a directory', async () => {
      const outcome = await engine.transfer(object, root);

      expect(outcome.status === 'failed' && outcome.reason).toBe('filesystem');
      expect(provider.calls).toEqual([]);
    });

    it('should fail with filesystem when the destination cannot be opened', async () => {
      const outcome = await engine.transfer(object, path.join(root, 'missing', 'a.jpg'));

      expect(outcome.status === 'failed' && outcome.reason).toBe('filesystem');
      expect(outcome.bytesWritten).toBe(0);
    });

    it('should fail with unknown for unclassified errors', async () => {
      provider.injectRangeFault({ type: 'reject', error: new Error('boom') });

      const outcome = await engine.transfer(object, destination);

      expect(outcome).toMatchObject({ status: 'failed', reason: 'unknown', message: 'boom' });
    });
  });

  describe('cancellation', () => {
    it('should stop before the next append once aborted', async () => {
      const chunked = new ResumableTransferEngine(
        new InMemoryStorageProvider({ chunkSize: 2 }).putObject('photos', '2026/a.jpg', CONTENT),
        { segmentSize: 4 }
      );
      const controller = new AbortController();

      const outcome = await chunked.transfer(object, destination, {
        signal: controller.signal,
        onProgress: () => controller.abort(),
      });

      expect(outcome.status).toBe('partial_will_retry');
      expect(outcome.status === 'partial_will_retry' && outcome.error.name).toBe('AbortError');
      expect(outcome.bytesWritten).toBe(2);
      expect(await readFile(destination, 'utf8')).toBe('ab');
    });

    it('should not contact the provider when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const outcome = await engine.transfer(object, destination, { signal: controller.signal });

      expect(outcome.status).toBe('partial_will_retry');
      expect(provider.calls).toEqual([]);
    });
  });

  describe('readTransferState', () => {
    it('should derive the state from the file length', async () => {
      expect(await engine.readTransferState(destination)).toEqual({
        destinationPath: destination,
        bytesWritten: 0,
      });

      await writeFile(destination, 'abc');

      expect((await engine.readTransferState(destination)).bytesWritten).toBe(3);
    });
  });

  it('should reject a non-positive segment size', () => {
    expect(() => new ResumableTransferEngine(provider, { segmentSize: 0 })).toThrow(ValidationError);
  });
});
