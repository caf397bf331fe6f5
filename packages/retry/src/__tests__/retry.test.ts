import { describe, it, expect, vi } from 'vitest';

import { ErrorFactory } from '@bucketferry/errors';

import {
  DelayCalculator,
  DelayUtils,
  JitterType,
  RetryExecutor,
  RetryStrategy,
  type RetryConfig,
} from '../index.js';

function execute(
  operation: (attempt: number) => Promise<string>,
  config: RetryConfig
) {
  return new RetryExecutor<string>(config).execute(operation);
}

const immediate: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 0,
  strategy: RetryStrategy.FIXED,
  jitter: JitterType.NONE,
};

describe('DelayCalculator', () => {
  it('should grow exponentially and respect the cap', () => {
    const calculator = new DelayCalculator({
      maxAttempts: 5,
      baseDelayMs: 100,
      maxDelayMs: 300,
      strategy: RetryStrategy.EXPONENTIAL,
      jitter: JitterType.NONE,
      multiplier: 2,
    });

    expect([1, 2, 3, 4].map(attempt => calculator.calculateDelay(attempt))).toEqual([
      100, 200, 300, 300,
    ]);
  });

  it('should grow linearly', () => {
    const calculator = new DelayCalculator({
      maxAttempts: 3,
      baseDelayMs: 100,
      strategy: RetryStrategy.LINEAR,
      jitter: JitterType.NONE,
      multiplier: 1.5,
    });

    expect(calculator.calculateDelay(3)).toBe(200);
  });

  it('should apply equal jitter from the injected random source', () => {
    const calculator = new DelayCalculator(
      {
        maxAttempts: 3,
        baseDelayMs: 1000,
        strategy: RetryStrategy.FIXED,
        jitter: JitterType.EQUAL,
      },
      () => 0
    );

    expect(calculator.calculateDelay(2)).toBe(500);
  });
});

describe('DelayUtils.validateConfig', () => {
  it('should report every invalid field', () => {
    expect(
      DelayUtils.validateConfig({
        maxAttempts: 0,
        baseDelayMs: 100,
        maxDelayMs: 50,
        strategy: RetryStrategy.FIXED,
        jitter: JitterType.NONE,
      })
    ).toEqual([
      'maxAttempts must be an integer of at least 1',
      'maxDelayMs must be greater than or equal to baseDelayMs',
    ]);
  });

  it('should make the executor refuse invalid configuration', () => {
    expect(() => new RetryExecutor({ ...immediate, maxAttempts: 0 })).toThrow(
      'Invalid retry configuration'
    );
  });
});

describe('RetryExecutor', () => {
  it('should retry retryable errors until success', async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(ErrorFactory.network('reset'))
      .mockResolvedValueOnce('done');
    const onRetry = vi.fn();

    const result = await execute(operation, { ...immediate, onRetry });

    expect(result.success).toBe(true);
    expect(result.totalAttempts).toBe(2);
    expect(operation).toHaveBeenNthCalledWith(2, 2);
    expect(onRetry).toHaveBeenCalledTimes(1);
  });

  it('should stop immediately on non-retryable errors', async () => {
    const error = ErrorFactory.externalService('NoSuchKey');
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(error);

    const result = await execute(operation, immediate);

    expect(operation).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ success: false, error, exhausted: false, totalAttempts: 1 });
  });

  it('should report exhaustion after the last attempt', async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValue(ErrorFactory.network('reset'));

    const result = await execute(operation, immediate);

    expect(operation).toHaveBeenCalledTimes(3);
    expect(result).toMatchObject({ success: false, exhausted: true, totalAttempts: 3 });
    expect(result.attempts).toHaveLength(3);
    expect(result.attempts.map(attempt => attempt.delayMs)).toEqual([0, 0, 0]);
  });

  it('should honor a custom shouldRetry predicate', async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('try again'))
      .mockResolvedValueOnce('ok');

    const result = await execute(operation, {
      ...immediate,
      shouldRetry: error => error instanceof Error && error.message === 'try again',
    });

    expect(result.success).toBe(true);
  });

  it('should not start another attempt once aborted', async () => {
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      controller.abort();
      throw ErrorFactory.network('reset');
    });

    const result = await execute(operation, {
      ...immediate,
      signal: controller.signal,
    });

    expect(operation).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ success: false, exhausted: false });
  });
});
