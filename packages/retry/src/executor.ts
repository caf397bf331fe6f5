/**
 * Retry execution engine with configurable strategies
 */

import { setTimeout as delay } from 'timers/promises';

import { isRetryableError } from '@bucketferry/errors';

import { DelayCalculator, DelayUtils } from './calculator.js';
import type { RetryConfig, RetryAttempt, RetryResult } from './types.js';

/**
 * Execute operations with retry logic
 */
export class RetryExecutor<T> {
  private delayCalculator: DelayCalculator;
  private startTime = 0;
  private attempts: RetryAttempt[] = [];

  constructor(private config: RetryConfig) {
    const errors = DelayUtils.validateConfig(config);
    if (errors.length > 0) {
      throw new Error(`Invalid retry configuration: ${errors.join(', ')}`);
    }

    this.delayCalculator = new DelayCalculator(config);
  }

  /**
   * Execute an operation with retry logic. The operation receives the 1-based attempt number.
   */
  async execute(operation: (attempt: number) => Promise<T>): Promise<RetryResult<T>> {
    this.startTime = Date.now();
    this.attempts = [];
    this.delayCalculator.reset();

    let lastError: unknown;
    let attempt = 1;

    while (attempt <= this.config.maxAttempts) {
      if (attempt > 1 && this.config.signal?.aborted) {
        return this.createFailureResult(lastError, attempt - 1, false);
      }

      try {
        const data = await operation(attempt);

        return {
          success: true,
          data,
          totalAttempts: attempt,
          totalTimeMs: Date.now() - this.startTime,
          attempts: [...this.attempts],
        };
      } catch (error) {
        lastError = error;
        const elapsedMs = Date.now() - this.startTime;

        if (!this.shouldRetryError(error, attempt)) {
          return this.createFailureResult(error, attempt, false);
        }

        const isLastAttempt = attempt >= this.config.maxAttempts;

        const delayMs = isLastAttempt ? 0 : this.delayCalculator.calculateDelay(attempt + 1);
        this.attempts.push({ attempt, delayMs, elapsedMs, error });

        if (isLastAttempt) {
          break;
        }

        this.config.onRetry?.(error, attempt, delayMs);

        if (delayMs > 0) {
          await this.sleep(delayMs);
        }

        attempt++;
      }
    }

    return this.createFailureResult(lastError, attempt, true);
  }

  private shouldRetryError(error: unknown, attempt: number): boolean {
    if (this.config.signal?.aborted) {
      return false;
    }

    if (this.config.shouldRetry) {
      return this.config.shouldRetry(error, attempt);
    }

    return isRetryableError(error);
  }

  private createFailureResult(
    error: unknown,
    totalAttempts: number,
    exhausted: boolean
  ): RetryResult<T> {
    return {
      success: false,
      error,
      totalAttempts,
      totalTimeMs: Date.now() - this.startTime,
      attempts: [...this.attempts],
      exhausted,
    };
  }

  /**
   * Sleep for specified milliseconds, returning early when the signal aborts
   */
  private async sleep(ms: number): Promise<void> {
    try {
      await delay(ms, undefined, this.config.signal ? { signal: this.config.signal } : {});
    } catch (error) {
      if (!(error instanceof Error && error.name === 'AbortError')) {
        throw error;
      }
    }
  }
}

