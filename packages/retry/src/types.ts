/**
 * Retry mechanism types and interfaces
 */

export enum RetryStrategy {
  /** Fixed delay between retries */
  FIXED = 'fixed',
  /** Linear increase in delay */
  LINEAR = 'linear',
  /** Exponential backoff */
  EXPONENTIAL = 'exponential',
}

export enum JitterType {
  NONE = 'none',
  /** Random delay between 0 and calculated delay */
  FULL = 'full',
  /** Half calculated delay plus random half */
  EQUAL = 'equal',
  /** Random delay between base delay and three times the previous delay */
  DECORRELATED = 'decorrelated',
}

/**
 * Retry configuration options
 */
export interface RetryConfig {
  /** Maximum number of attempts, including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  strategy: RetryStrategy;
  jitter: JitterType;
  /** Multiplier for exponential/linear strategies */
  multiplier?: number;
  /** Stops further attempts and pending delays once aborted */
  signal?: AbortSignal;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export interface RetryAttempt {
  /** Attempt number (1-based) */
  attempt: number;
  /** Delay before the next attempt in milliseconds */
  delayMs: number;
  /** Total time elapsed since first attempt */
  elapsedMs: number;
  error: unknown;
}

export type RetryResult<T> =
  | {
      success: true;
      data: T;
      totalAttempts: number;
      totalTimeMs: number;
      attempts: RetryAttempt[];
    }
  | {
      success: false;
      error: unknown;
      totalAttempts: number;
      totalTimeMs: number;
      attempts: RetryAttempt[];
      /** True when every allowed attempt failed with a retryable error */
      exhausted: boolean;
    };

/**
 * Default retry configurations for common scenarios
 */
export const DEFAULT_RETRY_CONFIGS = {
  /** Resumable object transfers: each attempt continues where the last stopped */
  TRANSFER: {
    maxAttempts: 5,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    strategy: RetryStrategy.EXPONENTIAL,
    jitter: JitterType.EQUAL,
    multiplier: 2,
  },
} as const satisfies Record<string, RetryConfig>;
