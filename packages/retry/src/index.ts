/**
 * Retry module - Bounded retries with exponential backoff and jitter
 */

export {
  RetryStrategy,
  JitterType,
  DEFAULT_RETRY_CONFIGS,
  type RetryConfig,
  type RetryAttempt,
  type RetryResult,
} from './types.js';

export { DelayCalculator, DelayUtils } from './calculator.js';

export { RetryExecutor } from './executor.js';
