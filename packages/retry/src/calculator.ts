/**
 * Delay calculation utilities for retry mechanisms
 */

import { RetryStrategy, JitterType, type RetryConfig } from './types.js';

/**
 * Calculate delay for retry attempts with various strategies and jitter
 */
export class DelayCalculator {
  private previousDelay = 0;

  constructor(
    private config: RetryConfig,
    private readonly random: () => number = Math.random
  ) {}

  /**
   * Calculate the delay that precedes the given attempt
   */
  calculateDelay(attempt: number): number {
    const baseDelay = this.calculateBaseDelay(attempt);
    const cappedDelay = Math.min(baseDelay, this.config.maxDelayMs ?? Infinity);
    const jitteredDelay = this.applyJitter(cappedDelay);

    this.previousDelay = jitteredDelay;
    return Math.max(0, Math.round(jitteredDelay));
  }

  private calculateBaseDelay(attempt: number): number {
    const { strategy, baseDelayMs, multiplier = 2 } = this.config;

    switch (strategy) {
      case RetryStrategy.FIXED:
        return baseDelayMs;

      case RetryStrategy.LINEAR:
        return baseDelayMs * (1 + (attempt - 1) * (multiplier - 1));

      case RetryStrategy.EXPONENTIAL:
        return baseDelayMs * Math.pow(multiplier, attempt - 1);

      default:
        return baseDelayMs;
    }
  }

  private applyJitter(delay: number): number {
    switch (this.config.jitter) {
      case JitterType.NONE:
        return delay;

      case JitterType.FULL:
        return this.random() * delay;

      case JitterType.EQUAL:
        return delay * 0.5 + this.random() * delay * 0.5;

      case JitterType.DECORRELATED: {
        const min = this.config.baseDelayMs;
        const max = Math.min(
          Math.max(min, this.previousDelay * 3),
          this.config.maxDelayMs ?? Infinity
        );
        return min + this.random() * Math.max(0, max - min);
      }

      default:
        return delay;
    }
  }

  reset(): void {
    this.previousDelay = 0;
  }
}

export const DelayUtils = {
  /**
   * Validate retry configuration
   */
  validateConfig(config: RetryConfig): string[] {
    const errors: string[] = [];

    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      errors.push('maxAttempts must be an integer of at least 1');
    }

    if (config.baseDelayMs < 0) {
      errors.push('baseDelayMs must be non-negative');
    }

    if (config.maxDelayMs !== undefined && config.maxDelayMs < config.baseDelayMs) {
      errors.push('maxDelayMs must be greater than or equal to baseDelayMs');
    }

    if (config.multiplier !== undefined && config.multiplier <= 0) {
      errors.push('multiplier must be positive');
    }

    return errors;
  },
};
