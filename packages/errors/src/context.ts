/**
 * Error context creation with correlation IDs
 */

import { randomUUID } from 'crypto';

import type { ErrorContext } from './types.js';

export const ErrorContextManager = {
  generateCorrelationId(): string {
    return randomUUID();
  },

  /**
   * Create a new error context
   */
  createContext(
    options: {
      operation?: string;
      component?: string;
      metadata?: Record<string, unknown>;
      correlationId?: string;
    } = {}
  ): ErrorContext {
    const context: ErrorContext = {
      correlationId: options.correlationId || ErrorContextManager.generateCorrelationId(),
      timestamp: new Date(),
    };

    if (options.operation !== undefined) {
      context.operation = options.operation;
    }
    if (options.component !== undefined) {
      context.component = options.component;
    }
    if (options.metadata !== undefined) {
      context.metadata = options.metadata;
    }

    return context;
  },
} as const;
