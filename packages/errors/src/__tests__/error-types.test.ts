/**
 * Tests for error types and base error classes
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  BucketFerryError,
  ErrorSeverity,
  ErrorCategory,
  RetryClassification,
  NetworkError,
  FileSystemError,
  ExternalServiceError,
  TransferIntegrityError,
  ErrorContextManager,
  type ErrorContext,
} from '../index.js';

describe('Error Types', () => {
  let testContext: ErrorContext;

  beforeEach(() => {
    testContext = ErrorContextManager.createContext({
      operation: 'test_operation',
      component: 'test_component',
    });
  });

  describe('BucketFerryError Base Class', () => {
    class TestError extends BucketFerryError {
      constructor(message: string, context: ErrorContext) {
        super(message, 'TEST_ERROR', {
          severity: ErrorSeverity.MEDIUM,
          category: ErrorCategory.UNKNOWN,
          context,
        });
      }
    }

    it('should create error with proper metadata', () => {
      const error = new TestError('Test error message', testContext);

      expect(error.message).toBe('Test error message');
      expect(error.code).toBe('TEST_ERROR');
      expect(error.name).toBe('TestError');
      expect(error.metadata.retryClassification).toBe(RetryClassification.NON_RETRYABLE);
      expect(error.metadata.context).toBe(testContext);
    });

    it('should have proper prototype chain for instanceof checks', () => {
      const error = new TestError('Test error', testContext);

      expect(error instanceof Error).toBe(true);
      expect(error instanceof BucketFerryError).toBe(true);
      expect(error instanceof TestError).toBe(true);
    });

    it('should format error for logging', () => {
      const error = new TestError('Test error', testContext);

      expect(error.toLogFormat()).toMatchObject({
        name: 'TestError',
        message: 'Test error',
        code: 'TEST_ERROR',
        severity: ErrorSeverity.MEDIUM,
        category: ErrorCategory.UNKNOWN,
        correlationId: testContext.correlationId,
        operation: 'test_operation',
        component: 'test_component',
      });
    });

    it('should check retry classification correctly', () => {
      const conditionalError = new TestError('Conditional error', testContext);
      conditionalError.metadata.retryClassification = RetryClassification.CONDITIONALLY_RETRYABLE;

      expect(conditionalError.isRetryable()).toBe(false);
      expect(conditionalError.isConditionallyRetryable()).toBe(true);
    });
  });

  describe('NetworkError', () => {
    it('should be retryable by default', () => {
      const error = new NetworkError('Connection reset', testContext);

      expect(error.metadata.category).toBe(ErrorCategory.NETWORK);
      expect(error.metadata.severity).toBe(ErrorSeverity.HIGH);
      expect(error.isRetryable()).toBe(true);
      expect(error.code).toBe('NETWORK_ERROR');
    });

    it('should allow custom options', () => {
      const cause = new Error('socket hang up');
      const error = new NetworkError('Custom network error', testContext, {
        code: 'SLOW_DOWN',
        cause,
        data: { bucket: 'photos' },
      });

      expect(error.code).toBe('SLOW_DOWN');
      expect(error.metadata.cause).toBe(cause);
      expect(error.toLogFormat()).toMatchObject({ cause: 'socket hang up', data: { bucket: 'photos' } });
    });
  });

  describe('non-retryable categories', () => {
    it('should classify filesystem, provider and integrity errors as final', () => {
      const errors = [
        new FileSystemError('EACCES', testContext),
        new ExternalServiceError('NoSuchKey', testContext, { statusCode: 404 }),
        new TransferIntegrityError('too large', testContext),
      ];

      expect(errors.map(error => error.isRetryable())).toEqual([false, false, false]);
      expect(errors.map(error => error.metadata.category)).toEqual([
        ErrorCategory.FILESYSTEM,
        ErrorCategory.EXTERNAL_SERVICE,
        ErrorCategory.INTEGRITY,
      ]);
    });

    it('should keep the provider status code', () => {
      const error = new ExternalServiceError('NoSuchKey', testContext, { statusCode: 404 });

      expect(error.statusCode).toBe(404);
    });
  });
});
