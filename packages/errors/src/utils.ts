/**
 * Error handling utilities and helper functions
 */

import { ErrorContextManager } from './context.js';
import {
  NetworkError,
  FileSystemError,
  ConfigurationError,
  ValidationError,
  ExternalServiceError,
  AuthenticationError,
  TransferIntegrityError,
  type DomainErrorOptions,
} from './domain.js';
import { BucketFerryError, type ErrorContext } from './types.js';

/**
 * Result type for operations that can fail
 */
export type Result<T, E = Error> =
  | { success: true; data: T; error?: never }
  | { success: false; data?: never; error: E };

export function success<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function failure<E = Error>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wrap an async operation to return a Result instead of throwing
 */
export async function safeAsync<T>(operation: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    return success(await operation());
  } catch (error) {
    return failure(toError(error));
  }
}

/**
 * Wrap a sync operation to return a Result instead of throwing
 */
export function safe<T>(operation: () => T): Result<T, Error> {
  try {
    return success(operation());
  } catch (error) {
    return failure(toError(error));
  }
}

type FactoryOptions = DomainErrorOptions & { context?: Partial<ErrorContext> };

function contextFor(operation: string, partial: Partial<ErrorContext> = {}): ErrorContext {
  return {
    ...ErrorContextManager.createContext({ operation }),
    ...partial,
  };
}

/**
 * Error factory functions for creating domain-specific errors
 */
export class ErrorFactory {
  static network(message: string, options: FactoryOptions = {}): NetworkError {
    return new NetworkError(message, contextFor('network_operation', options.context), options);
  }

  static filesystem(message: string, options: FactoryOptions = {}): FileSystemError {
    return new FileSystemError(
      message,
      contextFor('filesystem_operation', options.context),
      options
    );
  }

  static configuration(message: string, options: FactoryOptions = {}): ConfigurationError {
    return new ConfigurationError(
      message,
      contextFor('configuration_operation', options.context),
      options
    );
  }

  static validation(message: string, options: FactoryOptions = {}): ValidationError {
    return new ValidationError(
      message,
      contextFor('validation_operation', options.context),
      options
    );
  }

  static externalService(
    message: string,
    options: FactoryOptions & { statusCode?: number } = {}
  ): ExternalServiceError {
    return new ExternalServiceError(
      message,
      contextFor('external_service_operation', options.context),
      options
    );
  }

  static authentication(message: string, options: FactoryOptions = {}): AuthenticationError {
    return new AuthenticationError(
      message,
      contextFor('authentication_operation', options.context),
      options
    );
  }

  static integrity(message: string, options: FactoryOptions = {}): TransferIntegrityError {
    return new TransferIntegrityError(
      message,
      contextFor('transfer_operation', options.context),
      options
    );
  }
}

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
]);

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof BucketFerryError) {
    return error.isRetryable() || error.isConditionallyRetryable();
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return false;
    }

    const code = 'code' in error ? error.code : undefined;
    if (typeof code === 'string' && TRANSIENT_ERROR_CODES.has(code)) {
      return true;
    }

    const message = error.message.toLowerCase();
    const name = error.name.toLowerCase();

    if (
      message.includes('timeout') ||
      message.includes('connection') ||
      message.includes('network') ||
      name.includes('timeout') ||
      name.includes('network')
    ) {
      return true;
    }
  }

  return false;
}

/**
 * Extract error information for logging
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (error instanceof BucketFerryError) {
    return error.toLogFormat();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
    };
  }

  return {
    error: String(error),
  };
}
