/**
 * Error handling module - Standardized error handling for bucketferry
 *
 * Features:
 * - Domain-specific error types with retry classification
 * - Correlation IDs on every error context
 * - Result types for safe error handling
 * - Error factory functions for consistent error creation
 */

export {
  ErrorSeverity,
  RetryClassification,
  ErrorCategory,
  BucketFerryError,
  type ErrorContext,
  type ErrorMetadata,
} from './types.js';

export {
  NetworkError,
  FileSystemError,
  ConfigurationError,
  ValidationError,
  ExternalServiceError,
  AuthenticationError,
  TransferIntegrityError,
  type DomainErrorOptions,
} from './domain.js';

export { ErrorContextManager } from './context.js';

export {
  type Result,
  success,
  failure,
  toError,
  safeAsync,
  safe,
  ErrorFactory,
  isRetryableError,
  extractErrorInfo,
} from './utils.js';
