/**
 * Domain-specific error classes for different categories of errors
 */

import {
  BucketFerryError,
  ErrorSeverity,
  ErrorCategory,
  RetryClassification,
  type ErrorContext,
  type ErrorMetadata,
} from './types.js';

export interface DomainErrorOptions {
  code?: string;
  cause?: Error;
  data?: Record<string, unknown>;
  severity?: ErrorSeverity;
  retryClassification?: RetryClassification;
}

type BaseMetadata = Partial<ErrorMetadata> & {
  severity: ErrorSeverity;
  category: ErrorCategory;
  context: ErrorContext;
};

function buildMetadata(
  category: ErrorCategory,
  context: ErrorContext,
  options: DomainErrorOptions,
  defaults: {
    severity: ErrorSeverity;
    retryClassification: RetryClassification;
    recoveryActions: string[];
  }
): BaseMetadata {
  const metadata: BaseMetadata = {
    severity: options.severity ?? defaults.severity,
    category,
    retryClassification: options.retryClassification ?? defaults.retryClassification,
    context,
    recoveryActions: defaults.recoveryActions,
  };

  if (options.cause !== undefined) {
    metadata.cause = options.cause;
  }
  if (options.data !== undefined) {
    metadata.data = options.data;
  }

  return metadata;
}

/**
 * Network-related errors (timeouts, connection resets, throttling, 5xx responses)
 */
export class NetworkError extends BucketFerryError {
  constructor(message: string, context: ErrorContext, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'NETWORK_ERROR',
      buildMetadata(ErrorCategory.NETWORK, context, options, {
        severity: ErrorSeverity.HIGH,
        retryClassification: RetryClassification.RETRYABLE,
        recoveryActions: ['Check network connectivity', 'Retry after delay'],
      })
    );
  }
}

/**
 * File system errors (permissions, disk space, file operations, etc.)
 */
export class FileSystemError extends BucketFerryError {
  constructor(message: string, context: ErrorContext, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'FILESYSTEM_ERROR',
      buildMetadata(ErrorCategory.FILESYSTEM, context, options, {
        severity: ErrorSeverity.HIGH,
        retryClassification: RetryClassification.NON_RETRYABLE,
        recoveryActions: [
          'Check file permissions',
          'Verify disk space availability',
          'Ensure the target directory is writable',
        ],
      })
    );
  }
}

/**
 * Configuration errors (unreadable file, schema validation failures, unusable target path)
 */
export class ConfigurationError extends BucketFerryError {
  constructor(message: string, context: ErrorContext, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'CONFIGURATION_ERROR',
      buildMetadata(ErrorCategory.CONFIGURATION, context, options, {
        severity: ErrorSeverity.CRITICAL,
        retryClassification: RetryClassification.NON_RETRYABLE,
        recoveryActions: ['Check the configuration file syntax and values'],
      })
    );
  }
}

export class ValidationError extends BucketFerryError {
  constructor(message: string, context: ErrorContext, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'VALIDATION_ERROR',
      buildMetadata(ErrorCategory.VALIDATION, context, options, {
        severity: ErrorSeverity.MEDIUM,
        retryClassification: RetryClassification.NON_RETRYABLE,
        recoveryActions: ['Check the input value'],
      })
    );
  }
}

/**
 * Storage provider errors that are not transient (missing bucket or object, bad request)
 */
export class ExternalServiceError extends BucketFerryError {
  public readonly statusCode: number | undefined;

  constructor(
    message: string,
    context: ErrorContext,
    options: DomainErrorOptions & { statusCode?: number } = {}
  ) {
    super(
      message,
      options.code ?? 'EXTERNAL_SERVICE_ERROR',
      buildMetadata(ErrorCategory.EXTERNAL_SERVICE, context, options, {
        severity: ErrorSeverity.MEDIUM,
        retryClassification: RetryClassification.NON_RETRYABLE,
        recoveryActions: ['Verify the bucket and object still exist'],
      })
    );
    this.statusCode = options.statusCode;
  }
}

/**
 * Credential or permission failures at the storage provider
 */
export class AuthenticationError extends BucketFerryError {
  constructor(message: string, context: ErrorContext, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'AUTHENTICATION_ERROR',
      buildMetadata(ErrorCategory.AUTHENTICATION, context, options, {
        severity: ErrorSeverity.HIGH,
        retryClassification: RetryClassification.NON_RETRYABLE,
        recoveryActions: ['Check credentials', 'Check the bucket policy'],
      })
    );
  }
}

/**
 * Local file state disagrees with the remote object (size violations)
 */
export class TransferIntegrityError extends BucketFerryError {
  constructor(message: string, context: ErrorContext, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'TRANSFER_INTEGRITY_ERROR',
      buildMetadata(ErrorCategory.INTEGRITY, context, options, {
        severity: ErrorSeverity.HIGH,
        retryClassification: RetryClassification.NON_RETRYABLE,
        recoveryActions: ['Inspect or remove the local file before retrying'],
      })
    );
  }
}
