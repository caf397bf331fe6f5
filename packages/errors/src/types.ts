/**
 * Error types and base classes for standardized error handling across bucketferry
 */

/**
 * Error severity levels for classification and handling
 */
export enum ErrorSeverity {
  /** Low severity - informational errors that don't affect operation */
  LOW = 'low',
  /** Medium severity - errors that may affect some functionality */
  MEDIUM = 'medium',
  /** High severity - errors that significantly impact functionality */
  HIGH = 'high',
  /** Critical severity - errors that prevent core functionality */
  CRITICAL = 'critical',
}

/**
 * Error retry classification for automated retry logic
 */
export enum RetryClassification {
  /** Error should not be retried */
  NON_RETRYABLE = 'non_retryable',
  /** Error can be safely retried */
  RETRYABLE = 'retryable',
  /** Error may be retryable under certain conditions */
  CONDITIONALLY_RETRYABLE = 'conditionally_retryable',
}

/**
 * Error categories for domain-specific error handling
 */
export enum ErrorCategory {
  /** Timeouts, connection resets, throttling and 5xx responses */
  NETWORK = 'network',
  /** Permissions, disk space, missing paths */
  FILESYSTEM = 'filesystem',
  /** Invalid or unreadable configuration */
  CONFIGURATION = 'configuration',
  /** Invalid input */
  VALIDATION = 'validation',
  /** Credential and permission failures at the storage provider */
  AUTHENTICATION = 'authentication',
  /** Storage provider failures that are not network related */
  EXTERNAL_SERVICE = 'external_service',
  /** Local state disagrees with the remote object */
  INTEGRITY = 'integrity',
  /** Unknown or uncategorized errors */
  UNKNOWN = 'unknown',
}

/**
 * Error context for tracking operations and debugging
 */
export interface ErrorContext {
  /** Unique correlation ID for tracking errors across operations */
  correlationId: string;
  /** Operation name or identifier */
  operation?: string;
  /** Component or module where the error occurred */
  component?: string;
  /** Additional metadata for debugging */
  metadata?: Record<string, unknown>;
  /** Timestamp when the error occurred */
  timestamp: Date;
}

/**
 * Error metadata attached to every bucketferry error
 */
export interface ErrorMetadata {
  severity: ErrorSeverity;
  category: ErrorCategory;
  retryClassification: RetryClassification;
  context: ErrorContext;
  /** Original error that caused this error (error chaining) */
  cause?: Error;
  /** Additional error-specific data */
  data?: Record<string, unknown>;
  /** Suggested recovery actions */
  recoveryActions?: string[];
}

/**
 * Base error class with metadata and context tracking
 */
export abstract class BucketFerryError extends Error {
  public readonly code: string;
  public readonly metadata: ErrorMetadata;

  constructor(
    message: string,
    code: string,
    metadata: Partial<ErrorMetadata> & {
      severity: ErrorSeverity;
      category: ErrorCategory;
      context: ErrorContext;
    }
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    this.metadata = {
      retryClassification: RetryClassification.NON_RETRYABLE,
      ...metadata,
    };

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get formatted error information for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.metadata.severity,
      category: this.metadata.category,
      retryClassification: this.metadata.retryClassification,
      correlationId: this.metadata.context.correlationId,
      operation: this.metadata.context.operation,
      component: this.metadata.context.component,
      ...(this.metadata.data && { data: this.metadata.data }),
      ...(this.metadata.cause && { cause: this.metadata.cause.message }),
    };
  }

  isRetryable(): boolean {
    return this.metadata.retryClassification === RetryClassification.RETRYABLE;
  }

  isConditionallyRetryable(): boolean {
    return this.metadata.retryClassification === RetryClassification.CONDITIONALLY_RETRYABLE;
  }
}
