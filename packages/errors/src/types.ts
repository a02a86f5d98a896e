/**
 * Error types and base classes shared by every tetherfs package
 */

/**
 * Error severity levels for classification and handling
 */
export enum ErrorSeverity {
  /** Low severity - informational errors that don't affect operation */
  LOW = 'low',
  /** Medium severity - errors that may affect some functionality */
  MEDIUM = 'medium',
  /** High severity - the requested operation was aborted */
  HIGH = 'high',
  /** Critical severity - errors that prevent core functionality */
  CRITICAL = 'critical',
}

/**
 * Error retry classification. Nothing in tetherfs retries on its own; the
 * classification is a hint for callers.
 */
export enum RetryClassification {
  NON_RETRYABLE = 'non_retryable',
  RETRYABLE = 'retryable',
  CONDITIONALLY_RETRYABLE = 'conditionally_retryable',
}

/**
 * Error categories
 */
export enum ErrorCategory {
  /** Local or network filesystem errors */
  FILESYSTEM = 'filesystem',
  /** Errors raised by the device-sync transport */
  DEVICE = 'device',
  /** Invalid or missing configuration */
  CONFIGURATION = 'configuration',
  /** Invalid input or state */
  VALIDATION = 'validation',
  /** Internal wiring errors */
  SYSTEM = 'system',
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

export interface ErrorMetadata {
  severity: ErrorSeverity;
  category: ErrorCategory;
  retryClassification: RetryClassification;
  context: ErrorContext;
  /** Original error that caused this error (error chaining) */
  cause?: Error;
  /** Additional error-specific data, `path` is set for every stream error */
  data?: Record<string, unknown>;
  /** Suggested recovery actions */
  recoveryActions?: string[];
}

/**
 * Options accepted by every domain error constructor
 */
export interface DomainErrorOptions {
  code?: string;
  cause?: Error;
  data?: Record<string, unknown>;
  severity?: ErrorSeverity;
  retryClassification?: RetryClassification;
}

/**
 * Base error class with metadata and context tracking
 */
export abstract class TetherError extends Error {
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
   * Path the failed operation was working on, when there is one
   */
  get path(): string | undefined {
    const value = this.metadata.data?.['path'];
    return typeof value === 'string' ? value : undefined;
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
      timestamp: this.metadata.context.timestamp,
      ...(this.metadata.data && { data: this.metadata.data }),
      ...(this.metadata.cause && { cause: this.metadata.cause.message }),
    };
  }

  isRetryable(): boolean {
    return this.metadata.retryClassification === RetryClassification.RETRYABLE;
  }
}
