/**
 * Domain-specific error classes. The three stream error kinds are
 * NotFound, IOFailure and UnknownBackend; the rest cover configuration
 * and input validation.
 */

import {
  TetherError,
  ErrorSeverity,
  ErrorCategory,
  RetryClassification,
  type DomainErrorOptions,
  type ErrorContext,
  type ErrorMetadata,
} from './types.js';

type RequiredMetadata = Partial<ErrorMetadata> & {
  severity: ErrorSeverity;
  category: ErrorCategory;
  context: ErrorContext;
};

function buildMetadata(
  category: ErrorCategory,
  context: ErrorContext,
  options: DomainErrorOptions,
  defaults: { severity: ErrorSeverity; retryClassification: RetryClassification },
  recoveryActions: string[]
): RequiredMetadata {
  const metadata: RequiredMetadata = {
    severity: options.severity ?? defaults.severity,
    category,
    retryClassification: options.retryClassification ?? defaults.retryClassification,
    context,
    recoveryActions,
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
 * The target of a read does not exist or cannot be opened for reading
 */
export class NotFoundError extends TetherError {
  constructor(message: string, context: ErrorContext, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'NOT_FOUND',
      buildMetadata(
        ErrorCategory.FILESYSTEM,
        context,
        options,
        { severity: ErrorSeverity.HIGH, retryClassification: RetryClassification.NON_RETRYABLE },
        ['Check the path spelling', 'Verify the device is connected for device paths']
      )
    );
  }
}

/**
 * Underlying platform or transport error. The platform code (for example
 * `EACCES`) is kept in `platformCode`.
 */
export class IOFailureError extends TetherError {
  public readonly platformCode: string | undefined;

  constructor(
    message: string,
    context: ErrorContext,
    options: DomainErrorOptions & { platformCode?: string; category?: ErrorCategory } = {}
  ) {
    super(
      message,
      options.code ?? 'IO_FAILURE',
      buildMetadata(
        options.category ?? ErrorCategory.FILESYSTEM,
        context,
        {
          ...options,
          data: {
            ...options.data,
            ...(options.platformCode !== undefined && { platformCode: options.platformCode }),
          },
        },
        {
          severity: ErrorSeverity.HIGH,
          retryClassification: RetryClassification.CONDITIONALLY_RETRYABLE,
        },
        ['Check file permissions', 'Verify disk space availability', 'Check the device connection']
      )
    );
    this.platformCode = options.platformCode;
  }
}

/**
 * No backend is registered for the kind a path classified as
 */
export class UnknownBackendError extends TetherError {
  constructor(message: string, context: ErrorContext, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'UNKNOWN_BACKEND',
      buildMetadata(
        ErrorCategory.SYSTEM,
        context,
        options,
        { severity: ErrorSeverity.CRITICAL, retryClassification: RetryClassification.NON_RETRYABLE },
        ['Register a backend for the path kind']
      )
    );
  }
}

export class ConfigurationError extends TetherError {
  constructor(message: string, context: ErrorContext, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'CONFIGURATION_ERROR',
      buildMetadata(
        ErrorCategory.CONFIGURATION,
        context,
        options,
        { severity: ErrorSeverity.CRITICAL, retryClassification: RetryClassification.NON_RETRYABLE },
        ['Check the configuration file', 'Verify required fields are present']
      )
    );
  }
}

export class ValidationError extends TetherError {
  constructor(message: string, context: ErrorContext, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'VALIDATION_ERROR',
      buildMetadata(
        ErrorCategory.VALIDATION,
        context,
        options,
        { severity: ErrorSeverity.MEDIUM, retryClassification: RetryClassification.NON_RETRYABLE },
        ['Check the input value']
      )
    );
  }
}
