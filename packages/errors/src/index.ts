/**
 * Error handling module
 *
 * - Stream error kinds: NotFound, IOFailure, UnknownBackend
 * - Error context tracking with correlation IDs
 * - Result types for operations that report failure instead of throwing
 */

export {
  ErrorSeverity,
  RetryClassification,
  ErrorCategory,
  TetherError,
  type ErrorContext,
  type ErrorMetadata,
  type DomainErrorOptions,
} from './types.js';

export {
  NotFoundError,
  IOFailureError,
  UnknownBackendError,
  ConfigurationError,
  ValidationError,
} from './domain.js';

export {
  ErrorContextManager,
  runWithErrorContext,
  getCurrentErrorContext,
  type ErrorContextOptions,
} from './context.js';

export {
  type Result,
  success,
  failure,
  toError,
  safeAsync,
  safe,
  platformErrorCode,
  ErrorFactory,
  wrapError,
  isNotFoundError,
  isIOFailureError,
  extractErrorInfo,
} from './utils.js';
