/**
 * Error handling utilities and helper functions
 */

import { getCurrentErrorContext } from './context.js';
import {
  NotFoundError,
  IOFailureError,
  UnknownBackendError,
  ConfigurationError,
  ValidationError,
} from './domain.js';
import { TetherError, ErrorCategory, type ErrorContext } from './types.js';

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
 * Normalize anything thrown into an Error
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

/**
 * Platform error code (`ENOENT`, `EEXIST`, ...) carried by a Node.js system error
 */
export function platformErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

interface FactoryOptions {
  cause?: unknown;
  data?: Record<string, unknown>;
  context?: Partial<ErrorContext>;
}

function contextFor(operation: string, options: FactoryOptions): ErrorContext {
  return {
    ...getCurrentErrorContext({ operation }),
    ...options.context,
  };
}

function causeOf(options: FactoryOptions): { cause?: Error } {
  return options.cause === undefined ? {} : { cause: toError(options.cause) };
}

/**
 * Factory functions for creating errors with the current context. Every
 * stream error names the path it was working on.
 */
export class ErrorFactory {
  static notFound(path: string, message?: string, options: FactoryOptions = {}): NotFoundError {
    return new NotFoundError(
      message ?? `Couldn't open file '${path}' for reading`,
      contextFor('read', options),
      { ...causeOf(options), data: { ...options.data, path } }
    );
  }

  static ioFailure(
    path: string,
    message: string,
    options: FactoryOptions & { platformCode?: string; category?: ErrorCategory } = {}
  ): IOFailureError {
    const platformCode = options.platformCode ?? platformErrorCode(options.cause);
    return new IOFailureError(message, contextFor('io', options), {
      ...causeOf(options),
      data: { ...options.data, path },
      ...(platformCode !== undefined && { platformCode }),
      ...(options.category !== undefined && { category: options.category }),
    });
  }

  static unknownBackend(path: string, kind: string, options: FactoryOptions = {}): UnknownBackendError {
    return new UnknownBackendError(
      `Unknown stream type '${kind}' for '${path}'`,
      contextFor('resolve_backend', options),
      { ...causeOf(options), data: { ...options.data, path, kind } }
    );
  }

  static configuration(message: string, options: FactoryOptions = {}): ConfigurationError {
    return new ConfigurationError(message, contextFor('configuration', options), {
      ...causeOf(options),
      ...(options.data !== undefined && { data: options.data }),
    });
  }

  static validation(message: string, options: FactoryOptions = {}): ValidationError {
    return new ValidationError(message, contextFor('validation', options), {
      ...causeOf(options),
      ...(options.data !== undefined && { data: options.data }),
    });
  }
}

/**
 * Prefix an error message with the path involved, keeping its type. Errors
 * that are not TetherErrors become IOFailureErrors.
 */
export function wrapError(error: unknown, path: string, action: string): TetherError {
  if (error instanceof TetherError) {
    return error;
  }
  const cause = toError(error);
  return ErrorFactory.ioFailure(path, `Cannot ${action} '${path}': ${cause.message}`, { cause });
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isIOFailureError(error: unknown): error is IOFailureError {
  return error instanceof IOFailureError;
}

/**
 * Extract error information for logging
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (error instanceof TetherError) {
    return error.toLogFormat();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    error: String(error),
  };
}
