/**
 * Tests for the stream error kinds
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  TetherError,
  ErrorSeverity,
  ErrorCategory,
  RetryClassification,
  NotFoundError,
  IOFailureError,
  UnknownBackendError,
  ConfigurationError,
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

  describe('TetherError Base Class', () => {
    class TestError extends TetherError {
      constructor(message: string, context: ErrorContext) {
        super(message, 'TEST_ERROR', {
          severity: ErrorSeverity.MEDIUM,
          category: ErrorCategory.UNKNOWN,
          context,
          data: { path: 'a\\b.txt' },
        });
      }
    }

    it('should create error with proper metadata', () => {
      const error = new TestError('Test error message', testContext);

      expect(error.message).toBe('Test error message');
      expect(error.code).toBe('TEST_ERROR');
      expect(error.name).toBe('TestError');
      expect(error.path).toBe('a\\b.txt');
      expect(error.metadata.retryClassification).toBe(RetryClassification.NON_RETRYABLE);
      expect(error.metadata.context).toBe(testContext);
    });

    it('should have proper prototype chain for instanceof checks', () => {
      const error = new TestError('Test error', testContext);

      expect(error instanceof Error).toBe(true);
      expect(error instanceof TetherError).toBe(true);
      expect(error instanceof TestError).toBe(true);
    });

    it('should format error for logging', () => {
      const error = new TestError('Test error', testContext);

      expect(error.toLogFormat()).toMatchObject({
        name: 'TestError',
        message: 'Test error',
        code: 'TEST_ERROR',
        severity: ErrorSeverity.MEDIUM,
        correlationId: testContext.correlationId,
        operation: 'test_operation',
        component: 'test_component',
        data: { path: 'a\\b.txt' },
      });
    });
  });

  describe('NotFoundError', () => {
    it('should use filesystem defaults', () => {
      const error = new NotFoundError('missing', testContext, { data: { path: 'x.txt' } });

      expect(error.code).toBe('NOT_FOUND');
      expect(error.metadata.category).toBe(ErrorCategory.FILESYSTEM);
      expect(error.isRetryable()).toBe(false);
      expect(error.path).toBe('x.txt');
    });
  });

  describe('IOFailureError', () => {
    it('should keep the platform code', () => {
      const cause = new Error('permission denied');
      const error = new IOFailureError('write failed', testContext, {
        platformCode: 'EACCES',
        cause,
      });

      expect(error.code).toBe('IO_FAILURE');
      expect(error.platformCode).toBe('EACCES');
      expect(error.metadata.data).toEqual({ platformCode: 'EACCES' });
      expect(error.metadata.cause).toBe(cause);
      expect(error.metadata.retryClassification).toBe(
        RetryClassification.CONDITIONALLY_RETRYABLE
      );
    });

    it('should allow the device category', () => {
      const error = new IOFailureError('transport failed', testContext, {
        category: ErrorCategory.DEVICE,
      });

      expect(error.metadata.category).toBe(ErrorCategory.DEVICE);
      expect(error.platformCode).toBeUndefined();
    });
  });

  describe('UnknownBackendError and ConfigurationError', () => {
    it('should be critical', () => {
      expect(new UnknownBackendError('no backend', testContext).metadata.severity).toBe(
        ErrorSeverity.CRITICAL
      );
      expect(new ConfigurationError('bad config', testContext).code).toBe('CONFIGURATION_ERROR');
    });
  });
});
