/**
 * Error context utilities for correlation tracking and operation context
 */

import { randomUUID } from 'crypto';

import type { ErrorContext } from './types.js';

export interface ErrorContextOptions {
  operation?: string;
  component?: string;
  metadata?: Record<string, unknown>;
  correlationId?: string;
}

/**
 * Context manager for tracking operations and generating correlation IDs
 */
export class ErrorContextManager {
  private static instance: ErrorContextManager | undefined;
  private contextStack: ErrorContext[] = [];
  private currentContext: ErrorContext | null = null;

  private constructor() {}

  static getInstance(): ErrorContextManager {
    if (!ErrorContextManager.instance) {
      ErrorContextManager.instance = new ErrorContextManager();
    }
    return ErrorContextManager.instance;
  }

  static generateCorrelationId(): string {
    return randomUUID();
  }

  static createContext(options: ErrorContextOptions): ErrorContext {
    const context: ErrorContext = {
      correlationId: options.correlationId || ErrorContextManager.generateCorrelationId(),
      timestamp: new Date(),
    };

    if (options.operation !== undefined) {
      context.operation = options.operation;
    }
    if (options.component !== undefined) {
      context.component = options.component;
    }
    if (options.metadata !== undefined) {
      context.metadata = options.metadata;
    }

    return context;
  }

  getCurrentContext(): ErrorContext | null {
    return this.currentContext;
  }

  /**
   * Push a new context onto the stack (for nested operations)
   */
  pushContext(context: ErrorContext): void {
    if (this.currentContext) {
      this.contextStack.push(this.currentContext);
    }
    this.currentContext = context;
  }

  popContext(): ErrorContext | null {
    const previousContext = this.contextStack.pop();
    this.currentContext = previousContext ?? null;
    return this.currentContext;
  }

  clearContext(): void {
    this.currentContext = null;
    this.contextStack = [];
  }
}

/**
 * Run an operation with an error context pushed for its duration
 */
export async function runWithErrorContext<T>(
  operation: () => Promise<T>,
  contextOptions: ErrorContextOptions
): Promise<T> {
  const contextManager = ErrorContextManager.getInstance();
  contextManager.pushContext(ErrorContextManager.createContext(contextOptions));

  try {
    return await operation();
  } finally {
    contextManager.popContext();
  }
}

/**
 * Current error context, or a fresh one built from the fallback options
 */
export function getCurrentErrorContext(fallbackOptions: ErrorContextOptions = {}): ErrorContext {
  const currentContext = ErrorContextManager.getInstance().getCurrentContext();
  if (currentContext) {
    return currentContext;
  }

  return ErrorContextManager.createContext({
    ...fallbackOptions,
    operation: fallbackOptions.operation || 'unknown',
  });
}
