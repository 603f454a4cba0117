/**
 * src/utils/errorHandler.ts
 *
 * Centralized error handling utility for the collection engine.
 * Provides error categorization, user-facing messages, history and logging.
 */

import { CollectionFetchError, type CollectionErrorKind } from '@/core/collections/errors';
import { logAppError, logAppWarn } from '@/core/logging/appLogClient';

export enum ErrorCategory {
  NETWORK = 'NETWORK',
  PERMISSION = 'PERMISSION',
  VALIDATION = 'VALIDATION',
  TIMEOUT = 'TIMEOUT',
  UNKNOWN = 'UNKNOWN',
}

export enum ErrorSeverity {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}

export interface ErrorDetails {
  message: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  originalError?: unknown;
  context?: Record<string, unknown>;
  timestamp: Date;
  retryable: boolean;
  userMessage?: string;
  technicalMessage?: string;
  suggestions?: string[];
}

export interface ErrorHandlerOptions {
  enableLogging?: boolean;
  logToApp?: boolean;
  defaultSeverity?: ErrorSeverity;
  customHandlers?: Map<ErrorCategory, (error: ErrorDetails) => void>;
}

const CATEGORY_BY_KIND: Record<CollectionErrorKind, ErrorCategory> = {
  network: ErrorCategory.NETWORK,
  timeout: ErrorCategory.TIMEOUT,
  permission: ErrorCategory.PERMISSION,
  malformed: ErrorCategory.VALIDATION,
};

const LOG_SOURCE = 'ErrorHandler';

export class ErrorHandler {
  private readonly options: ErrorHandlerOptions;
  private errorListeners: Set<(error: ErrorDetails) => void> = new Set();
  private errorHistory: ErrorDetails[] = [];
  private readonly maxHistorySize = 100;

  constructor(options: ErrorHandlerOptions = {}) {
    this.options = {
      enableLogging: true,
      logToApp: true,
      defaultSeverity: ErrorSeverity.ERROR,
      ...options,
    };
  }

  /**
   * Collection fetch errors carry their own kind; anything else is reported
   * as UNKNOWN and never retryable.
   */
  private categorizeError(error: unknown): ErrorCategory {
    if (error instanceof CollectionFetchError) {
      return CATEGORY_BY_KIND[error.kind];
    }
    return ErrorCategory.UNKNOWN;
  }

  private isRetryable(error: unknown): boolean {
    return error instanceof CollectionFetchError && error.retryable;
  }

  private getUserMessage(category: ErrorCategory, originalMessage: string): string {
    switch (category) {
      case ErrorCategory.NETWORK:
        return 'Unable to reach the collection service. Showing the last known collections.';
      case ErrorCategory.PERMISSION:
        return 'You do not have access to these collections.';
      case ErrorCategory.VALIDATION:
        return 'The collection service returned data that could not be read.';
      case ErrorCategory.TIMEOUT:
        return 'Loading collections timed out. Please try again.';
      default:
        return originalMessage || 'An unexpected error occurred.';
    }
  }

  private getSuggestions(category: ErrorCategory): string[] {
    switch (category) {
      case ErrorCategory.NETWORK:
        return ['Check your internet connection', 'Pull to refresh once you are back online'];
      case ErrorCategory.PERMISSION:
        return ['Ask an administrator for access to this collection'];
      case ErrorCategory.TIMEOUT:
        return ['Retry the refresh', 'Check if the connection is slow'];
      default:
        return [];
    }
  }

  private getErrorString(error: unknown): string {
    if (typeof error === 'string') return error;
    if (error instanceof Error) return error.message;
    if (error && typeof error === 'object' && 'message' in error) {
      return String(error.message);
    }
    return String(error);
  }

  private getSeverity(category: ErrorCategory): ErrorSeverity {
    switch (category) {
      case ErrorCategory.NETWORK:
      case ErrorCategory.TIMEOUT:
        return ErrorSeverity.WARNING;
      case ErrorCategory.PERMISSION:
      case ErrorCategory.VALIDATION:
        return ErrorSeverity.ERROR;
      default:
        return this.options.defaultSeverity || ErrorSeverity.ERROR;
    }
  }

  /**
   * Main error handling method
   */
  public handle(
    error: unknown,
    context?: Record<string, unknown>,
    customMessage?: string
  ): ErrorDetails {
    const errorString = this.getErrorString(error);
    const category = this.categorizeError(error);

    const errorDetails: ErrorDetails = {
      message: errorString,
      category,
      severity: this.getSeverity(category),
      originalError: error,
      context,
      timestamp: new Date(),
      retryable: this.isRetryable(error),
      userMessage: customMessage || this.getUserMessage(category, errorString),
      technicalMessage: errorString,
      suggestions: this.getSuggestions(category),
    };

    this.logError(errorDetails);

    // Permission failures are resolved by re-evaluating identity, not by notifying the user.
    const suppressNotification = category === ErrorCategory.PERMISSION;

    if (!suppressNotification) {
      this.addToHistory(errorDetails);
      this.notifyListeners(errorDetails);
    }

    const customHandler = this.options.customHandlers?.get(category);
    if (customHandler) {
      customHandler(errorDetails);
    }

    return errorDetails;
  }

  private logError(error: ErrorDetails): void {
    if (!this.options.enableLogging || !this.options.logToApp) return;

    const scope = typeof error.context?.scope === 'string' ? error.context.scope : null;
    const source = scope ? `${LOG_SOURCE}:${scope}` : LOG_SOURCE;
    const line = `[${error.severity.toUpperCase()}] ${error.category}: ${error.technicalMessage}`;
    if (error.severity === ErrorSeverity.INFO || error.severity === ErrorSeverity.WARNING) {
      logAppWarn(line, source);
    } else {
      logAppError(line, source);
    }
  }

  private addToHistory(error: ErrorDetails): void {
    this.errorHistory.push(error);
    if (this.errorHistory.length > this.maxHistorySize) {
      this.errorHistory.shift();
    }
  }

  /**
   * Subscribe to error events
   */
  public subscribe(listener: (error: ErrorDetails) => void): () => void {
    this.errorListeners.add(listener);
    return () => this.errorListeners.delete(listener);
  }

  private notifyListeners(error: ErrorDetails): void {
    this.errorListeners.forEach((listener) => listener(error));
  }

  public getHistory(): ErrorDetails[] {
    return [...this.errorHistory];
  }

  /**
   * Create a scoped error handler for specific contexts
   */
  public createScoped(contextName: string): ScopedErrorHandler {
    return new ScopedErrorHandler(this, contextName);
  }
}

/**
 * Scoped error handler for specific contexts
 */
export class ScopedErrorHandler {
  constructor(
    private parent: ErrorHandler,
    private contextName: string
  ) {}

  handle(error: unknown, additionalContext?: Record<string, unknown>, customMessage?: string) {
    return this.parent.handle(
      error,
      {
        scope: this.contextName,
        ...additionalContext,
      },
      customMessage
    );
  }
}

// Create and export singleton instance
export const errorHandler = new ErrorHandler();

// Export convenience functions
export const subscribeToErrors = errorHandler.subscribe.bind(errorHandler);
