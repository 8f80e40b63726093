export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface ErrorContext {
  correlationId?: string;
  operation?: string;
  timestamp?: Date;
  metadata?: Record<string, unknown>;
}

export interface ErrorDetails {
  code: string;
  message: string;
  statusCode: number;
  context?: ErrorContext;
  cause?: Error;
  isRetryable?: boolean;
  severity: ErrorSeverity;
}

export interface SerializedError {
  name: string;
  code: string;
  message: string;
  statusCode: number;
  isRetryable: boolean;
  severity: ErrorSeverity;
  timestamp: string;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string; stack?: string };
  [extra: string]: unknown;
}

export abstract class BaseError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;
  public readonly isRetryable: boolean;
  public readonly severity: ErrorSeverity;
  public readonly timestamp: Date;

  constructor(details: ErrorDetails) {
    super(details.message);

    this.name = this.constructor.name;
    this.code = details.code;
    this.statusCode = details.statusCode;
    this.context = details.context;
    this.cause = details.cause;
    this.isRetryable = details.isRetryable ?? false;
    this.severity = details.severity;
    this.timestamp = details.context?.timestamp ?? new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      isRetryable: this.isRetryable,
      severity: this.severity,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }

  /**
   * Get error for logging (with full context)
   */
  toLogFormat(): { error: SerializedError; level: string } {
    return {
      error: this.toJSON(),
      level: this.getLogLevel(),
    };
  }

  /**
   * Get log level based on severity
   */
  private getLogLevel(): string {
    switch (this.severity) {
      case 'low':
        return 'info';
      case 'medium':
        return 'warn';
      case 'high':
        return 'error';
      case 'critical':
        return 'fatal';
    }
  }
}
