// Base error types
export { BaseError } from './BaseError';
export type { ErrorContext, ErrorDetails, ErrorSeverity, SerializedError } from './BaseError';

// Specific error classes
export { ValidationError } from './ValidationError';
export type { ValidationIssue } from './ValidationError';

export { ExternalServiceError } from './ExternalServiceError';
export type { ExternalService } from './ExternalServiceError';

// Utility functions
export { createCorrelationId, sanitizeErrorMessage, formatErrorForLogging } from './utils';
