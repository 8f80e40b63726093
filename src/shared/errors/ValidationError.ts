import { z } from 'zod';
import { BaseError, ErrorDetails } from './BaseError';

export interface ValidationIssue {
  field: string;
  constraint: string;
  message: string;
}

export class ValidationError extends BaseError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = [], context?: ErrorDetails['context']) {
    super({
      code: 'VALIDATION_ERROR',
      message,
      statusCode: 400,
      context,
      isRetryable: false,
      severity: 'medium',
    });

    this.issues = issues;
  }

  static fromZodError(zodError: z.ZodError, context?: ErrorDetails['context']): ValidationError {
    const issues: ValidationIssue[] = zodError.issues.map(issue => ({
      field: issue.path.join('.'),
      constraint: issue.code,
      message: issue.message,
    }));

    const message = `Validation failed: ${issues.map(i => (i.field ? `${i.field}: ${i.message}` : i.message)).join(', ')}`;

    return new ValidationError(message, issues, context);
  }
}
