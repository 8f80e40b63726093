import { BaseError, ErrorDetails, ErrorSeverity, SerializedError } from './BaseError';

export type ExternalService = 'SUPPLY_API' | 'PRICE_API';

interface ClassificationOverrides {
  isRetryable?: boolean;
  severity?: ErrorSeverity;
}

export class ExternalServiceError extends BaseError {
  public readonly service: ExternalService;
  public readonly endpoint?: string;
  public readonly responseStatus?: number;
  public readonly attempts: number;

  constructor(
    service: ExternalService,
    message: string,
    endpoint?: string,
    responseStatus?: number,
    context?: ErrorDetails['context'],
    cause?: Error,
    overrides: ClassificationOverrides = {}
  ) {
    super({
      code: `${service}_ERROR`,
      message,
      statusCode: responseStatus ?? 502,
      context,
      cause,
      // Transport and status failures are retried; only a malformed body is final
      isRetryable: overrides.isRetryable ?? true,
      severity: overrides.severity ?? ExternalServiceError.getSeverityForStatus(responseStatus),
    });

    this.service = service;
    this.endpoint = endpoint;
    this.responseStatus = responseStatus;
    const attempts = context?.metadata?.attempts;
    this.attempts = typeof attempts === 'number' ? attempts : 1;
  }

  static httpStatus(
    service: ExternalService,
    endpoint: string,
    status: number,
    context?: ErrorDetails['context']
  ): ExternalServiceError {
    return new ExternalServiceError(service, `HTTP Error ${status} for ${endpoint}`, endpoint, status, context);
  }

  static timeout(
    service: ExternalService,
    endpoint: string,
    timeoutMs?: number,
    context?: ErrorDetails['context'],
    cause?: Error
  ): ExternalServiceError {
    return new ExternalServiceError(
      service,
      `${service} request timeout${timeoutMs ? ` (${timeoutMs}ms)` : ''}`,
      endpoint,
      408,
      { ...context, metadata: { ...context?.metadata, timeoutMs } },
      cause
    );
  }

  static connectionFailed(
    service: ExternalService,
    endpoint: string,
    context?: ErrorDetails['context'],
    cause?: Error
  ): ExternalServiceError {
    return new ExternalServiceError(
      service,
      `Failed to connect to ${service}${cause ? `: ${cause.message}` : ''}`,
      endpoint,
      undefined,
      context,
      cause
    );
  }

  static invalidResponse(
    service: ExternalService,
    endpoint: string,
    detail: string,
    context?: ErrorDetails['context'],
    cause?: Error
  ): ExternalServiceError {
    return new ExternalServiceError(
      service,
      `Invalid response from ${service}: ${detail}`,
      endpoint,
      undefined,
      context,
      cause,
      { isRetryable: false, severity: 'medium' }
    );
  }

  private static getSeverityForStatus(status?: number): ErrorSeverity {
    if (!status) return 'high'; // Network errors

    if (status >= 500) return 'high';
    if (status >= 400) return 'medium';
    return 'low';
  }

  toJSON(): SerializedError {
    return {
      ...super.toJSON(),
      service: this.service,
      endpoint: this.endpoint,
      responseStatus: this.responseStatus,
      attempts: this.attempts,
    };
  }
}
