/**
 * HTTP GET with a per-attempt timeout and exponential backoff.
 * Every outcome comes back as a FetchResult; nothing is thrown to the caller.
 */

import axios, { AxiosInstance } from 'axios';
import { createLogger } from '../../lib/logger';
import { ExternalService, ExternalServiceError, createCorrelationId } from '../errors';
import { FetchResult } from '../types/result';
import { RetryPolicy, DEFAULT_RETRY_POLICY, backoffDelay } from './RetryPolicy';

const logger = createLogger('RetryingFetcher');

const USER_AGENT = 'Token-MarketCap-Bot/1.0';

// ERR_CANCELED comes from the per-attempt abort signal
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']);

export type HttpTransport = Pick<AxiosInstance, 'get'>;
export type QueryParams = Record<string, string | number>;

export interface RetryingFetcherOptions {
  policy?: RetryPolicy;
  /** Defaults to a fresh axios instance */
  transport?: HttpTransport;
  /** Defaults to a setTimeout-based delay */
  sleep?: (ms: number) => Promise<void>;
}

export class RetryingFetcher {
  private readonly policy: RetryPolicy;
  private readonly transport: HttpTransport;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly service: ExternalService,
    options: RetryingFetcherOptions = {}
  ) {
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.transport = options.transport ?? axios.create();
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
  }

  /**
   * GET `url` and parse the body as JSON.
   * Non-200 responses and transport errors are retried up to the policy's
   * attempt budget; a body that is not JSON fails at once. Each attempt is
   * aborted once `timeoutMs` has passed, however slowly the body arrives.
   */
  async fetch(url: string, params?: QueryParams): Promise<FetchResult<unknown>> {
    const correlationId = createCorrelationId();
    const maxAttempts = Math.max(1, this.policy.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      logger.info({ correlationId, service: this.service, url, attempt, maxAttempts }, 'HTTP request attempt');

      const result = await this.attempt(url, params, attempt, correlationId);

      if (result.ok) {
        return result;
      }

      if (!result.error.isRetryable || attempt >= maxAttempts) {
        logger.error(
          {
            correlationId,
            service: this.service,
            url,
            attempts: attempt,
            status: result.error.responseStatus,
            error: result.error.message,
          },
          'HTTP request failed'
        );
        return result;
      }

      const delay = backoffDelay(this.policy, attempt);
      logger.warn(
        { correlationId, service: this.service, url, attempt, maxAttempts, delay, error: result.error.message },
        'Request failed, retrying'
      );
      await this.sleep(delay);
    }
  }

  private async attempt(
    url: string,
    params: QueryParams | undefined,
    attempt: number,
    correlationId: string
  ): Promise<FetchResult<unknown>> {
    const context = { correlationId, operation: 'http.get', metadata: { attempts: attempt } };

    let status: number;
    let body: unknown;
    try {
      const response = await this.transport.get<string>(url, {
        params,
        timeout: this.policy.timeoutMs,
        // Bounds the whole attempt, including a body that streams in slowly
        signal: AbortSignal.timeout(this.policy.timeoutMs),
        headers: {
          'User-Agent': USER_AGENT,
          Accept: 'application/json',
        },
        responseType: 'text',
        // Keep the raw body; JSON parsing is done below so failures are visible
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });
      status = response.status;
      body = response.data;
    } catch (error) {
      return FetchResult.failure(this.transportError(error, url, context));
    }

    if (status !== 200) {
      return FetchResult.failure(ExternalServiceError.httpStatus(this.service, url, status, context));
    }

    try {
      const data: unknown = typeof body === 'string' ? JSON.parse(body) : body;
      logger.debug({ correlationId, service: this.service, url, status }, 'HTTP request succeeded');
      return FetchResult.success(data, status);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      return FetchResult.failure(
        ExternalServiceError.invalidResponse(this.service, url, 'body is not valid JSON', context, cause)
      );
    }
  }

  private transportError(
    error: unknown,
    url: string,
    context: { correlationId: string; operation: string; metadata: { attempts: number } }
  ): ExternalServiceError {
    const cause = error instanceof Error ? error : new Error(String(error));

    if (axios.isCancel(error) || (axios.isAxiosError(error) && TIMEOUT_CODES.has(error.code ?? ''))) {
      return ExternalServiceError.timeout(this.service, url, this.policy.timeoutMs, context, cause);
    }

    return ExternalServiceError.connectionFailed(this.service, url, context, cause);
  }
}
