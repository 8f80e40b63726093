import { ValidatedConfiguration as Configuration } from '../../config/validated';
import type { HttpConfig } from '../../config/types';

/**
 * Retry behavior for a single remote read
 */
export interface RetryPolicy {
  /** Total attempts, including the first one */
  readonly maxAttempts: number;
  /** Delay before the second attempt; doubles for each attempt after that */
  readonly backoffFactorMs: number;
  /** Timeout applied to each attempt on its own */
  readonly timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffFactorMs: 500,
  timeoutMs: 10000,
};

/**
 * Delay to wait after a failed attempt before the next one
 * @param attempt The 1-based number of the attempt that just failed
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.backoffFactorMs * Math.pow(2, attempt - 1);
}

/**
 * Retry policy built from the HTTP section of the configuration
 */
export function retryPolicyFromConfig(http: HttpConfig = Configuration.http): RetryPolicy {
  return {
    maxAttempts: http.maxAttempts,
    backoffFactorMs: http.backoffFactor,
    timeoutMs: http.timeout,
  };
}
