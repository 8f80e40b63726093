import type { ExternalServiceError } from '../errors';

export interface FetchSuccess<T> {
  readonly ok: true;
  readonly data: T;
  readonly status: number;
}

export interface FetchFailure {
  readonly ok: false;
  readonly error: ExternalServiceError;
}

/**
 * Outcome of one remote read. Failures are values, never thrown across the
 * fetcher boundary.
 */
export type FetchResult<T = unknown> = FetchSuccess<T> | FetchFailure;

export const FetchResult = {
  success<T>(data: T, status: number = 200): FetchSuccess<T> {
    return { ok: true, data, status };
  },

  failure(error: ExternalServiceError): FetchFailure {
    return { ok: false, error };
  },
};
