import type { ErrorCode } from '@supplier-watch/shared';
import type { FetchResult } from './types';

/**
 * A page could not be retrieved: transport failure, HTTP error status or
 * redirect loop. Extraction never throws this; only fetching does.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    readonly url: string,
    readonly httpStatus: number | null = null,
  ) {
    super(message);
    this.name = 'FetchError';
  }

  static fromResult(result: FetchResult): FetchError {
    return new FetchError(
      result.errorDetail ?? 'Fetch failed',
      result.errorCode ?? 'UNKNOWN',
      result.url,
      result.httpStatus,
    );
  }
}
