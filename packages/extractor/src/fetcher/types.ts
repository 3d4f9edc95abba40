// HTTP fetcher types
import type { ErrorCode } from '@supplier-watch/shared';

export type HttpMethod = 'GET' | 'POST';

/**
 * Result of a single HTTP exchange. Redirects are not followed here;
 * a 3xx comes back with `location` set.
 */
export interface FetchResult {
  success: boolean;
  url: string;
  httpStatus: number | null;
  html: string | null;
  errorCode: ErrorCode | null;
  errorDetail: string | null;
  timings: {
    total: number;
  };
  /** Raw Set-Cookie header values */
  setCookies: string[];
  /** Absolute redirect target for 3xx responses */
  location: string | null;
}

export interface FetchOptions {
  url: string;
  method?: HttpMethod;  // default GET
  body?: string;
  timeout?: number;  // default 15000ms
  userAgent?: string;
  headers?: Record<string, string>;
  cookies?: string;
}

/**
 * Final page reached by the session after following redirects
 */
export interface PageResponse {
  url: string;
  status: number;
  html: string;
}
