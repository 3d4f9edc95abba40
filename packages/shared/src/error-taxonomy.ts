/**
 * Error Taxonomy - Human-readable error titles and recommendations
 *
 * Maps internal error codes to operator-facing messages.
 */

import type { ErrorCode } from './domain';

export interface ErrorInfo {
  title: string;
  recommendation: string;
}

export const ERROR_TAXONOMY: Record<ErrorCode, ErrorInfo> = {
  // Fetch errors
  FETCH_TIMEOUT: {
    title: 'Request Timeout',
    recommendation: 'Increase REQUEST_TIMEOUT_MS or check if the site is slow.',
  },
  FETCH_DNS: {
    title: 'DNS Error',
    recommendation: 'Check that the product URL is correct.',
  },
  FETCH_CONNECTION: {
    title: 'Connection Failed',
    recommendation: 'The site may be down or blocking connections.',
  },
  FETCH_TLS: {
    title: 'SSL/TLS Error',
    recommendation: 'The site may have an invalid SSL certificate.',
  },
  FETCH_HTTP_4XX: {
    title: 'Client Error',
    recommendation: 'Check if the product page still exists or if the login expired.',
  },
  FETCH_HTTP_5XX: {
    title: 'Server Error',
    recommendation: 'The next scheduled run will try again.',
  },
  FETCH_TOO_MANY_REDIRECTS: {
    title: 'Redirect Loop',
    recommendation: 'Check the URL; a login redirect loop usually means the session was rejected.',
  },

  UNKNOWN: {
    title: 'Unknown Error',
    recommendation: 'Check the worker logs.',
  },
};

/**
 * Get error info for an error code
 */
export function getErrorInfo(errorCode: ErrorCode | null): ErrorInfo | null {
  if (!errorCode) return null;
  return ERROR_TAXONOMY[errorCode];
}

/**
 * Title and recommendation on one line, for logs
 */
export function getErrorMessage(errorCode: ErrorCode | null): string {
  const info = getErrorInfo(errorCode);
  if (!info) return '';
  return `${info.title}: ${info.recommendation}`;
}
