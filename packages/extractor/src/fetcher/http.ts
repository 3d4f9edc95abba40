// HTTP fetcher using undici
import { request } from 'undici';
import { gunzipSync, inflateSync, brotliDecompressSync } from 'zlib';
import type { FetchResult, FetchOptions } from './types';
import { DEFAULT_USER_AGENT } from './user-agents';

/**
 * Decompress response body based on Content-Encoding header
 */
function decompressBody(buffer: Buffer, encoding: string | null): string {
  if (!encoding) {
    return buffer.toString('utf-8');
  }

  const enc = encoding.toLowerCase().trim();

  try {
    if (enc === 'gzip' || enc === 'x-gzip') {
      return gunzipSync(buffer).toString('utf-8');
    } else if (enc === 'deflate') {
      return inflateSync(buffer).toString('utf-8');
    } else if (enc === 'br') {
      return brotliDecompressSync(buffer).toString('utf-8');
    }
    // identity or unknown encoding, use raw
    return buffer.toString('utf-8');
  } catch {
    // Decompression failed, return as-is
    return buffer.toString('utf-8');
  }
}

function errorCodeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

const DEFAULT_TIMEOUT = 15000;

/**
 * Perform one HTTP request with error classification and timing capture.
 * Never throws; failures are reported through `errorCode`.
 */
export async function fetchHttp(options: FetchOptions): Promise<FetchResult> {
  const startTime = Date.now();
  const {
    url,
    method = 'GET',
    body,
    timeout = DEFAULT_TIMEOUT,
    userAgent = DEFAULT_USER_AGENT,
    headers = {},
    cookies,
  } = options;

  // Prepare headers
  const requestHeaders: Record<string, string> = {
    'User-Agent': userAgent,
    'Accept-Encoding': 'gzip, deflate, br',
    ...headers,
  };

  if (cookies) {
    requestHeaders['Cookie'] = cookies;
  }

  const result: FetchResult = {
    success: false,
    url,
    httpStatus: null,
    html: null,
    errorCode: null,
    errorDetail: null,
    timings: {
      total: 0,
    },
    setCookies: [],
    location: null,
  };

  try {
    const response = await request(url, {
      method,
      body,
      headers: requestHeaders,
      maxRedirections: 0,
      headersTimeout: timeout,
      bodyTimeout: timeout,
    });

    result.httpStatus = response.statusCode;

    const headerValue = (name: string): string | null => {
      const value = response.headers[name];
      if (Array.isArray(value)) return value.join(', ');
      return value ?? null;
    };

    const rawSetCookie = response.headers['set-cookie'];
    if (typeof rawSetCookie === 'string') {
      result.setCookies = [rawSetCookie];
    } else if (Array.isArray(rawSetCookie)) {
      result.setCookies = rawSetCookie;
    }

    const location = headerValue('location');
    if (response.statusCode >= 300 && response.statusCode < 400 && location) {
      result.location = new URL(location, url).toString();
    }

    // Read body even on error for debugging
    const buffer = Buffer.from(await response.body.arrayBuffer());
    result.html = decompressBody(buffer, headerValue('content-encoding'));
    result.timings.total = Date.now() - startTime;

    // Handle HTTP status codes
    if (response.statusCode >= 400 && response.statusCode < 500) {
      result.errorCode = 'FETCH_HTTP_4XX';
      result.errorDetail = `HTTP ${response.statusCode}`;
      return result;
    }

    if (response.statusCode >= 500) {
      result.errorCode = 'FETCH_HTTP_5XX';
      result.errorDetail = `HTTP ${response.statusCode}`;
      return result;
    }

    result.success = true;
    return result;

  } catch (error) {
    result.timings.total = Date.now() - startTime;

    const code = errorCodeOf(error);
    const message = error instanceof Error ? error.message : String(error);

    // Classify errors
    if (code === 'UND_ERR_CONNECT_TIMEOUT' || code === 'UND_ERR_HEADERS_TIMEOUT' || code === 'UND_ERR_BODY_TIMEOUT') {
      result.errorCode = 'FETCH_TIMEOUT';
      result.errorDetail = `Request timeout after ${timeout}ms`;
    } else if (code === 'ENOTFOUND' || code === 'EAI_AGAIN') {
      result.errorCode = 'FETCH_DNS';
      result.errorDetail = `DNS lookup failed: ${message}`;
    } else if (code?.startsWith('ERR_TLS') || code === 'CERT_HAS_EXPIRED' || code === 'DEPTH_ZERO_SELF_SIGNED_CERT') {
      result.errorCode = 'FETCH_TLS';
      result.errorDetail = `TLS error: ${code} - ${message}`;
    } else if (
      code === 'ECONNREFUSED' ||
      code === 'ECONNRESET' ||
      code === 'ETIMEDOUT' ||
      code === 'EPIPE' ||
      code === 'EHOSTUNREACH' ||
      code === 'ENETUNREACH'
    ) {
      result.errorCode = 'FETCH_CONNECTION';
      result.errorDetail = `Connection failed: ${code} - ${message}`;
    } else {
      // Generic connection error for unknown cases
      result.errorCode = 'FETCH_CONNECTION';
      result.errorDetail = `Fetch failed: ${message}`;
    }

    return result;
  }
}
