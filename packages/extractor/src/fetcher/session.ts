// Cookie-keeping HTTP session for one supplier site
import { fetchHttp } from './http';
import { CookieJar } from './cookies';
import { FetchError } from './errors';
import { DEFAULT_USER_AGENT } from './user-agents';
import type { FetchResult, HttpMethod, PageResponse } from './types';
import { httpLogger } from '../utils/logger';

const MAX_REDIRECTS = 5;

export interface SessionOptions {
  userAgent?: string;
  timeout?: number;  // per request, default 15000ms
  maxRedirects?: number;  // default 5
}

/**
 * Sequential HTTP session: keeps cookies across requests and follows
 * redirects itself so cookies set on intermediate hops are not lost.
 *
 * Every method throws {@link FetchError} on transport failures and on
 * HTTP statuses >= 400.
 */
export class SupplierSession {
  readonly cookies = new CookieJar();
  private readonly userAgent: string;
  private readonly timeout: number | undefined;
  private readonly maxRedirects: number;

  constructor(options: SessionOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeout = options.timeout;
    this.maxRedirects = options.maxRedirects ?? MAX_REDIRECTS;
  }

  async get(url: string): Promise<PageResponse> {
    return this.send('GET', url);
  }

  /**
   * POST an application/x-www-form-urlencoded body
   */
  async postForm(url: string, fields: Record<string, string>): Promise<PageResponse> {
    return this.send('POST', url, new URLSearchParams(fields).toString());
  }

  /**
   * HTML of a page, for the extraction pipeline
   */
  async fetchDocument(url: string): Promise<string> {
    const page = await this.get(url);
    return page.html;
  }

  private async send(method: HttpMethod, url: string, body?: string): Promise<PageResponse> {
    let currentMethod = method;
    let currentUrl = url;
    let currentBody = body;

    for (let hop = 0; hop <= this.maxRedirects; hop++) {
      const headers: Record<string, string> = {};
      if (currentBody !== undefined) {
        headers['Content-Type'] = 'application/x-www-form-urlencoded';
      }

      const result = await fetchHttp({
        url: currentUrl,
        method: currentMethod,
        body: currentBody,
        timeout: this.timeout,
        userAgent: this.userAgent,
        headers,
        cookies: this.cookies.getCookieHeader(currentUrl),
      });

      this.cookies.setCookies(result.setCookies, currentUrl);
      httpLogger.debug(`${currentMethod} ${currentUrl} -> ${result.httpStatus ?? result.errorCode} (${result.timings.total}ms)`);

      if (!result.success) {
        throw FetchError.fromResult(result);
      }

      if (!result.location) {
        return toPage(result);
      }

      // 307/308 repeat the request as-is, other redirects become a GET
      if (result.httpStatus !== 307 && result.httpStatus !== 308) {
        currentMethod = 'GET';
        currentBody = undefined;
      }
      currentUrl = result.location;
    }

    throw new FetchError(
      `Stopped after ${this.maxRedirects} redirects`,
      'FETCH_TOO_MANY_REDIRECTS',
      url,
    );
  }
}

function toPage(result: FetchResult): PageResponse {
  return {
    url: result.url,
    status: result.httpStatus ?? 0,
    html: result.html ?? '',
  };
}
