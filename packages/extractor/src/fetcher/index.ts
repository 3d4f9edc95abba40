// Fetcher exports
export { fetchHttp } from './http';
export { SupplierSession } from './session';
export { CookieJar } from './cookies';
export { FetchError } from './errors';
export { DEFAULT_USER_AGENT } from './user-agents';
export type { FetchResult, FetchOptions, HttpMethod, PageResponse } from './types';
export type { SessionOptions } from './session';
