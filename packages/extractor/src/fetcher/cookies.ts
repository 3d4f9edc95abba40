/**
 * In-memory cookie store for one session.
 *
 * Tracks name, value, domain and expiry from Set-Cookie headers; path and
 * secure attributes are not enforced since a session only talks to one site.
 */

interface StoredCookie {
  name: string;
  value: string;
  domain: string;
  hostOnly: boolean;
  expiresAt: number | null;
}

export class CookieJar {
  private cookies = new Map<string, StoredCookie>();

  /**
   * Store cookies from the Set-Cookie headers of a response to `url`
   */
  setCookies(setCookieHeaders: string[], url: string, now = Date.now()): void {
    const host = new URL(url).hostname.toLowerCase();

    for (const header of setCookieHeaders) {
      const cookie = parseSetCookie(header, host, now);
      if (!cookie) continue;

      const key = `${cookie.domain};${cookie.name}`;
      if (cookie.expiresAt !== null && cookie.expiresAt <= now) {
        this.cookies.delete(key);
      } else {
        this.cookies.set(key, cookie);
      }
    }
  }

  /**
   * Cookie header value for a request to `url`, or undefined when empty
   */
  getCookieHeader(url: string, now = Date.now()): string | undefined {
    const host = new URL(url).hostname.toLowerCase();
    const pairs: string[] = [];

    for (const [key, cookie] of this.cookies) {
      if (cookie.expiresAt !== null && cookie.expiresAt <= now) {
        this.cookies.delete(key);
        continue;
      }
      if (domainMatches(host, cookie)) {
        pairs.push(`${cookie.name}=${cookie.value}`);
      }
    }

    return pairs.length > 0 ? pairs.join('; ') : undefined;
  }

  get size(): number {
    return this.cookies.size;
  }
}

function domainMatches(host: string, cookie: StoredCookie): boolean {
  if (cookie.hostOnly) {
    return host === cookie.domain;
  }
  return host === cookie.domain || host.endsWith(`.${cookie.domain}`);
}

function parseSetCookie(header: string, host: string, now: number): StoredCookie | null {
  const [pair, ...attributes] = header.split(';');
  if (!pair) return null;

  const separator = pair.indexOf('=');
  if (separator <= 0) return null;

  const cookie: StoredCookie = {
    name: pair.slice(0, separator).trim(),
    value: pair.slice(separator + 1).trim(),
    domain: host,
    hostOnly: true,
    expiresAt: null,
  };

  let maxAgeSeen = false;
  for (const attribute of attributes) {
    const [rawName = '', ...rest] = attribute.split('=');
    const name = rawName.trim().toLowerCase();
    const value = rest.join('=').trim();

    if (name === 'domain' && value) {
      cookie.domain = value.replace(/^\./, '').toLowerCase();
      cookie.hostOnly = false;
    } else if (name === 'max-age') {
      const seconds = Number(value);
      if (Number.isFinite(seconds)) {
        cookie.expiresAt = now + seconds * 1000;
        maxAgeSeen = true;
      }
    } else if (name === 'expires' && !maxAgeSeen) {
      const time = Date.parse(value);
      if (!Number.isNaN(time)) {
        cookie.expiresAt = time;
      }
    }
  }

  return cookie;
}
