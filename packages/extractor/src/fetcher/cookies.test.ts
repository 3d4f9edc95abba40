import { CookieJar } from './cookies';

describe('CookieJar', () => {
  const now = Date.UTC(2026, 0, 1);

  it('should send host-only cookies to the same host only', () => {
    const jar = new CookieJar();
    jar.setCookies(['sid=abc; Path=/; HttpOnly'], 'https://shop.test/login', now);

    expect(jar.getCookieHeader('https://shop.test/produto/1', now)).toBe('sid=abc');
    expect(jar.getCookieHeader('https://cdn.shop.test/', now)).toBeUndefined();
  });

  it('should send domain cookies to subdomains', () => {
    const jar = new CookieJar();
    jar.setCookies(['lang=pt; Domain=.shop.test'], 'https://www.shop.test/', now);

    expect(jar.getCookieHeader('https://shop.test/', now)).toBe('lang=pt');
    expect(jar.getCookieHeader('https://b2b.shop.test/', now)).toBe('lang=pt');
    expect(jar.getCookieHeader('https://othershop.test/', now)).toBeUndefined();
  });

  it('should replace a cookie with the same name', () => {
    const jar = new CookieJar();
    jar.setCookies(['sid=old'], 'https://shop.test/', now);
    jar.setCookies(['sid=new', 'cart=1'], 'https://shop.test/', now);

    expect(jar.getCookieHeader('https://shop.test/', now)).toBe('sid=new; cart=1');
    expect(jar.size).toBe(2);
  });

  it('should delete cookies expired by Max-Age or Expires', () => {
    const jar = new CookieJar();
    jar.setCookies(['sid=abc', 'cart=1'], 'https://shop.test/', now);
    jar.setCookies(
      ['sid=; Max-Age=0', 'cart=; Expires=Thu, 01 Jan 1970 00:00:00 GMT'],
      'https://shop.test/',
      now,
    );

    expect(jar.getCookieHeader('https://shop.test/', now)).toBeUndefined();
  });

  it('should drop cookies once their Max-Age elapses', () => {
    const jar = new CookieJar();
    jar.setCookies(['token=t1; Max-Age=60'], 'https://shop.test/', now);

    expect(jar.getCookieHeader('https://shop.test/', now + 59_000)).toBe('token=t1');
    expect(jar.getCookieHeader('https://shop.test/', now + 60_000)).toBeUndefined();
  });

  it('should ignore malformed headers', () => {
    const jar = new CookieJar();
    jar.setCookies(['', 'novalue', '=anonymous'], 'https://shop.test/', now);

    expect(jar.size).toBe(0);
  });
});
