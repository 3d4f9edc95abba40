import * as cheerio from 'cheerio';
import type { AuthStatus, Credentials, LoginConfig } from '@supplier-watch/shared';
import type { SupplierSession } from '../fetcher/session';
import { KeywordAuthVerifier, type AuthVerifier } from './verifier';
import { authLogger } from '../utils/logger';

/**
 * Name/value pairs of the hidden inputs of a page (CSRF tokens and the like)
 */
export function getHiddenInputs(html: string): Record<string, string> {
  const $ = cheerio.load(html);
  const data: Record<string, string> = {};

  $('input[type=hidden]').each((_, input) => {
    const name = $(input).attr('name');
    if (name) {
      data[name] = $(input).attr('value') ?? '';
    }
  });

  return data;
}

/**
 * Log in through the storefront form.
 *
 * 1. GET the login page and collect its hidden inputs
 * 2. POST them with the credentials to `postUrl`
 * 3. GET the login page again and let the verifier judge it
 *
 * Any fetch error along the way gives `failed`.
 */
export async function login(
  session: SupplierSession,
  config: LoginConfig,
  credentials: Credentials,
  verifier: AuthVerifier = new KeywordAuthVerifier(config.successMarkers, config.failureMarkers),
): Promise<AuthStatus> {
  try {
    const loginPage = await session.get(config.loginPage);

    const payload = getHiddenInputs(loginPage.html);
    payload[config.userField] = credentials.username;
    payload[config.passField] = credentials.password;

    await session.postForm(config.postUrl, payload);

    const check = await session.get(config.loginPage);
    const status = verifier.verify(check.html);

    if (status === 'confirmed') {
      authLogger.info('Login confirmed');
    } else if (status === 'unconfirmed') {
      authLogger.warn('Could not confirm login; pages may still be readable without it');
    } else {
      authLogger.error('Login rejected by the supplier');
    }

    return status;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    authLogger.error(`Login request failed: ${message}`, error instanceof Error ? error : undefined);
    return 'failed';
  }
}
