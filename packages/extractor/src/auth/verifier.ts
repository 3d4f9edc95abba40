import type { AuthStatus } from '@supplier-watch/shared';

/**
 * Decides from a page fetched after logging in whether the session is
 * authenticated
 */
export interface AuthVerifier {
  verify(html: string): AuthStatus;
}

export const DEFAULT_SUCCESS_MARKERS = ['minha conta', 'logout', 'sair'];

/**
 * Case-insensitive substring check of the page text.
 *
 * A failure marker (e.g. "palavra-passe incorreta") wins over success markers.
 * No marker at all gives `unconfirmed`: some storefronts show the same page
 * to everyone.
 */
export class KeywordAuthVerifier implements AuthVerifier {
  private readonly successMarkers: string[];
  private readonly failureMarkers: string[];

  constructor(
    successMarkers: string[] = DEFAULT_SUCCESS_MARKERS,
    failureMarkers: string[] = [],
  ) {
    this.successMarkers = successMarkers.map((marker) => marker.toLowerCase());
    this.failureMarkers = failureMarkers.map((marker) => marker.toLowerCase());
  }

  verify(html: string): AuthStatus {
    const page = html.toLowerCase();

    if (this.failureMarkers.some((marker) => page.includes(marker))) {
      return 'failed';
    }
    if (this.successMarkers.some((marker) => page.includes(marker))) {
      return 'confirmed';
    }
    return 'unconfirmed';
  }
}
