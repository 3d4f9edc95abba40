// Domain types for Supplier Watch - price and stock monitoring

export type ErrorCode =
  // Fetch errors
  | "FETCH_TIMEOUT" | "FETCH_DNS" | "FETCH_CONNECTION" | "FETCH_TLS" | "FETCH_HTTP_4XX" | "FETCH_HTTP_5XX"
  | "FETCH_TOO_MANY_REDIRECTS"
  // Unknown
  | "UNKNOWN";

/**
 * How one field of a product page is located.
 * Every part is optional; a rule with none of them always resolves to nothing.
 */
export interface ExtractionRule {
  /** CSS selector of the node holding the value */
  selector?: string;
  /** Pattern searched in the selected node's text; group 1 is the value */
  selectorRegex?: string;
  /** Pattern searched in the whole raw HTML when no node was selected */
  fallbackRegex?: string;
}

export interface ProductRule {
  url: string;
  name: string;
  price: ExtractionRule;
  stock: ExtractionRule;
  /** Locale of the price text, e.g. "pt-PT" or "en-US" */
  priceLocale?: string;
}

export interface PriceFormat {
  decimalSeparator: ',' | '.';
  thousandSeparators: string[];
  currencyTokens: string[];
}

/**
 * One product's observed state at one point in time.
 */
export interface Snapshot {
  url: string;
  name: string;
  price: number | null;
  rawPrice: string | null;
  stock: string | null;
}

export type ChangeEvent =
  | { kind: "new_record" }
  | { kind: "price_changed"; previous: number | null; current: number | null }
  | { kind: "stock_changed"; previous: string | null; current: string | null };

// Authentication
export type AuthStatus = "confirmed" | "unconfirmed" | "failed";

/** What to do when the login could not be confirmed */
export type UnconfirmedLoginPolicy = "continue" | "abort";

export interface LoginConfig {
  loginPage: string;
  postUrl: string;
  userField: string;
  passField: string;
  /** Page text that confirms the session is logged in */
  successMarkers: string[];
  /** Page text that means the credentials were rejected */
  failureMarkers: string[];
  onUnconfirmed: UnconfirmedLoginPolicy;
}

export interface Credentials {
  username: string;
  password: string;
}

export interface SupplierConfig {
  /** Display name of the supplier used in notifications */
  label: string;
  login: LoginConfig;
  products: ProductRule[];
}
