// User agent sent to the supplier site

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (compatible; SupplierWatch/1.0; price and stock monitor)';
