/**
 * Domain Constants
 *
 * Business constants shared across client and server.
 * Centralizes magic numbers for maintainability.
 */

/** All checkout amounts are quoted in Indian rupees */
export const DEFAULT_CURRENCY = 'INR';

/**
 * Fallback tier used when no stored tier covers the requested quantity
 * (including when no tiers have been configured at all).
 */
export const FALLBACK_PRICING_TIER = {
  name: 'Starter',
  base_price: 999.0,
  min_quantity: 1,
} as const;

/** Default page size for order listings */
export const DEFAULT_ORDER_LIST_LIMIT = 50;
