/**
 * Order Pricing - Shared Domain Layer
 *
 * Resolves the pricing tier for a checkout quantity and computes the order
 * amount. Pure functions, no DB access: the caller loads the tiers.
 *
 * A tier applies when its min_quantity is at or below the requested quantity.
 * Among applicable tiers the one with the highest min_quantity wins, so the
 * tiers act as quantity brackets rather than discounts to pick from.
 *
 * @module domain/orders/pricing
 */

import { FALLBACK_PRICING_TIER } from '../constants.js';

// ============================================
// TYPES
// ============================================

/**
 * Minimal tier interface for pricing.
 * Uses duck typing so both stored records and parsed schemas fit.
 */
export interface TierBracket {
  name: string;
  base_price: number;
  min_quantity: number;
}

export interface PricingQuote {
  /** Name of the resolved tier (or the fallback tier) */
  tierName: string;
  unitPrice: number;
  quantity: number;
  /** unitPrice × quantity, rounded to 2 decimals */
  amount: number;
  /** True when no stored tier matched */
  isFallback: boolean;
}

// ============================================
// RESOLVER
// ============================================

/**
 * Select the tier with the greatest min_quantity that is <= quantity.
 * Ties keep the earliest tier in the given order.
 */
export function selectPricingTier<T extends TierBracket>(
  tiers: readonly T[],
  quantity: number
): T | null {
  let best: T | null = null;
  for (const tier of tiers) {
    if (tier.min_quantity > quantity) continue;
    if (best === null || tier.min_quantity > best.min_quantity) {
      best = tier;
    }
  }
  return best;
}

export function quoteOrder(tiers: readonly TierBracket[], quantity: number): PricingQuote {
  const tier = selectPricingTier(tiers, quantity);
  const resolved = tier ?? FALLBACK_PRICING_TIER;

  return {
    tierName: resolved.name,
    unitPrice: resolved.base_price,
    quantity,
    amount: roundTo2(resolved.base_price * quantity),
    isFallback: tier === null,
  };
}

// ============================================
// HELPERS
// ============================================

export function roundTo2(n: number): number {
  return Math.round(n * 100) / 100;
}
