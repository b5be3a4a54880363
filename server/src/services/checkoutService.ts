/**
 * Checkout Service
 *
 * Prices the order server-side from the stored tiers, records the order, then
 * opens a simulated payment intent for it. Client-supplied amounts are never
 * trusted; the request carries no amount at all.
 */

import {
    DEFAULT_CURRENCY,
    JerseyOrderSchema,
    PaymentIntentSchema,
    PricingTierSchema,
    quoteOrder,
} from '@jersey-studio/shared';
import type { CheckoutRequest, PricingQuote, PricingTier } from '@jersey-studio/shared';
import { COLLECTIONS } from '../db/collections.js';
import type { DocumentStore } from '../db/store.js';
import { orderLogger } from '../utils/logger.js';

export interface CheckoutResult {
    order_id: string;
    payment_id: string;
    amount: number;
    currency: typeof DEFAULT_CURRENCY;
}

/**
 * Read every stored tier, in store order.
 * Records that no longer match the tier schema are skipped.
 */
export async function loadPricingTiers(store: DocumentStore): Promise<PricingTier[]> {
    const records = await store.list(COLLECTIONS.pricingTiers);
    const tiers: PricingTier[] = [];

    for (const record of records) {
        const parsed = PricingTierSchema.safeParse(record);
        if (parsed.success) {
            tiers.push(parsed.data);
        } else {
            orderLogger.warn({ tierId: record.id }, 'Skipping malformed pricing tier');
        }
    }

    return tiers;
}

export async function quoteCheckout(store: DocumentStore, quantity: number): Promise<PricingQuote> {
    const tiers = await loadPricingTiers(store);
    return quoteOrder(tiers, quantity);
}

export async function checkout(store: DocumentStore, request: CheckoutRequest): Promise<CheckoutResult> {
    const quote = await quoteCheckout(store, request.quantity);

    const order = JerseyOrderSchema.parse({
        customer_name: request.customer_name,
        customer_email: request.customer_email,
        customer_phone: request.customer_phone,
        shipping_address: request.shipping_address,
        team_id: request.team_id,
        template_id: request.template_id,
        design: request.design,
        quantity: request.quantity,
        pricing_tier: quote.tierName,
        amount: quote.amount,
    });
    const orderId = await store.create(COLLECTIONS.orders, order);

    const payment = PaymentIntentSchema.parse({
        order_id: orderId,
        amount: quote.amount,
        currency: DEFAULT_CURRENCY,
        method: request.method,
    });
    const paymentId = await store.create(COLLECTIONS.paymentIntents, payment);

    orderLogger.info({
        orderId,
        paymentId,
        quantity: request.quantity,
        tier: quote.tierName,
        fallbackTier: quote.isFallback,
        amount: quote.amount,
    }, 'Checkout completed');

    return {
        order_id: orderId,
        payment_id: paymentId,
        amount: quote.amount,
        currency: DEFAULT_CURRENCY,
    };
}
