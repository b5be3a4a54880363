/**
 * Payment Service
 *
 * Payments are simulated: there is no gateway. A status update on a payment
 * intent stands in for the gateway callback, and a final outcome (paid or
 * failed) is mirrored onto the linked order's payment_status.
 */

import { objectIdSchema } from '@jersey-studio/shared';
import type { OrderPaymentStatus, PaymentIntentStatus } from '@jersey-studio/shared';
import { COLLECTIONS } from '../db/collections.js';
import type { DocumentStore, StoredRecord } from '../db/store.js';
import { NotFoundError } from '../utils/errors.js';
import { paymentLogger } from '../utils/logger.js';

const ORDER_PAYMENT_STATUS: Partial<Record<PaymentIntentStatus, OrderPaymentStatus>> = {
    paid: 'paid',
    failed: 'failed',
};

export async function getPaymentIntent(store: DocumentStore, paymentId: string): Promise<StoredRecord> {
    const payment = await store.findById(COLLECTIONS.paymentIntents, paymentId);
    if (!payment) {
        throw new NotFoundError('Payment not found', COLLECTIONS.paymentIntents, paymentId);
    }
    return payment;
}

export async function updatePaymentStatus(
    store: DocumentStore,
    paymentId: string,
    status: PaymentIntentStatus
): Promise<void> {
    const payment = await getPaymentIntent(store, paymentId);
    await store.updateById(COLLECTIONS.paymentIntents, paymentId, { status });

    const orderPaymentStatus = ORDER_PAYMENT_STATUS[status];
    const orderId = objectIdSchema.safeParse(payment.order_id);
    if (orderPaymentStatus && orderId.success) {
        await store.updateById(COLLECTIONS.orders, orderId.data, { payment_status: orderPaymentStatus });
    }

    paymentLogger.info({ paymentId, status, orderId: payment.order_id }, 'Payment status updated');
}
