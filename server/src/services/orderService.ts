/**
 * Order Service
 *
 * Order status follows Confirmed → In Production → QC → Shipped, but updates
 * are not guarded: any of the four statuses may overwrite any other, and
 * re-setting the current status is a no-op success.
 */

import type { OrderStatus } from '@jersey-studio/shared';
import { COLLECTIONS } from '../db/collections.js';
import type { DocumentStore, StoredRecord } from '../db/store.js';
import { NotFoundError } from '../utils/errors.js';
import { orderLogger } from '../utils/logger.js';

export async function getOrder(store: DocumentStore, orderId: string): Promise<StoredRecord> {
    const order = await store.findById(COLLECTIONS.orders, orderId);
    if (!order) {
        throw new NotFoundError('Not found', COLLECTIONS.orders, orderId);
    }
    return order;
}

/** Newest orders first */
export function listOrders(store: DocumentStore, limit: number): Promise<StoredRecord[]> {
    return store.list(COLLECTIONS.orders, { newestFirst: true, limit });
}

/**
 * Overwrite the order status. An id that matches no order is not an error.
 */
export async function updateOrderStatus(store: DocumentStore, orderId: string, status: OrderStatus): Promise<void> {
    const matched = await store.updateById(COLLECTIONS.orders, orderId, { status });
    if (matched) {
        orderLogger.info({ orderId, status }, 'Order status updated');
    } else {
        orderLogger.warn({ orderId, status }, 'Status update matched no order');
    }
}
