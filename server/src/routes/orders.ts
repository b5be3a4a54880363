/**
 * Order Routes
 *
 * Ids are validated before any storage access: a malformed id is a 400,
 * a well-formed id with no order behind it is a 404.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    ListOrdersQuerySchema,
    OrderIdParamSchema,
    UpdateOrderStatusSchema,
} from '@jersey-studio/shared';
import { asyncHandler, typedRouteWithParams } from '../middleware/asyncHandler.js';
import { getOrder, listOrders, updateOrderStatus } from '../services/orderService.js';
import { ValidationError } from '../utils/errors.js';

const router: Router = Router();

// List orders, newest first
router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const query = ListOrdersQuerySchema.safeParse(req.query);
    if (!query.success) {
        throw ValidationError.fromIssues(query.error.issues);
    }
    res.json(await listOrders(req.store, query.data.limit));
}));

// Get single order
router.get('/:order_id', ...typedRouteWithParams(OrderIdParamSchema, null, async (req, res) => {
    res.json(await getOrder(req.store, req.params.order_id));
}));

// Update production status (Confirmed → In Production → QC → Shipped)
router.post('/:order_id/status', ...typedRouteWithParams(OrderIdParamSchema, UpdateOrderStatusSchema, async (req, res) => {
    await updateOrderStatus(req.store, req.params.order_id, req.validatedBody.status);
    res.json({ ok: true });
}));

export default router;
