import { Router } from 'express';
import { CheckoutRequestSchema } from '@jersey-studio/shared';
import { typedRoute } from '../middleware/asyncHandler.js';
import { checkout } from '../services/checkoutService.js';

const router: Router = Router();

/**
 * Create an order and its payment intent
 * @route POST /api/checkout
 * @returns {Object} { order_id, payment_id, amount, currency }
 */
router.post('/', ...typedRoute(CheckoutRequestSchema, async (req, res) => {
    res.json(await checkout(req.store, req.validatedBody));
}));

export default router;
