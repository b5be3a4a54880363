import { Router } from 'express';
import { PaymentIdParamSchema, UpdatePaymentStatusSchema } from '@jersey-studio/shared';
import { typedRouteWithParams } from '../middleware/asyncHandler.js';
import { getPaymentIntent, updatePaymentStatus } from '../services/paymentService.js';

const router: Router = Router();

// Get single payment intent
router.get('/:payment_id', ...typedRouteWithParams(PaymentIdParamSchema, null, async (req, res) => {
    res.json(await getPaymentIntent(req.store, req.params.payment_id));
}));

// Simulated gateway callback
router.post('/:payment_id/status', ...typedRouteWithParams(PaymentIdParamSchema, UpdatePaymentStatusSchema, async (req, res) => {
    await updatePaymentStatus(req.store, req.params.payment_id, req.validatedBody.status);
    res.json({ ok: true });
}));

export default router;
