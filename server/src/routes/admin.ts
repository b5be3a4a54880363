/**
 * Admin Routes
 *
 * Pricing tier management. Unauthenticated, like every other route.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { PricingTierSchema } from '@jersey-studio/shared';
import { asyncHandler, typedRoute } from '../middleware/asyncHandler.js';
import { createPricingTier, listPricingTiers } from '../services/catalogService.js';

const router: Router = Router();

router.post('/tiers', ...typedRoute(PricingTierSchema, async (req, res) => {
    const id = await createPricingTier(req.store, req.validatedBody);
    res.json({ id });
}));

router.get('/tiers', asyncHandler(async (req: Request, res: Response) => {
    res.json(await listPricingTiers(req.store));
}));

export default router;
