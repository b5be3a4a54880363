import { Router } from 'express';
import type { Request, Response } from 'express';
import { JerseyTemplateSchema } from '@jersey-studio/shared';
import { asyncHandler, typedRoute } from '../middleware/asyncHandler.js';
import { createTemplate, listTemplates } from '../services/catalogService.js';

const router: Router = Router();

// List templates
router.get('/', asyncHandler(async (req: Request, res: Response) => {
    res.json(await listTemplates(req.store));
}));

// Create template
router.post('/', ...typedRoute(JerseyTemplateSchema, async (req, res) => {
    const id = await createTemplate(req.store, req.validatedBody);
    res.json({ id });
}));

export default router;
