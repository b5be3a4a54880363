import { Router } from 'express';
import { AiLogoRequestSchema } from '@jersey-studio/shared';
import { typedRoute } from '../middleware/asyncHandler.js';
import { generateLogo } from '../services/aiLogoService.js';

const router: Router = Router();

// Placeholder logo + placement suggestions
router.post('/logo', ...typedRoute(AiLogoRequestSchema, async (req, res) => {
    res.json(generateLogo(req.validatedBody));
}));

export default router;
