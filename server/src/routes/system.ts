/**
 * System routes: liveness, schema registry, diagnostics
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { SCHEMAS_REGISTRY } from '@jersey-studio/shared';
import type { Env } from '../config/env.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { runDiagnostics } from '../services/diagnostics.js';

export function createSystemRouter(config: Env): Router {
    const router: Router = Router();

    router.get('/', (_req: Request, res: Response) => {
        res.json({ message: 'Jersey Studio backend is running' });
    });

    // Entity JSON schemas for schema-driven tooling
    router.get('/schema', (_req: Request, res: Response) => {
        res.json(SCHEMAS_REGISTRY);
    });

    router.get('/test', asyncHandler(async (req: Request, res: Response) => {
        res.json(await runDiagnostics(req.store, config));
    }));

    return router;
}
