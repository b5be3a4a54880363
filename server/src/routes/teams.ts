/**
 * Team Routes
 *
 * Roster import takes multipart/form-data: team_name, sport, and the roster
 * file in the `csv` field.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import multer from 'multer';
import { ImportTeamFieldsSchema, objectIdSchema } from '@jersey-studio/shared';
import { z } from 'zod';
import { asyncHandler, typedRouteWithParams } from '../middleware/asyncHandler.js';
import { getTeam, importTeamRoster } from '../services/teamService.js';
import { ValidationError } from '../utils/errors.js';

// Configure multer for file upload (in memory)
const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: 5 * 1024 * 1024 }, // 5MB limit
});

const TeamIdParamSchema = z.object({ team_id: objectIdSchema });

const router: Router = Router();

/**
 * Import a team roster from CSV
 * @route POST /api/team/import
 * @returns {Object} { id, count }
 */
router.post('/import', upload.single('csv'), asyncHandler(async (req: Request, res: Response) => {
    const fields = ImportTeamFieldsSchema.safeParse(req.body);
    if (!fields.success) {
        throw ValidationError.fromIssues(fields.error.issues);
    }
    if (!req.file) {
        throw new ValidationError('No CSV file uploaded (expected form field "csv")');
    }

    const result = await importTeamRoster(req.store, fields.data, req.file.buffer);
    res.json(result);
}));

// Get single team
router.get('/:team_id', ...typedRouteWithParams(TeamIdParamSchema, null, async (req, res) => {
    res.json(await getTeam(req.store, req.params.team_id));
}));

export default router;
