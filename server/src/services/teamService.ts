/**
 * Team Service
 *
 * Roster import from CSV and team lookup.
 */

import { TeamSchema } from '@jersey-studio/shared';
import type { ImportTeamFields } from '@jersey-studio/shared';
import { COLLECTIONS } from '../db/collections.js';
import type { DocumentStore, StoredRecord } from '../db/store.js';
import { NotFoundError } from '../utils/errors.js';
import { teamLogger } from '../utils/logger.js';
import { parseRosterCsv } from './rosterImport/parseRosterCsv.js';

export interface TeamImportResult {
    id: string;
    count: number;
}

/**
 * Parse the roster file and persist it as a new team.
 * Nothing is written unless every row parses.
 */
export async function importTeamRoster(
    store: DocumentStore,
    fields: ImportTeamFields,
    csvContent: Uint8Array
): Promise<TeamImportResult> {
    const roster = parseRosterCsv(csvContent);
    const team = TeamSchema.parse({
        team_name: fields.team_name,
        sport: fields.sport,
        roster,
    });

    const id = await store.create(COLLECTIONS.teams, team);
    teamLogger.info({ id, count: roster.length }, 'Team roster imported');
    return { id, count: roster.length };
}

export async function getTeam(store: DocumentStore, teamId: string): Promise<StoredRecord> {
    const team = await store.findById(COLLECTIONS.teams, teamId);
    if (!team) {
        throw new NotFoundError('Team not found', COLLECTIONS.teams, teamId);
    }
    return team;
}
