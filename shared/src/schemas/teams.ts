/**
 * Team and roster schemas
 */

import { z } from 'zod';
import { jerseySizeSchema } from './common.js';

export const TeamRosterEntrySchema = z.object({
  name: z.string(),
  number: z.string(),
  size: jerseySizeSchema,
});

export type TeamRosterEntry = z.infer<typeof TeamRosterEntrySchema>;

export const TeamSchema = z.object({
  team_name: z.string(),
  sport: z.string(),
  roster: z.array(TeamRosterEntrySchema).default([]),
  logo_url: z.string().nullish(),
  sponsor_logo_url: z.string().nullish(),
});

export type Team = z.infer<typeof TeamSchema>;

/** Form fields sent alongside the roster CSV upload */
export const ImportTeamFieldsSchema = z.object({
  team_name: z.string({ required_error: 'team_name is required' }).min(1, 'team_name is required'),
  sport: z.string({ required_error: 'sport is required' }).min(1, 'sport is required'),
});

export type ImportTeamFields = z.infer<typeof ImportTeamFieldsSchema>;
