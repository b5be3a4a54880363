/**
 * JSON Schema registry
 *
 * Keyed by collection-style entity name. Served at GET /schema so that
 * schema-driven tooling (database viewers, form builders) can read the
 * entity shapes without importing this package.
 */

import { zodToJsonSchema } from 'zod-to-json-schema';
import { AdminUserSchema } from './admin.js';
import { JerseyTemplateSchema, PricingTierSchema } from './catalog.js';
import { JerseyDesignSchema, JerseyOrderSchema } from './orders.js';
import { PaymentIntentSchema } from './payments.js';
import { TeamRosterEntrySchema, TeamSchema } from './teams.js';

export const ENTITY_SCHEMAS = {
  pricingtier: PricingTierSchema,
  jerseytemplate: JerseyTemplateSchema,
  teamrosterentry: TeamRosterEntrySchema,
  team: TeamSchema,
  jerseydesign: JerseyDesignSchema,
  paymentintent: PaymentIntentSchema,
  jerseyorder: JerseyOrderSchema,
  adminuser: AdminUserSchema,
} as const;

export type EntityName = keyof typeof ENTITY_SCHEMAS;

export type JsonSchemaDocument = ReturnType<typeof zodToJsonSchema>;

export function buildSchemaRegistry(): Record<EntityName, JsonSchemaDocument> {
  return {
    pricingtier: zodToJsonSchema(PricingTierSchema),
    jerseytemplate: zodToJsonSchema(JerseyTemplateSchema),
    teamrosterentry: zodToJsonSchema(TeamRosterEntrySchema),
    team: zodToJsonSchema(TeamSchema),
    jerseydesign: zodToJsonSchema(JerseyDesignSchema),
    paymentintent: zodToJsonSchema(PaymentIntentSchema),
    jerseyorder: zodToJsonSchema(JerseyOrderSchema),
    adminuser: zodToJsonSchema(AdminUserSchema),
  };
}

export const SCHEMAS_REGISTRY = buildSchemaRegistry();
