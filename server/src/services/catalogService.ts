/**
 * Catalog Service
 *
 * Jersey templates and pricing tiers. Inputs arrive already validated by the
 * route schemas; this layer only persists and reads.
 */

import type { JerseyTemplate, PricingTier } from '@jersey-studio/shared';
import { COLLECTIONS } from '../db/collections.js';
import type { DocumentStore, StoredRecord } from '../db/store.js';
import { catalogLogger } from '../utils/logger.js';

export async function createTemplate(store: DocumentStore, template: JerseyTemplate): Promise<string> {
    const id = await store.create(COLLECTIONS.templates, template);
    catalogLogger.info({ id, sport: template.sport }, 'Template created');
    return id;
}

export function listTemplates(store: DocumentStore): Promise<StoredRecord[]> {
    return store.list(COLLECTIONS.templates);
}

export async function createPricingTier(store: DocumentStore, tier: PricingTier): Promise<string> {
    const id = await store.create(COLLECTIONS.pricingTiers, tier);
    catalogLogger.info({ id, name: tier.name, minQuantity: tier.min_quantity }, 'Pricing tier created');
    return id;
}

export function listPricingTiers(store: DocumentStore): Promise<StoredRecord[]> {
    return store.list(COLLECTIONS.pricingTiers);
}
