/**
 * Collection names. One collection per entity, named after the entity in
 * lower case.
 */
export const COLLECTIONS = {
    pricingTiers: 'pricingtier',
    templates: 'jerseytemplate',
    teams: 'team',
    orders: 'jerseyorder',
    paymentIntents: 'paymentintent',
} as const;

export type CollectionName = (typeof COLLECTIONS)[keyof typeof COLLECTIONS];
