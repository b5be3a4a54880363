/**
 * Shared Zod schemas for the jersey storefront
 *
 * One module per aggregate. The JSON Schema registry is in ./registry.ts
 */

// Re-export common schemas (base schemas without circular dependencies)
export * from './common.js';

// Re-export domain schemas
export * from './catalog.js';
export * from './teams.js';
export * from './orders.js';
export * from './payments.js';
export * from './admin.js';
export * from './ai.js';
export * from './registry.js';
