/**
 * @jersey-studio/shared - Shared schemas and domain logic
 *
 * Zod schemas (plus inferred types) for every stored entity and request
 * body, and the pure pricing logic used at checkout.
 */

export * from './schemas/index.js';
export * from './domain/index.js';
