/**
 * Orders Domain
 */

export * from './pricing.js';
