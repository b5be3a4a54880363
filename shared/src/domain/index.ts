/**
 * Domain Layer
 *
 * Core business logic kept out of the routes.
 * Shared between the Express server and any client that needs a price preview.
 */

export * from './constants.js';
export * from './orders/index.js';
