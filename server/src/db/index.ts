/**
 * Store bootstrap
 *
 * Usage:
 *   import { openDocumentStore } from './db/index.js';
 *
 *   const store = await openDocumentStore(env);
 *   const app = createApp({ store, config: env });
 */

import { hasDatabaseConfig } from '../config/env.js';
import type { Env } from '../config/env.js';
import { storeLogger } from '../utils/logger.js';
import { MongoDocumentStore } from './mongoStore.js';
import { UnavailableStore } from './unavailableStore.js';
import type { DocumentStore } from './store.js';

/**
 * Connect to the configured database. Never rejects: a missing configuration
 * or a failed connection yields an UnavailableStore instead.
 */
export async function openDocumentStore(config: Env): Promise<DocumentStore> {
    if (!hasDatabaseConfig(config)) {
        storeLogger.warn('DATABASE_URL or DATABASE_NAME not set, running without a database');
        return new UnavailableStore('DATABASE_URL and DATABASE_NAME must both be set');
    }

    try {
        return await MongoDocumentStore.connect(config.DATABASE_URL, config.DATABASE_NAME);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        storeLogger.error({ err: error }, 'Database connection failed, running without a database');
        return new UnavailableStore(reason);
    }
}

export { COLLECTIONS } from './collections.js';
export type { CollectionName } from './collections.js';
export type { DocumentStore, ListOptions, StoredRecord, StoreStatus } from './store.js';
