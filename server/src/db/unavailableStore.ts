/**
 * Degraded-mode store
 *
 * Stands in when the database is not configured or could not be reached at
 * startup. The API keeps serving the routes that need no storage, and
 * every data operation fails with a StorageError carrying the reason.
 */

import { StorageError } from '../utils/errors.js';
import type { CollectionName } from './collections.js';
import type { DocumentStore, ListOptions, StoredRecord, StoreStatus } from './store.js';

export class UnavailableStore implements DocumentStore {
    constructor(readonly reason: string) {}

    private fail(): never {
        throw new StorageError(`Database not available: ${this.reason}`);
    }

    async create(_collection: CollectionName, _entity: object): Promise<string> {
        this.fail();
    }

    async list(_collection: CollectionName, _options?: ListOptions): Promise<StoredRecord[]> {
        this.fail();
    }

    async findById(_collection: CollectionName, _id: string): Promise<StoredRecord | null> {
        this.fail();
    }

    async updateById(_collection: CollectionName, _id: string, _fields: Record<string, unknown>): Promise<boolean> {
        this.fail();
    }

    async status(): Promise<StoreStatus> {
        return { connected: false, collections: [], error: this.reason };
    }

    async close(): Promise<void> {
        // nothing to release
    }
}
