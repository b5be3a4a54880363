/**
 * Document Store Accessor
 *
 * The narrow persistence surface every service goes through. One instance is
 * created at startup and injected into the Express app (see app.ts), so
 * handlers never reach for a module-level client.
 *
 * Implementations must raise StorageError for any failure of the underlying
 * store. Single-document writes rely on the store's own atomicity; nothing
 * here spans documents.
 */

import type { CollectionName } from './collections.js';

/** A stored document as callers see it: the internal key surfaced as `id` */
export interface StoredRecord {
    id: string;
    [field: string]: unknown;
}

export interface ListOptions {
    /** Reverse insertion order */
    newestFirst?: boolean;
    limit?: number;
}

export interface StoreStatus {
    connected: boolean;
    /** First few collection names, when connected */
    collections: string[];
    error?: string;
}

export interface DocumentStore {
    /** Insert an entity and return its newly assigned id */
    create(collection: CollectionName, entity: object): Promise<string>;
    list(collection: CollectionName, options?: ListOptions): Promise<StoredRecord[]>;
    findById(collection: CollectionName, id: string): Promise<StoredRecord | null>;
    /** Overwrite the given fields; resolves false when no record has that id */
    updateById(collection: CollectionName, id: string, fields: Record<string, unknown>): Promise<boolean>;
    /** Connectivity report for diagnostics. Never rejects. */
    status(): Promise<StoreStatus>;
    close(): Promise<void>;
}

/** Max collection names reported by status() */
export const STATUS_COLLECTION_LIMIT = 10;

/**
 * Copy an entity for insertion, dropping identifier fields the caller may
 * have carried over.
 */
export function toInsertable(entity: object): Record<string, unknown> {
    const fields: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(entity)) {
        if (key === '_id' || key === 'id') continue;
        fields[key] = value;
    }
    return fields;
}
