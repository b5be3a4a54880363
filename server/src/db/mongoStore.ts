/**
 * MongoDB-backed DocumentStore
 *
 * Uses a dedicated mongoose connection and talks to the native collections
 * directly: entity shapes are enforced by the zod schemas before anything
 * reaches this layer, so no mongoose models are registered.
 */

import mongoose from 'mongoose';
import type { Connection, mongo } from 'mongoose';
import { storeLogger } from '../utils/logger.js';
import { StorageError } from '../utils/errors.js';
import type { CollectionName } from './collections.js';
import {
    STATUS_COLLECTION_LIMIT,
    toInsertable,
} from './store.js';
import type {
    DocumentStore,
    ListOptions,
    StoredRecord,
    StoreStatus,
} from './store.js';

/** Give up on an unreachable server instead of buffering forever */
const SERVER_SELECTION_TIMEOUT_MS = 5000;

/**
 * Convert a raw Mongo document into a StoredRecord (`_id` → `id`)
 */
export function toStoredRecord(doc: mongo.Document): StoredRecord {
    const { _id, ...fields } = doc;
    return { ...fields, id: String(_id) };
}

function toStorageError(action: string, error: unknown): StorageError {
    const original = error instanceof Error ? error : null;
    const reason = original ? original.message : String(error);
    return new StorageError(`Failed to ${action}: ${reason}`, original);
}

export class MongoDocumentStore implements DocumentStore {
    constructor(private readonly connection: Connection) {}

    /**
     * Open a connection and wait until the server answers.
     * @throws StorageError when the server cannot be reached
     */
    static async connect(url: string, dbName: string): Promise<MongoDocumentStore> {
        const connection = mongoose.createConnection(url, {
            dbName,
            serverSelectionTimeoutMS: SERVER_SELECTION_TIMEOUT_MS,
        });

        try {
            await connection.asPromise();
        } catch (error) {
            await connection.close().catch((closeError: unknown) => {
                storeLogger.warn({ err: closeError }, 'Failed to close aborted connection');
            });
            throw toStorageError('connect to database', error);
        }

        storeLogger.info({ dbName }, 'Connected to MongoDB');
        return new MongoDocumentStore(connection);
    }

    private database(): mongo.Db {
        const db = this.connection.db;
        if (!db) {
            throw new StorageError('Database connection is not open');
        }
        return db;
    }

    private collection(name: CollectionName): mongo.Collection {
        return this.database().collection(name);
    }

    private parseId(id: string): mongo.ObjectId {
        if (!mongoose.mongo.ObjectId.isValid(id)) {
            throw new StorageError(`Invalid document id: ${id}`);
        }
        return new mongoose.mongo.ObjectId(id);
    }

    async create(collection: CollectionName, entity: object): Promise<string> {
        const now = new Date();
        const doc = { ...toInsertable(entity), created_at: now, updated_at: now };

        try {
            const result = await this.collection(collection).insertOne(doc);
            return result.insertedId.toHexString();
        } catch (error) {
            storeLogger.error({ err: error, collection }, 'Insert failed');
            throw toStorageError(`insert into ${collection}`, error);
        }
    }

    async list(collection: CollectionName, options: ListOptions = {}): Promise<StoredRecord[]> {
        try {
            let cursor = this.collection(collection).find({});
            if (options.newestFirst) {
                cursor = cursor.sort({ _id: -1 });
            }
            if (options.limit !== undefined) {
                cursor = cursor.limit(options.limit);
            }
            const docs = await cursor.toArray();
            return docs.map(toStoredRecord);
        } catch (error) {
            storeLogger.error({ err: error, collection }, 'List failed');
            throw toStorageError(`read ${collection}`, error);
        }
    }

    async findById(collection: CollectionName, id: string): Promise<StoredRecord | null> {
        const _id = this.parseId(id);
        try {
            const doc = await this.collection(collection).findOne({ _id });
            return doc ? toStoredRecord(doc) : null;
        } catch (error) {
            storeLogger.error({ err: error, collection, id }, 'Lookup failed');
            throw toStorageError(`read ${collection}`, error);
        }
    }

    async updateById(collection: CollectionName, id: string, fields: Record<string, unknown>): Promise<boolean> {
        const _id = this.parseId(id);
        try {
            const result = await this.collection(collection).updateOne(
                { _id },
                { $set: { ...toInsertable(fields), updated_at: new Date() } }
            );
            return result.matchedCount > 0;
        } catch (error) {
            storeLogger.error({ err: error, collection, id }, 'Update failed');
            throw toStorageError(`update ${collection}`, error);
        }
    }

    async status(): Promise<StoreStatus> {
        try {
            const collections = await this.database()
                .listCollections({}, { nameOnly: true })
                .toArray();
            return {
                connected: true,
                collections: collections.map(c => c.name).slice(0, STATUS_COLLECTION_LIMIT),
            };
        } catch (error) {
            return {
                connected: false,
                collections: [],
                error: error instanceof Error ? error.message : String(error),
            };
        }
    }

    async close(): Promise<void> {
        await this.connection.close();
        storeLogger.info('MongoDB connection closed');
    }
}
