/**
 * Backend diagnostics for GET /test
 *
 * Reports whether the database answers and which database variables are
 * present. Never fails: problems are reported in the body.
 */

import type { Env } from '../config/env.js';
import type { DocumentStore } from '../db/store.js';

export interface DiagnosticsReport {
    backend: 'running';
    database: string;
    connection_status: 'Connected' | 'Not Connected';
    collections: string[];
    database_url: 'set' | 'not set';
    database_name: 'set' | 'not set';
}

function presence(value: string | undefined): 'set' | 'not set' {
    return value ? 'set' : 'not set';
}

export async function runDiagnostics(store: DocumentStore, config: Env): Promise<DiagnosticsReport> {
    const status = await store.status();

    return {
        backend: 'running',
        database: status.connected ? 'available' : `unavailable: ${status.error ?? 'unknown error'}`,
        connection_status: status.connected ? 'Connected' : 'Not Connected',
        collections: status.collections,
        database_url: presence(config.DATABASE_URL),
        database_name: presence(config.DATABASE_NAME),
    };
}
