// src/types/express.d.ts
import type { DocumentStore } from '../db/store.js';

declare global {
    namespace Express {
        interface Request {
            /** Injected by createApp; shared by every request */
            store: DocumentStore;
            validatedBody?: unknown;
        }
    }
}

export {};
