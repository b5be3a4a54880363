/**
 * Express application factory
 *
 * The document store is created by the caller and handed in, so the same
 * app runs against MongoDB in production and an in-memory store in tests.
 */

import type { Server } from 'node:http';
import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { Env } from './config/env.js';
import type { DocumentStore } from './db/store.js';
import { errorHandler } from './middleware/errorHandler.js';
import { requestLogger } from './utils/logger.js';
import { NotFoundError } from './utils/errors.js';
import { createSystemRouter } from './routes/system.js';
import templateRoutes from './routes/templates.js';
import teamRoutes from './routes/teams.js';
import aiRoutes from './routes/ai.js';
import checkoutRoutes from './routes/checkout.js';
import orderRoutes from './routes/orders.js';
import paymentRoutes from './routes/payments.js';
import adminRoutes from './routes/admin.js';

export interface AppDependencies {
    store: DocumentStore;
    config: Env;
}

export function createApp({ store, config }: AppDependencies): Express {
    const app = express();

    app.disable('x-powered-by');
    app.use(cors({ origin: config.CORS_ORIGIN ?? '*' }));
    app.use(express.json({ limit: '1mb' }));
    app.use(requestLogger);

    // Every handler reads the store from the request
    app.use((req: Request, _res: Response, next: NextFunction) => {
        req.store = store;
        next();
    });

    app.use('/', createSystemRouter(config));
    app.use('/api/templates', templateRoutes);
    app.use('/api/team', teamRoutes);
    app.use('/api/ai', aiRoutes);
    app.use('/api/checkout', checkoutRoutes);
    app.use('/api/orders', orderRoutes);
    app.use('/api/payments', paymentRoutes);
    app.use('/api/admin', adminRoutes);

    app.use((req: Request, _res: Response, next: NextFunction) => {
        next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
    });

    app.use(errorHandler);

    return app;
}

/**
 * Bind the app to a port. Rejects with the socket error (e.g. EADDRINUSE)
 * when the port cannot be bound.
 */
export function listen(app: Express, port: number, host?: string): Promise<Server> {
    return new Promise<Server>((resolve, reject) => {
        const server = host === undefined ? app.listen(port) : app.listen(port, host);
        server.once('error', reject);
        server.once('listening', () => {
            server.off('error', reject);
            resolve(server);
        });
    });
}
