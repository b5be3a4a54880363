/**
 * Server entry point
 *
 * Acquires the database connection, starts the HTTP server, and releases
 * both on SIGINT/SIGTERM.
 */

import { env } from './config/env.js';
import { createApp, listen } from './app.js';
import { openDocumentStore } from './db/index.js';
import logger from './utils/logger.js';
import { shutdownCoordinator } from './utils/shutdownCoordinator.js';

async function main(): Promise<void> {
    const store = await openDocumentStore(env);
    const app = createApp({ store, config: env });

    const server = await listen(app, env.PORT);
    server.on('error', (error) => {
        logger.error({ err: error }, 'HTTP server error');
    });
    logger.info({ port: env.PORT, env: env.NODE_ENV }, 'Server listening');

    shutdownCoordinator.register('http-server', () => new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    }));
    shutdownCoordinator.register('document-store', () => store.close());

    const stop = (signal: NodeJS.Signals): void => {
        logger.info({ signal }, 'Shutdown signal received');
        shutdownCoordinator.shutdown()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.fatal({ err: error }, 'Shutdown failed');
                process.exit(1);
            });
    };

    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
}

main().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Server failed to start');
    process.exit(1);
});
