/**
 * Shutdown Coordinator
 *
 * Runs registered cleanup steps when the process is asked to stop.
 * Steps run one at a time in registration order, so the HTTP server stops
 * taking requests before the database connection it depends on is closed.
 */

import logger from './logger.js';

// ============================================
// TYPE DEFINITIONS
// ============================================

/**
 * Registered shutdown handler
 */
interface ShutdownHandler {
    name: string;
    handler: () => Promise<void> | void;
    timeout: number;
}

export interface ShutdownResult {
    name: string;
    success: boolean;
    error?: string;
    duration: number;
}

const TIMED_OUT = Symbol('timedOut');

// ============================================
// SHUTDOWN COORDINATOR CLASS
// ============================================

export class ShutdownCoordinator {
    private handlers: Map<string, ShutdownHandler> = new Map();
    private isShuttingDown = false;

    /**
     * Register a shutdown handler
     * @param name - Unique identifier for the handler
     * @param handler - Async function to call on shutdown
     * @param timeout - Max time to wait for handler (ms), default 10s
     */
    register(name: string, handler: () => Promise<void> | void, timeout = 10000): void {
        if (this.handlers.has(name)) {
            logger.warn({ name }, 'Shutdown handler already registered, replacing');
        }

        this.handlers.set(name, { name, handler, timeout });
        logger.debug({ name, timeout }, 'Shutdown handler registered');
    }

    /**
     * Check if shutdown is in progress
     */
    isInProgress(): boolean {
        return this.isShuttingDown;
    }

    /**
     * Execute all shutdown handlers in order.
     * A failing or slow handler is logged and does not stop the rest.
     */
    async shutdown(): Promise<ShutdownResult[]> {
        if (this.isShuttingDown) {
            logger.warn('Shutdown already in progress');
            return [];
        }

        this.isShuttingDown = true;
        logger.info({ handlerCount: this.handlers.size }, 'Starting graceful shutdown');

        const results: ShutdownResult[] = [];

        for (const { name, handler, timeout } of this.handlers.values()) {
            const start = Date.now();
            let timer: NodeJS.Timeout | undefined;

            try {
                const outcome = await Promise.race([
                    Promise.resolve().then(handler),
                    new Promise<typeof TIMED_OUT>((resolve) => {
                        timer = setTimeout(() => resolve(TIMED_OUT), timeout);
                    }),
                ]);
                const duration = Date.now() - start;

                if (outcome === TIMED_OUT) {
                    logger.warn({ name, timeout, duration }, 'Shutdown handler timed out');
                    results.push({ name, success: false, error: 'Timeout', duration });
                } else {
                    logger.debug({ name, duration }, 'Shutdown handler completed');
                    results.push({ name, success: true, duration });
                }
            } catch (error: unknown) {
                const duration = Date.now() - start;
                const errorMsg = error instanceof Error ? error.message : 'Unknown error';
                logger.error({ name, error: errorMsg, duration }, 'Shutdown handler failed');
                results.push({ name, success: false, error: errorMsg, duration });
            } finally {
                clearTimeout(timer);
            }
        }

        const successful = results.filter(r => r.success).length;
        logger.info({ successful, failed: results.length - successful, total: results.length }, 'Shutdown complete');
        return results;
    }
}

// Export singleton instance
export const shutdownCoordinator = new ShutdownCoordinator();
export default shutdownCoordinator;
