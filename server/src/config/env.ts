/**
 * Centralized Environment Variable Validation
 *
 * This module validates ALL environment variables at startup using Zod.
 * If validation fails, the application will fail fast with clear error messages.
 *
 * USAGE:
 * - Import `env` for type-safe access: `import { env } from './config/env.js'`
 * - Tests build their own config with `parseEnv({ ... })`
 *
 * The database settings are optional on purpose: without them the API still
 * starts, reports the missing variables at GET /test, and every endpoint that
 * touches storage answers with a storage error.
 */

// Load dotenv FIRST - must happen before we access process.env
// This is necessary because ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z.object({
    // ----------------------------------------
    // DATABASE
    // ----------------------------------------

    /** MongoDB connection string */
    DATABASE_URL: z.string().min(1).optional(),

    /** MongoDB database name */
    DATABASE_NAME: z.string().min(1).optional(),

    // ----------------------------------------
    // SERVER
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Server port */
    PORT: z.coerce.number().int().positive().default(8000),

    /** Pino log level override */
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    /** CORS allowed origin; every origin is allowed when unset */
    CORS_ORIGIN: z.string().optional(),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Parse and validate environment variables.
 *
 * Prints every failing variable and exits the process when validation fails.
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const result = envSchema.safeParse(source);
    if (result.success) {
        return result.data;
    }

    const issues = result.error.issues.map(issue => {
        const path = issue.path.join('.');
        return `  - ${path}: ${issue.message}`;
    }).join('\n');

    console.error('Environment validation failed:\n' + issues);
    process.exit(1);
}

/** True when both database variables are present */
export function hasDatabaseConfig(config: Env): config is Env & { DATABASE_URL: string; DATABASE_NAME: string } {
    return Boolean(config.DATABASE_URL && config.DATABASE_NAME);
}

export const env = parseEnv();
