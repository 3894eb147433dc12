/**
 * Centralized Environment Variable Validation
 *
 * Validates the environment with Zod. `getEnv()` fails fast with one line
 * per bad variable; `parseEnv()` throws instead so tests can feed their own map.
 *
 * USAGE:
 * - `import { getEnv } from './config/env.js'` and read `getEnv().ERP_API_URL`
 * - Services never read `process.env`; they receive the values they need
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add JSDoc comment explaining the variable
 * 3. Document it in .env.example
 */

// Load dotenv FIRST - must happen before we access process.env
// This is necessary because ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';
import { ERP_DEFAULT_BASE_URL, ERP_API_TIMEOUT_MS } from './sync/erp.js';

// ============================================
// SCHEMA DEFINITION
// ============================================

const booleanFlag = z.enum(['true', 'false']).default('false');

const envSchema = z.object({
    // ----------------------------------------
    // GENERAL
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Pino level override (trace, debug, info, warn, error, fatal, silent) */
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),

    /** Admin API port */
    PORT: z.coerce.number().int().positive().default(3001),

    /** PostgreSQL connection string; without it audit records go to AUDIT_LOG_PATH */
    DATABASE_URL: z.string().optional(),

    /** Bearer token for the admin API. The API refuses every request when unset */
    ADMIN_API_TOKEN: z.string().optional(),

    /** Disable the inbox poller (useful when running the API against production data) */
    DISABLE_BACKGROUND_WORKERS: booleanFlag,

    // ----------------------------------------
    // ERP INTEGRATION
    // ----------------------------------------

    /** ERP REST base URL */
    ERP_API_URL: z.string().url().default(ERP_DEFAULT_BASE_URL),

    /** ERP API key (basic auth username) */
    ERP_API_KEY: z.string().optional(),

    /** ERP API secret (basic auth password) */
    ERP_API_SECRET: z.string().optional(),

    /** Per-call timeout */
    ERP_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(ERP_API_TIMEOUT_MS),

    // ----------------------------------------
    // RETRY POLICY
    // ----------------------------------------

    RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    RETRY_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(1000),
    RETRY_BACKOFF_FACTOR: z.coerce.number().min(1).default(2),
    RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(60_000),

    // ----------------------------------------
    // ORDER LISTING CACHE
    // ----------------------------------------

    ORDER_CACHE_TTL_MS: z.coerce.number().int().min(0).default(60_000),
    ORDER_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(16),

    // ----------------------------------------
    // INBOX POLLER
    // ----------------------------------------

    POLL_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
    POLL_BATCH_SIZE: z.coerce.number().int().positive().default(50),
    POLL_CONCURRENCY: z.coerce.number().int().positive().default(4),

    // ----------------------------------------
    // AUDIT
    // ----------------------------------------

    /** JSON-lines audit file used when DATABASE_URL is not set */
    AUDIT_LOG_PATH: z.string().default('logs/reconciliation-attempts.jsonl'),
}).refine((value) => value.RETRY_MAX_DELAY_MS >= value.RETRY_INITIAL_DELAY_MS, {
    message: 'RETRY_MAX_DELAY_MS must be >= RETRY_INITIAL_DELAY_MS',
    path: ['RETRY_MAX_DELAY_MS'],
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

export function formatEnvIssues(error: z.ZodError): string {
    return error.issues.map(issue => {
        const path = issue.path.join('.');
        return `  - ${path}: ${issue.message}`;
    }).join('\n');
}

/**
 * Parse an environment map. Throws ZodError on invalid input.
 */
export function parseEnv(source: Record<string, string | undefined> = process.env): Env {
    return envSchema.parse(source);
}

let cachedEnv: Env | null = null;

/**
 * Parsed and validated process environment.
 * Exits the process on the first call if validation fails.
 */
export function getEnv(): Env {
    if (cachedEnv) return cachedEnv;
    try {
        cachedEnv = parseEnv(process.env);
        return cachedEnv;
    } catch (error) {
        if (error instanceof z.ZodError) {
            console.error('Environment validation failed:\n' + formatEnvIssues(error));
            process.exit(1);
        }
        throw error;
    }
}
