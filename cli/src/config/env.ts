/**
 * Environment Variable Validation
 *
 * Validated once at startup with Zod. Import `env` instead of reading
 * `process.env` directly.
 */

// Load dotenv FIRST - ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z.object({
    /** Environment mode; also selects the log format */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** pino level override (trace, debug, info, warn, error, fatal, silent) */
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),

    /** Directory holding inventory.json */
    HUMIDOR_DATA_DIR: z.string().min(1).default(join(homedir(), '.humidor')),

    /** Overrides the stored default tax rate, as a percentage (8.6) */
    HUMIDOR_TAX_RATE: z.coerce.number().finite().nonnegative().optional(),
});

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/** Exits with the failing variables listed when the environment is invalid */
function parseEnv(): Env {
    try {
        return envSchema.parse(process.env);
    } catch (error) {
        if (error instanceof z.ZodError) {
            const issues = error.issues
                .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
                .join('\n');
            console.error('Environment validation failed:\n' + issues);
            process.exit(1);
        }
        throw error;
    }
}

export const env = parseEnv();
