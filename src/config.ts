// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Configuration
// Environment variables validated once, with defaults
// ─────────────────────────────────────────────────────────────

import { z } from 'zod';

export const LogLevelSchema = z.enum(['silent', 'warn', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const ConfigSchema = z.object({
    // Expansions nested deeper than this abort a demacro call
    UNMACRO_MAX_DEPTH: z.coerce.number().int().positive().default(64),
    // Total expansions allowed in one demacro call
    UNMACRO_MAX_EXPANSIONS: z.coerce.number().int().positive().default(100_000),
    UNMACRO_LOG_LEVEL: LogLevelSchema.default('warn'),
});

export interface Config {
    maxDepth: number;
    maxExpansions: number;
    logLevel: LogLevel;
}

/** Read configuration from `env`, throwing a ZodError on invalid values. */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
    const parsed = ConfigSchema.parse(env);
    return {
        maxDepth: parsed.UNMACRO_MAX_DEPTH,
        maxExpansions: parsed.UNMACRO_MAX_EXPANSIONS,
        logLevel: parsed.UNMACRO_LOG_LEVEL,
    };
}
