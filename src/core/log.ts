// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Console Logging
// ─────────────────────────────────────────────────────────────

import type { LogLevel } from '../config';

export interface Logger {
    warn(message: string): void;
    debug(message: string): void;
}

/** Tagged console output, e.g. `[Demacro] \newcommand redefines \foo`. */
export function createLogger(scope: string, level: LogLevel): Logger {
    return {
        warn(message) {
            if (level !== 'silent') console.warn(`[${scope}] ${message}`);
        },
        debug(message) {
            if (level === 'debug') console.debug(`[${scope}] ${message}`);
        },
    };
}
