/**
 * Structured logging for the runtime services.
 *
 * JSON lines go to stderr so stdout stays free for command output. Under the
 * test runner everything is written to a no-op stream.
 */

import { Writable } from 'node:stream';
import pino from 'pino';
import { validateEnv } from './env.js';

export type Logger = pino.Logger;

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

function isTestEnv(): boolean {
    return process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function createRootLogger(): Logger {
    const env = validateEnv(process.env);

    const options: pino.LoggerOptions = {
        base: { service: 'txnflow' },
        level: env.LOG_LEVEL,
        timestamp: pino.stdTimeFunctions.isoTime,
    };

    if (isTestEnv()) {
        const noopStream = new Writable({
            write(_chunk, _encoding, callback) {
                callback();
            },
        });
        return pino(options, noopStream);
    }

    return pino(options, pino.destination(2));
}

/**
 * Child logger tagged with a category, e.g. getLogger('Oracle').
 */
export function getLogger(category: string): Logger {
    const cached = loggerCache.get(category);
    if (cached) return cached;

    if (!rootLogger) {
        rootLogger = createRootLogger();
    }

    const logger = rootLogger.child({ category });
    loggerCache.set(category, logger);
    return logger;
}

/**
 * Drop cached loggers so the next getLogger call re-reads LOG_LEVEL.
 */
export function resetLoggers(): void {
    rootLogger = undefined;
    loggerCache.clear();
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
