// src/logger.ts

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

/**
 * Create a structured logger instance with Pino
 *
 * Level comes from LOG_LEVEL (default "info"); timestamps are ISO 8601.
 */
export function createLogger(options?: LoggerOptions): Logger {
    return pino({
        level: process.env.LOG_LEVEL || 'info',
        serializers: {
            err: pino.stdSerializers.err,
        },
        timestamp: pino.stdTimeFunctions.isoTime,
        ...options,
    });
}

export const logger = createLogger();

export type { Logger };
