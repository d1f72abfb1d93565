// singbox-relay/src/lib/logger.ts
// Line logger used by every pipeline stage.

export interface Logger {
    info(message: string): void;
    warn(message: string): void;
}

export const DEFAULT_LOG_PREFIX = '[singbox-relay]';

/**
 * Logger writing prefixed lines to the console (the Sub-Store script log).
 */
export function createConsoleLogger(prefix: string = DEFAULT_LOG_PREFIX): Logger {
    return {
        info: (message: string): void => console.log(`${prefix} ${message}`),
        warn: (message: string): void => console.warn(`${prefix} ${message}`),
    };
}

export const silentLogger: Logger = {
    info: (): void => {},
    warn: (): void => {},
};

/**
 * Log the first `limit` entries of a list, then a "... N more" line.
 */
export function logPreview(
    logger: Logger,
    items: readonly string[],
    limit = 5,
    indent = '    ',
): void {
    for (const item of items.slice(0, limit)) {
        logger.info(`${indent}${item}`);
    }
    if (items.length > limit) {
        logger.info(`${indent}... ${items.length - limit} more`);
    }
}
