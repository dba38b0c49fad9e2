import util from 'util';
import winston from 'winston';

const LEVELS = Object.keys(winston.config.npm.levels);

/**
 * JSON for log metadata. Errors become their message, repeated objects
 * become `[Circular]`.
 */
export function renderMeta(meta: Record<string, unknown>): string {
    if (Object.keys(meta).length === 0) return '';

    const seen = new WeakSet<object>();
    try {
        return ' ' + JSON.stringify(meta, (_key: string, value: unknown) => {
            if (value instanceof Error) return value.message;
            if (typeof value === 'object' && value !== null) {
                if (seen.has(value)) return '[Circular]';
                seen.add(value);
            }
            return value;
        });
    } catch {
        // BigInt and friends
        return ' ' + util.inspect(meta, { depth: 4, breakLength: Infinity });
    }
}

const lineFormat = winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    const line = `[${String(timestamp)}] ${level}: ${String(message)}${renderMeta(meta)}`;
    return typeof stack === 'string' && level === 'error' ? `${line}\n${stack}` : line;
});

// stdout carries the MCP stdio transport, so every level goes to stderr.
export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        lineFormat
    ),
    transports: [new winston.transports.Console({ stderrLevels: LEVELS })]
});

/** Returns false and keeps the current level when `level` is not a known one. */
export function setLogLevel(level: string): boolean {
    if (!LEVELS.includes(level)) {
        logger.warn(`Unknown log level "${level}", staying at ${logger.level}`);
        return false;
    }
    logger.level = level;
    return true;
}
