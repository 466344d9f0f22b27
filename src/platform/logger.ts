/**
 * Logger Module - structured logging
 *
 * - JSON lines in production, a readable single line in development
 * - Trace ID and User ID injected from the tracing context
 * - Daily file rotation (14 days), switched off with LOG_TO_FILE=false
 * - Errors are serialized whole, cause chain included
 *
 * kind:
 * - biz: usecase layer, reconstructs what a user did
 * - sys: adapter layer, locates faults
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getTraceId, getUserId } from './tracing.js';
import config from './config.js';

export type LogKind = 'biz' | 'sys';

export interface LogMeta {
    kind: LogKind;
    /** Component name, one constant per module */
    component: string;
    message: string;
    error?: Error | unknown;
    meta?: Record<string, unknown>;
}

const IS_DEV = process.env.NODE_ENV !== 'production';

// ============ Formatting ============

export function serializeError(error: unknown): Record<string, unknown> | undefined {
    if (!error) return undefined;

    if (error instanceof Error) {
        return {
            name: error.name,
            message: error.message,
            stack: error.stack,
            ...(error.cause ? { cause: serializeError(error.cause) } : {}),
            // custom fields (status codes, error details from SDKs)
            ...Object.fromEntries(
                Object.entries(error).filter(([key]) => !['name', 'message', 'stack', 'cause'].includes(key))
            ),
        };
    }

    return { raw: typeof error === 'object' ? error : String(error) };
}

const jsonFormat = winston.format.printf(({ level, message, timestamp, ...rest }) => {
    const logObject: Record<string, unknown> = {
        timestamp,
        level,
        traceId: getTraceId() || '-',
        userId: getUserId() || '-',
        ...rest,
        message,
    };

    if (rest.error) {
        logObject.error = serializeError(rest.error);
    }

    return JSON.stringify(logObject);
});

const prettyFormat = winston.format.printf(({ level, message, timestamp, kind, component, error, meta }) => {
    const traceId = getTraceId() || '-';
    const userId = getUserId() || '-';

    let output = `${timestamp} [${level.toUpperCase().padEnd(5)}] [${kind || 'sys'}] [${traceId}] [${userId}] ${component || 'App'}: ${message}`;

    const serialized = serializeError(error);
    if (serialized) {
        output += `\n  error: ${serialized.name} - ${serialized.message}`;
        if (serialized.stack) {
            output += `\n  stack: ${serialized.stack}`;
        }
        if (serialized.cause) {
            output += `\n  cause: ${JSON.stringify(serialized.cause)}`;
        }
    }

    if (meta && typeof meta === 'object' && Object.keys(meta).length > 0) {
        output += `\n  meta: ${JSON.stringify(meta)}`;
    }

    return output;
});

// ============ Transports ============

const transports: Array<winston.transports.ConsoleTransportInstance | DailyRotateFile> = [
    new winston.transports.Console({
        format: winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.colorize({ all: IS_DEV }),
            IS_DEV ? prettyFormat : jsonFormat
        ),
    }),
];

if (config.logging.toFile) {
    const fileTransport = new DailyRotateFile({
        dirname: config.logging.dir,
        filename: 'app-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: '50m',
        maxFiles: '14d',
        format: winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
            jsonFormat
        ),
    });

    fileTransport.on('rotate', (oldFilename: string, newFilename: string) => {
        console.log(`[Logger] Log rotated: ${oldFilename} -> ${newFilename}`);
    });

    transports.push(fileTransport);
}

const winstonLogger = winston.createLogger({
    level: config.logging.level,
    transports,
});

// ============ Logger API ============

/**
 * @example
 * logger.info({
 *     kind: 'biz',
 *     component: 'SessionOrchestrator',
 *     message: 'Chat message sent',
 *     meta: { turns: 4 }
 * });
 */
export const logger = {
    debug: ({ message, ...rest }: LogMeta) => winstonLogger.debug(message, rest),
    info: ({ message, ...rest }: LogMeta) => winstonLogger.info(message, rest),
    warn: ({ message, ...rest }: LogMeta) => winstonLogger.warn(message, rest),
    error: ({ message, ...rest }: LogMeta) => winstonLogger.error(message, rest),

    raw: winstonLogger,
};

export default logger;
