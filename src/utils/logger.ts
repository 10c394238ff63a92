/**
 * Stderr Logger
 *
 * All log output goes to stderr so that stdout stays clean for CLI results and
 * for stdio MCP traffic.
 *
 * Exports:
 * - logger: lazy logger that checks silent mode on every call
 */

import winston from 'winston';
import _ from 'lodash';

export type LogMeta = Record<string, unknown>;

export interface Logger {
    debug(meta: LogMeta, message?: string): Logger
    debug(message: string, ...meta: unknown[]): Logger
    info(meta: LogMeta, message?: string): Logger
    info(message: string, ...meta: unknown[]): Logger
    warn(meta: LogMeta, message?: string): Logger
    warn(message: string, ...meta: unknown[]): Logger
    error(meta: LogMeta, message?: string): Logger
    error(message: string, ...meta: unknown[]): Logger
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

type LogSink = (level: LogLevel, first: LogMeta | string, rest: unknown[]) => void;

/**
 * Build a logger that accepts both `(meta, message)` and `(message, ...meta)`
 */
function createLogger(sink: LogSink): Logger {
    const built: Logger = {
        debug(first: LogMeta | string, ...rest: unknown[]): Logger {
            sink('debug', first, rest);
            return built;
        },
        info(first: LogMeta | string, ...rest: unknown[]): Logger {
            sink('info', first, rest);
            return built;
        },
        warn(first: LogMeta | string, ...rest: unknown[]): Logger {
            sink('warn', first, rest);
            return built;
        },
        error(first: LogMeta | string, ...rest: unknown[]): Logger {
            sink('error', first, rest);
            return built;
        },
    };

    return built;
}

function resolveLevel(): LogLevel {
    const requested = _.toLower(process.env.LOG_LEVEL ?? 'info');
    return _.find(LEVELS, level => level === requested) ?? 'info';
}

function createWinstonSink(): LogSink {
    const winstonLogger = winston.createLogger({
        level:  resolveLevel(),
        format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.json()
        ),
        transports: [
            new winston.transports.Stream({ stream: process.stderr }),
        ],
    });

    return (level, first, rest) => {
        if(_.isString(first)) {
            winstonLogger.log(level, first, ...rest);
        } else {
            winstonLogger.log(level, _.isString(rest[0]) ? rest[0] : '', first);
        }
    };
}

const winstonSink = createWinstonSink();

/**
 * Silent when LOG_LEVEL=silent or MCP_DISPATCH_SILENT=true, stderr otherwise.
 * Checked on every call so tests and the CLI can flip it after import.
 */
export function isSilent(): boolean {
    return _.toLower(process.env.LOG_LEVEL ?? '') === 'silent'
        || process.env.MCP_DISPATCH_SILENT === 'true';
}

export const logger: Logger = createLogger((level, first, rest) => {
    if(!isSilent()) {
        winstonSink(level, first, rest);
    }
});

/**
 * Normalize an unknown caught value into a message string
 */
export function errorMessage(error: unknown): string {
    return _.isError(error) ? error.message : String(error);
}
