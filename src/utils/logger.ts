/**
 * 📝 STRUCTURED LOGGER
 * Pretty lines for local runs, one JSON object per line in production.
 */

import { ParseError, TransportError, ValidationError } from './errors';

export enum ErrorCategory {
    NETWORK = 'NETWORK',      // Timeout, DNS, Connection refused
    PARSING = 'PARSING',      // HTML/JSON parsing failures
    VALIDATION = 'VALIDATION', // Bad identifiers, missing names
    AUTH = 'AUTH',            // API key invalid, rate limited
    LOGIC = 'LOGIC'           // Programmer error (bugs)
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LogThreshold = LogLevel | 'silent';

export interface LogContext {
    prospect_name?: string;
    registry_id?: string;
    query?: string;
    url?: string;
    error?: Error;
    error_category?: ErrorCategory;
    duration_ms?: number;
    [key: string]: unknown;
}

export interface LoggerOptions {
    service?: string;
    level?: LogThreshold;
    pretty?: boolean;
}

export const DEFAULT_SERVICE = 'prospect-finder';

const LEVEL_PRIORITY: Record<LogThreshold, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    fatal: 4,
    silent: 5,
};

const COLORS: Record<LogLevel, string> = {
    debug: '\x1b[90m',  // Gray
    info: '\x1b[32m',   // Green
    warn: '\x1b[33m',   // Yellow
    error: '\x1b[31m',  // Red
    fatal: '\x1b[35m',  // Magenta
};

export class Logger {
    readonly service: string;
    private readonly minLevel: LogThreshold;
    private readonly pretty: boolean;

    constructor(options: LoggerOptions = {}) {
        this.service = options.service ?? DEFAULT_SERVICE;
        this.minLevel = options.level ?? 'info';
        this.pretty = options.pretty ?? process.env.NODE_ENV !== 'production';
    }

    debug(msg: string, context?: LogContext): void {
        this.log('debug', msg, context);
    }

    info(msg: string, context?: LogContext): void {
        this.log('info', msg, context);
    }

    warn(msg: string, context?: LogContext): void {
        this.log('warn', msg, context);
    }

    error(msg: string, context?: LogContext): void {
        this.log('error', msg, context);
    }

    fatal(msg: string, context?: LogContext): void {
        this.log('fatal', msg, context);
    }

    /**
     * 🔥 Categorize an error automatically
     */
    static categorizeError(error: Error): ErrorCategory {
        if (error instanceof ValidationError) return ErrorCategory.VALIDATION;
        if (error instanceof ParseError) return ErrorCategory.PARSING;
        if (error instanceof TransportError) {
            return error.status === 401 || error.status === 403 || error.status === 429
                ? ErrorCategory.AUTH
                : ErrorCategory.NETWORK;
        }

        const msg = error.message.toLowerCase();
        if (msg.includes('timeout') || msg.includes('econnrefused') || msg.includes('enotfound') || msg.includes('socket')) {
            return ErrorCategory.NETWORK;
        }
        if (msg.includes('parse') || msg.includes('unexpected token') || msg.includes('json')) {
            return ErrorCategory.PARSING;
        }
        if (msg.includes('validation') || msg.includes('zod') || msg.includes('invalid')) {
            return ErrorCategory.VALIDATION;
        }
        if (msg.includes('api key') || msg.includes('rate limit') || msg.includes('request_denied')) {
            return ErrorCategory.AUTH;
        }
        return ErrorCategory.LOGIC;
    }

    /**
     * 📊 Log an error with automatic categorization
     */
    logError(msg: string, error: Error, extraContext?: Partial<LogContext>): void {
        this.error(msg, {
            ...extraContext,
            error,
            error_category: Logger.categorizeError(error),
        });
    }

    private log(level: LogLevel, msg: string, context?: LogContext): void {
        if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) return;

        const timestamp = new Date().toISOString();
        const { error, ...rest }: LogContext = context ?? {};
        const fields: Record<string, unknown> = { ...rest };
        if (error) {
            fields.error_message = error.message;
            fields.error_stack = error.stack;
        }

        if (!this.pretty) {
            console.log(JSON.stringify({
                timestamp,
                level: level.toUpperCase(),
                service: this.service,
                message: msg,
                ...fields,
            }));
            return;
        }

        const color = COLORS[level];
        const reset = '\x1b[0m';
        let output = `${color}[${timestamp}] [${level.toUpperCase()}]${reset} ${msg}`;

        // Only key fields on a pretty line
        const brief = Object.fromEntries(
            Object.entries({
                prospect: fields.prospect_name,
                registry_id: fields.registry_id,
                url: fields.url,
                category: fields.error_category,
                error: fields.error_message,
            }).filter(([, v]) => v !== undefined)
        );
        if (Object.keys(brief).length > 0) {
            output += ` ${JSON.stringify(brief)}`;
        }
        console.log(output);

        if ((level === 'error' || level === 'fatal') && typeof fields.error_stack === 'string') {
            console.log(`${color}${fields.error_stack}${reset}`);
        }
    }
}

export const defaultLogger = new Logger({
    service: DEFAULT_SERVICE,
    level: 'info',
});
