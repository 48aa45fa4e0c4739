/**
 * 🚨 ERROR TAXONOMY
 * Every failure inside the discovery/enrichment core maps to one of these.
 * Clients catch them at their boundary and degrade to an empty result.
 */

export class ProspectorError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Network failure, timeout or non-2xx HTTP status.
 */
export class TransportError extends ProspectorError {
    constructor(message: string, public status?: number, context?: Record<string, unknown>) {
        super(message, 'TRANSPORT_ERROR', { ...context, status });
    }

    get isNotFound(): boolean {
        return this.status === 404;
    }
}

/**
 * Malformed input caught before any request is made.
 */
export class ValidationError extends ProspectorError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', context);
    }
}

/**
 * Upstream payload with an unexpected JSON/HTML shape.
 */
export class ParseError extends ProspectorError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'PARSE_ERROR', context);
    }
}

export class ConfigurationError extends ProspectorError {
    constructor(message: string, public issues: string[] = []) {
        super(message, 'CONFIG_ERROR', { fatal: true });
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
