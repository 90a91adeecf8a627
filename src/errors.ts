/**
 * Error Taxonomy
 *
 * Every failure a unit of work can hit falls into one of five categories.
 * The first four are captured per unit; configuration errors stop the run
 * before anything is scheduled.
 */

export type ErrorCategory =
    | 'source-unavailable'
    | 'transient-network'
    | 'provider-rejected'
    | 'local-processing'
    | 'configuration';

export class RefineryError extends Error {
    readonly category: ErrorCategory;

    constructor(category: ErrorCategory, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'RefineryError';
        this.category = category;
    }
}

export class SourceUnavailableError extends RefineryError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('source-unavailable', message, options);
        this.name = 'SourceUnavailableError';
    }
}

export class TransientNetworkError extends RefineryError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('transient-network', message, options);
        this.name = 'TransientNetworkError';
    }
}

export class ProviderRejectedError extends RefineryError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('provider-rejected', message, options);
        this.name = 'ProviderRejectedError';
    }
}

export class LocalProcessingError extends RefineryError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('local-processing', message, options);
        this.name = 'LocalProcessingError';
    }
}

export class ConfigurationError extends RefineryError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('configuration', message, options);
        this.name = 'ConfigurationError';
    }
}

const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504, 529]);
const REJECTED_STATUSES = new Set([400, 401, 403, 404, 413, 422]);
const TRANSIENT_CODES = new Set([
    'ECONNRESET',
    'ECONNREFUSED',
    'ECONNABORTED',
    'ETIMEDOUT',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EPIPE',
]);
const TRANSIENT_PATTERNS = [
    'rate limit',
    'rate_limit',
    'too many requests',
    'timeout',
    'timed out',
    'temporarily unavailable',
    'service unavailable',
    'socket hang up',
    'fetch failed',
    'network error',
    'bad gateway',
];
const QUOTA_PATTERNS = ['insufficient_quota', 'quota exceeded', 'exceeded your current quota'];

const readProperty = (value: unknown, key: string): unknown => {
    if (typeof value !== 'object' || value === null) return undefined;
    return Reflect.get(value, key);
};

export const getStatusCode = (error: unknown): number | undefined => {
    const status = readProperty(error, 'status') ?? readProperty(error, 'statusCode');
    if (typeof status === 'number') return status;
    const responseStatus = readProperty(readProperty(error, 'response'), 'status');
    return typeof responseStatus === 'number' ? responseStatus : undefined;
};

const getErrorCode = (error: unknown): string | undefined => {
    const code = readProperty(error, 'code') ?? readProperty(readProperty(error, 'cause'), 'code');
    return typeof code === 'string' ? code.toUpperCase() : undefined;
};

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

/**
 * Map any thrown value onto a category. Provider SDK errors carry an HTTP
 * status; Node network failures carry a system error code.
 */
export const classifyError = (error: unknown): ErrorCategory => {
    if (error instanceof RefineryError) return error.category;

    const message = errorMessage(error).toLowerCase();
    const code = getErrorCode(error);
    const status = getStatusCode(error);

    if (status !== undefined) {
        if (status === 429 && (QUOTA_PATTERNS.some((p) => message.includes(p)) || code === 'INSUFFICIENT_QUOTA')) {
            return 'provider-rejected';
        }
        if (TRANSIENT_STATUSES.has(status) || status >= 500) return 'transient-network';
        if (REJECTED_STATUSES.has(status)) return 'provider-rejected';
    }

    if (code && (TRANSIENT_CODES.has(code) || code.startsWith('UND_ERR_'))) return 'transient-network';
    if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) return 'transient-network';
    if (TRANSIENT_PATTERNS.some((p) => message.includes(p))) return 'transient-network';

    return 'local-processing';
};

export const isTransient = (error: unknown): boolean => classifyError(error) === 'transient-network';

export const describeError = (error: unknown): string => `[${classifyError(error)}] ${errorMessage(error)}`;
