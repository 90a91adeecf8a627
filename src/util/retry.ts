import { DEFAULT_RETRY_ATTEMPTS, DEFAULT_RETRY_BASE_DELAY_MS, MAX_RETRY_AFTER_MS } from '@/constants';
import { isTransient } from '@/errors';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelayMs?: number;
    onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const readRetryAfterMs = (error: unknown): number => {
    if (typeof error !== 'object' || error === null) return 0;
    const headers: unknown = Reflect.get(error, 'headers');
    let value: unknown;
    if (headers instanceof Headers) {
        value = headers.get('retry-after');
    } else if (typeof headers === 'object' && headers !== null) {
        value = Reflect.get(headers, 'retry-after');
    }
    if (typeof value !== 'string') return 0;
    const seconds = parseFloat(value);
    if (isNaN(seconds) || seconds <= 0) return 0;
    return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
};

/**
 * Run `fn`, retrying transient failures with exponential backoff. Anything
 * that is not a transient network error is rethrown on the first attempt.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const maxAttempts = options.maxAttempts ?? DEFAULT_RETRY_ATTEMPTS;
    const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    const sleep = options.sleep ?? defaultSleep;
    const random = options.random ?? Math.random;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (attempt >= maxAttempts || !isTransient(error)) {
                throw error;
            }
            const retryAfter = readRetryAfterMs(error);
            const delayMs = retryAfter > 0
                ? retryAfter
                : baseDelayMs * Math.pow(2, attempt - 1) * (0.5 + random());
            options.onRetry?.(attempt, error, delayMs);
            await sleep(delayMs);
        }
    }
}
