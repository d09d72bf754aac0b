/**
 * Retry and timeout helpers for page navigation.
 */
import { RunCancelledError } from '../domain/errors/ProfileToolError';

export interface RetryOptions {
    /** Maximum number of attempts (default: 3) */
    maxAttempts?: number;
    /** Initial backoff delay in milliseconds (default: 1000) */
    initialBackoffMs?: number;
    /** Maximum backoff delay in milliseconds (default: 30000) */
    maxBackoffMs?: number;
    /** Backoff multiplier (default: 2) */
    backoffMultiplier?: number;
    /** Optional jitter to add randomness (0-1, default: 0.1) */
    jitter?: number;
    /** Function to determine if error is retryable (default: all errors) */
    isRetryable?: (error: unknown) => boolean;
    /** Callback for each retry attempt */
    onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
    /** Stops retrying once aborted */
    signal?: AbortSignal;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'signal'>> = {
    maxAttempts: 3,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
    backoffMultiplier: 2,
    jitter: 0.1,
    isRetryable: () => true,
    onRetry: () => { }
};

/**
 * Raised by withTimeout when a step does not settle in time.
 */
export class StepTimeoutError extends Error {
    constructor(public readonly label: string, public readonly timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'StepTimeoutError';
    }
}

/**
 * Execute a function with exponential backoff retry logic.
 *
 * @throws The last error if all retries fail
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options?: RetryOptions
): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    let currentBackoff = opts.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (attempt >= opts.maxAttempts || !opts.isRetryable(error) || opts.signal?.aborted) {
                throw error;
            }

            const jitterAmount = currentBackoff * opts.jitter * (Math.random() * 2 - 1);
            const delay = Math.max(0, Math.min(currentBackoff + jitterAmount, opts.maxBackoffMs));

            opts.onRetry(attempt, error, delay);
            await sleep(delay);

            currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
        }
    }
}

/**
 * Bounds a pending step. Rejects with StepTimeoutError when the time runs
 * out and with RunCancelledError when the signal aborts first.
 */
export function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    label: string,
    signal?: AbortSignal
): Promise<T> {
    if (signal?.aborted) {
        return Promise.reject(new RunCancelledError(`${label} cancelled`));
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => {
            cleanup();
            reject(new RunCancelledError(`${label} cancelled`));
        };
        const timer = setTimeout(() => {
            cleanup();
            reject(new StepTimeoutError(label, timeoutMs));
        }, timeoutMs);
        const cleanup = () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        };

        signal?.addEventListener('abort', onAbort, { once: true });
        promise.then(
            value => {
                cleanup();
                resolve(value);
            },
            error => {
                cleanup();
                reject(error);
            }
        );
    });
}

/**
 * Check if an HTTP error is retryable based on status code.
 * Rate limits (429), server errors (5xx) and network errors are.
 */
export function isRetryableHttpError(error: unknown): boolean {
    const status = statusOf(error);
    if (status === undefined) {
        return true;
    }
    return status === 429 || (status >= 500 && status < 600);
}

function statusOf(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    if ('status' in error && typeof error.status === 'number') return error.status;
    if ('response' in error && typeof error.response === 'object' && error.response !== null
        && 'status' in error.response && typeof error.response.status === 'number') {
        return error.response.status;
    }
    return undefined;
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
