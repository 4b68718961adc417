/**
 * Retry Utilities
 *
 * Exponential backoff and time budgets for calls to external services.
 */

import { GenerationTimeoutError } from '../../domain/errors/StoryboardErrors';

export interface RetryOptions {
    /** Maximum number of attempts (default: 2) */
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
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
    maxAttempts: 2,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
    backoffMultiplier: 2,
    jitter: 0.1,
    isRetryable: () => true,
    onRetry: () => { }
};

/**
 * Thrown by withRetry once attempts run out; keeps the attempt count.
 */
export class RetryExhaustedError extends Error {
    constructor(
        public readonly lastError: unknown,
        public readonly attempts: number
    ) {
        super(lastError instanceof Error ? lastError.message : String(lastError));
        this.name = 'RetryExhaustedError';
    }
}

/**
 * Execute a function with exponential backoff retry logic.
 *
 * @param fn - receives the 1-based attempt number
 * @throws RetryExhaustedError wrapping the last error
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options?: RetryOptions
): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
    let currentBackoff = opts.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            if (attempt >= maxAttempts || !opts.isRetryable(error)) {
                throw new RetryExhaustedError(error, attempt);
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
 * Runs fn with a time budget. The signal handed to fn is aborted when the
 * budget runs out, and the returned promise rejects with
 * GenerationTimeoutError.
 */
export function withTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number
): Promise<T> {
    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
        const timer = setTimeout(() => {
            controller.abort();
            reject(new GenerationTimeoutError(timeoutMs));
        }, timeoutMs);

        let pending: Promise<T>;
        try {
            pending = fn(controller.signal);
        } catch (error) {
            clearTimeout(timer);
            reject(error);
            return;
        }

        pending.then(
            value => {
                clearTimeout(timer);
                resolve(value);
            },
            (error: unknown) => {
                clearTimeout(timer);
                reject(error);
            }
        );
    });
}

/**
 * Check if an HTTP error is retryable based on status code.
 */
export function isRetryableStatus(status: number | undefined): boolean {
    // Network error (no response)
    if (!status) {
        return true;
    }
    if (status === 429) {
        return true;
    }
    return status >= 500 && status < 600;
}

/**
 * Helper to sleep for a specified duration.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
