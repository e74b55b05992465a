/**
 * Retry Utilities
 *
 * Exponential backoff retry and timeouts for calls to external collaborators.
 */

import axios from 'axios';

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
    /** Stops further attempts once aborted */
    signal?: AbortSignal;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'signal'>> = {
    maxAttempts: 3,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
    backoffMultiplier: 2,
    jitter: 0.1,
    isRetryable: () => true,
    onRetry: () => { },
};

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
    const signal = options?.signal;
    let currentBackoff = opts.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
        signal?.throwIfAborted();
        try {
            return await fn();
        } catch (error: unknown) {
            if (signal?.aborted || attempt >= opts.maxAttempts || !opts.isRetryable(error)) {
                throw error;
            }

            const jitterAmount = currentBackoff * opts.jitter * (Math.random() * 2 - 1);
            const delay = Math.min(currentBackoff + jitterAmount, opts.maxBackoffMs);

            opts.onRetry(attempt, error, delay);
            await sleep(delay, signal);

            currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
        }
    }
}

/**
 * Check if an HTTP error is retryable based on status code.
 * Network errors (no response), 429 and 5xx are retryable; other 4xx are not.
 */
export function isRetryableHttpError(error: unknown): boolean {
    if (!axios.isAxiosError(error)) {
        return false;
    }
    const status = error.response?.status;
    if (status === undefined) {
        return true;
    }
    return status === 429 || (status >= 500 && status < 600);
}

export class TimeoutError extends Error {
    constructor(label: string, ms: number) {
        super(`${label} timed out after ${ms}ms`);
        this.name = 'TimeoutError';
    }
}

/**
 * Runs `run` with a signal that is aborted after `ms`, and rejects with
 * TimeoutError at that moment. Callers pass the signal on to the request
 * so the abandoned call stops instead of running on in the background.
 */
export async function withTimeout<T>(
    run: (signal: AbortSignal) => Promise<T>,
    ms: number,
    label: string
): Promise<T> {
    const controller = new AbortController();
    if (!(ms > 0) || !Number.isFinite(ms)) {
        return run(controller.signal);
    }
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new TimeoutError(label, ms);
            controller.abort(error);
            reject(error);
        }, ms);
    });
    try {
        return await Promise.race([run(controller.signal), timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Waits `ms`, or less when the signal aborts first.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        return Promise.resolve();
    }
    return new Promise(resolve => {
        const done = () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal?.addEventListener('abort', done, { once: true });
    });
}
