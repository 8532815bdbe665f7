import { setTimeout as sleep } from 'timers/promises';

export interface RetryOptions {
    /** Attempts after the first one */
    retries: number;
    /** Delay before retry n is baseDelayMs * 2^(n-1) */
    baseDelayMs: number;
    shouldRetry: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Run `fn`, retrying with exponential backoff while `shouldRetry` allows.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
    for (let attempt = 0; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (attempt >= options.retries || !options.shouldRetry(error)) {
                throw error;
            }
            const delayMs = options.baseDelayMs * Math.pow(2, attempt);
            options.onRetry?.(error, attempt + 1, delayMs);
            if (delayMs > 0) {
                await sleep(delayMs);
            }
        }
    }
}
