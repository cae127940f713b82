/**
 * Retry Utility
 * Bounded retry with a fixed delay and a retryable/fatal predicate.
 */

export interface RetryOptions {
    /** Total attempts, including the first one */
    attempts?: number;
    /** Delay between attempts (ms) */
    delayMs?: number;
    /** Errors for which this returns false are rethrown immediately */
    isRetryable?: (error: unknown) => boolean;
    onRetry?: (attempt: number, error: unknown) => void | Promise<void>;
    sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run `fn` until it resolves or the attempt budget is spent.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const {
        attempts = 3,
        delayMs = 3000,
        isRetryable = () => true,
        onRetry,
        sleep: wait = sleep,
    } = options;

    const maxAttempts = Math.max(1, attempts);

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            if (attempt >= maxAttempts || !isRetryable(error)) {
                throw error;
            }
            await onRetry?.(attempt, error);
            await wait(delayMs);
        }
    }
}

/**
 * Reject with `message` if `promise` has not settled within `ms`
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(message)), ms);
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
