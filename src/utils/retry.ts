import {Result, ok, err} from './errors';

export interface RetryPolicy {
    /** Total number of attempts, the first one included. */
    attempts: number;
    baseDelayMs: number;
    /** Fraction of one base step added as random jitter, in [0, 1). */
    jitterRatio: number;
}

export interface RetryOptions {
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
    /** Return false to give up early, e.g. on a non-retriable error or during shutdown. */
    shouldRetry?: (error: unknown, attempt: number) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export interface RetryFailure {
    error: unknown;
    attempts: number;
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Delay after the given failed attempt (1-based): base * 2^(attempt-1) plus
 * jitter below one base step, so consecutive delays always strictly increase.
 */
export function computeBackoffDelay(failedAttempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
    const step = policy.baseDelayMs * Math.pow(2, failedAttempt - 1);
    const ratio = Math.min(Math.max(policy.jitterRatio, 0), 0.99);
    const jitter = Math.floor(random() * policy.baseDelayMs * ratio);
    return step + jitter;
}

/**
 * Run an async operation with exponential backoff. Never throws: the last
 * error is returned in the failure branch.
 */
export async function withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    options: RetryOptions = {}
): Promise<Result<T, RetryFailure>> {
    const wait = options.sleep ?? sleep;
    const random = options.random ?? Math.random;
    let lastError: unknown;

    for (let attempt = 1; attempt <= policy.attempts; attempt++) {
        try {
            return ok(await operation(attempt));
        } catch (error) {
            lastError = error;

            if (options.shouldRetry && !options.shouldRetry(error, attempt)) {
                return err({error, attempts: attempt});
            }

            if (attempt < policy.attempts) {
                const delay = computeBackoffDelay(attempt, policy, random);
                options.onRetry?.(error, attempt, delay);
                await wait(delay);
            }
        }
    }

    return err({error: lastError, attempts: policy.attempts});
}

/** Sleep that ends early once the signal aborts. */
export function interruptibleSleep(ms: number, signal: AbortSignal): Promise<void> {
    if (signal.aborted) return Promise.resolve();
    return new Promise(resolve => {
        const done = () => {
            clearTimeout(timer);
            signal.removeEventListener('abort', done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal.addEventListener('abort', done, {once: true});
    });
}
