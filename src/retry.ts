import { OperationCancelledError, RetryExhaustedError, VersionConflictError } from "./errors";
import { logger } from "./logger";

export type RetryPolicy = {
    /** Total attempts, the first included. */
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 5,
    baseDelayMs: 25,
    maxDelayMs: 1000,
};

export type ConflictRetryOptions = Partial<RetryPolicy> & {
    signal?: AbortSignal;
    random?: () => number;
    sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function ensureActive(signal: AbortSignal | undefined, operation: string) {
    if (signal?.aborted) throw new OperationCancelledError(operation);
}

/**
 * Jittered exponential backoff: the ceiling doubles per attempt up to the cap,
 * and the actual delay is drawn from the upper half of that ceiling.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
    const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
    return Math.floor(ceiling / 2 + random() * (ceiling / 2));
}

/**
 * Runs a read-compute-conditional-write step until it lands. Only version
 * conflicts are retried; anything else, including a business result the step
 * returns, goes straight back to the caller.
 */
export async function withConflictRetry<T>(
    operation: string,
    step: (attempt: number) => Promise<T>,
    options: ConflictRetryOptions = {}
): Promise<T> {
    const policy: RetryPolicy = {
        maxAttempts: options.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
        baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
        maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    };
    const sleep = options.sleep ?? defaultSleep;

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
        ensureActive(options.signal, operation);
        try {
            return await step(attempt);
        } catch (err) {
            if (!(err instanceof VersionConflictError)) throw err;
            if (attempt === policy.maxAttempts) break;

            const delay = backoffDelay(attempt, policy, options.random);
            logger.warn("Version conflict; retrying", { operation, attempt, delayMs: delay });
            await sleep(delay);
        }
    }

    logger.error("Conflict retries exhausted", { operation, attempts: policy.maxAttempts });
    throw new RetryExhaustedError(operation, policy.maxAttempts);
}
