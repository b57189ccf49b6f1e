import { StoreUnavailableError } from '@/lib/errors.js';
import type { Logger } from '@/utils/logger.js';
import { describeError, isConnectionError } from './errors.js';

export interface BoundedRetryOptions {
    label: string;
    attempts: number;

    /** Delay before retry n is baseDelayMs * n */
    baseDelayMs: number;

    /** Per-attempt timeout */
    timeoutMs: number;

    logger: Logger;

    /** Defaults to connection errors and timeouts */
    isRetryable?: (error: unknown) => boolean;
}

export class OperationTimeoutError extends Error {
    constructor(
        readonly label: string,
        readonly timeoutMs: number
    ) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'OperationTimeoutError';
    }
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Race an operation against a timer. The operation is not cancelled; its result
 * is simply ignored once the timer wins.
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => reject(new OperationTimeoutError(label, timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([operation, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

const defaultRetryable = (error: unknown) => error instanceof OperationTimeoutError || isConnectionError(error);

/**
 * Bounded retry with linear backoff for long network calls (ledger bootstrap,
 * metadata probes). Exhaustion surfaces as StoreUnavailableError.
 */
export async function withBoundedRetry<T>(operation: () => Promise<T>, options: BoundedRetryOptions): Promise<T> {
    const isRetryable = options.isRetryable ?? defaultRetryable;
    let lastError: unknown;

    for (let attempt = 1; attempt <= options.attempts; attempt++) {
        try {
            return await withTimeout(operation(), options.timeoutMs, options.label);
        } catch (error) {
            if (!isRetryable(error)) {
                throw error;
            }

            lastError = error;
            options.logger.warn({ label: options.label, attempt, attempts: options.attempts, err: describeError(error) }, 'Store operation failed, retrying');

            if (attempt < options.attempts) {
                await sleep(options.baseDelayMs * attempt);
            }
        }
    }

    throw new StoreUnavailableError(`${options.label} failed after ${options.attempts} attempts`, { cause: lastError });
}

export interface ConnectionRetryOptions {
    label: string;
    logger: Logger;

    /** Checks out and validates a connection before the single retry */
    validate: () => Promise<void>;
}

/**
 * Retry once on a stale pooled connection. A second connection-class failure
 * means the store is unreachable.
 */
export async function withConnectionRetry<T>(operation: () => Promise<T>, options: ConnectionRetryOptions): Promise<T> {
    try {
        return await operation();
    } catch (error) {
        if (!isConnectionError(error)) {
            throw error;
        }

        options.logger.warn({ label: options.label, err: describeError(error) }, 'Connection failed, retrying once on a fresh connection');

        try {
            await options.validate();
            return await operation();
        } catch (retryError) {
            if (isConnectionError(retryError)) {
                throw new StoreUnavailableError(`${options.label}: store unavailable`, { cause: retryError });
            }
            throw retryError;
        }
    }
}
