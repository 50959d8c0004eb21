import { setTimeout as delay } from "node:timers/promises";
import { isTransientProviderError } from "../entities/errors.js";

export interface RetryPolicy {
    readonly maxAttempts: number;
    readonly initialDelayMs: number;
    readonly maxDelayMs: number;
    readonly multiplier: number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 5,
    initialDelayMs: 250,
    maxDelayMs: 10_000,
    multiplier: 2,
};

/** Delay before retry number `attempt` (1-based), capped at `maxDelayMs`. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
    const exponent = Math.max(0, attempt - 1);
    return Math.min(
        policy.maxDelayMs,
        policy.initialDelayMs * policy.multiplier ** exponent,
    );
}

export const sleep: Sleep = async (ms, signal) => {
    await delay(ms, undefined, signal ? { signal } : undefined);
};

export interface RetryOptions {
    readonly policy: RetryPolicy;
    readonly sleep: Sleep;
    readonly signal?: AbortSignal | undefined;
    /** time on the `now` clock after which no further attempt starts */
    readonly deadline?: number | undefined;
    readonly now?: (() => number) | undefined;
    readonly onRetry?: ((attempt: number, error: unknown) => void) | undefined;
}

export interface RetryResult<T> {
    readonly value: T;
    readonly attempts: number;
}

export class RetryAbortedError extends Error {
    constructor(readonly attempts: number) {
        super(`Cancelled after ${attempts} attempt(s)`);
        this.name = "RetryAbortedError";
    }
}

export class RetryDeadlineError extends Error {
    constructor(readonly attempts: number) {
        super(`Deadline passed after ${attempts} attempt(s)`);
        this.name = "RetryDeadlineError";
    }
}

/**
 * Runs `operation` until it succeeds, retrying transient provider errors.
 * Permanent errors and the last transient error are rethrown unchanged.
 * Backoff sleeps are cut short at the deadline and end early on abort.
 */
export async function withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions,
): Promise<RetryResult<T>> {
    const { deadline, signal } = options;
    const now = options.now ?? Date.now;
    const timeLeft = () =>
        deadline === undefined ? Number.POSITIVE_INFINITY : deadline - now();

    for (let attempt = 1; ; attempt++) {
        try {
            return { value: await operation(attempt), attempts: attempt };
        } catch (error) {
            if (
                !isTransientProviderError(error) ||
                attempt >= options.policy.maxAttempts
            ) {
                throw error;
            }
            if (signal?.aborted) {
                throw new RetryAbortedError(attempt);
            }
            const remaining = timeLeft();
            if (remaining <= 0) {
                throw new RetryDeadlineError(attempt);
            }
            options.onRetry?.(attempt, error);
            try {
                await options.sleep(
                    Math.min(backoffDelay(options.policy, attempt), remaining),
                    signal,
                );
            } catch (sleepError) {
                if (signal?.aborted) {
                    throw new RetryAbortedError(attempt);
                }
                throw sleepError;
            }
            if (signal?.aborted) {
                throw new RetryAbortedError(attempt);
            }
            if (timeLeft() <= 0) {
                throw new RetryDeadlineError(attempt);
            }
        }
    }
}
