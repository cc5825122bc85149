/**
 * Retry/Backoff Executor
 * Wraps one logical fetch with bounded retries and exponential backoff with jitter.
 *
 * Only Transient and RateLimited failures are retried. The sleep between attempts is a
 * timer local to the caller's task, so one location backing off never holds up another.
 */

import { logger } from '../logger.js';
import type { RetryPolicyConfig } from '../config.js';
import {
    FetchCancelledError,
    IngestionError,
    RateLimitedError,
    RetriesExhaustedError,
    toIngestionError,
} from './errors.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryExecutorOptions extends RetryPolicyConfig {
    random?: () => number;
    sleep?: SleepFn;
}

export interface ExecuteContext {
    /** Used in log lines, e.g. the location id */
    label?: string;
    signal?: AbortSignal;
}

/**
 * In-flight state of one logical fetch
 */
export interface FetchAttempt {
    label: string;
    attempt: number;
    lastError?: IngestionError;
    nextRetryAt?: Date;
}

/**
 * Resolves after `ms`, or early when the signal aborts. Never rejects.
 */
export const abortableSleep: SleepFn = (ms, signal) => {
    return new Promise<void>(resolve => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
};

export class RetryExecutor {
    private readonly maxAttempts: number;
    private readonly baseDelayMs: number;
    private readonly maxDelayMs: number;
    private readonly jitterRatio: number;
    private readonly random: () => number;
    private readonly sleep: SleepFn;

    constructor(options: RetryExecutorOptions) {
        if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
            throw new Error('maxAttempts must be a positive integer');
        }
        this.maxAttempts = options.maxAttempts;
        this.baseDelayMs = options.baseDelayMs;
        this.maxDelayMs = options.maxDelayMs;
        this.jitterRatio = options.jitterRatio;
        this.random = options.random ?? Math.random;
        this.sleep = options.sleep ?? abortableSleep;
    }

    /**
     * Delay before retry number `retryIndex` (0 for the first retry):
     * base * 2^n capped at max, jittered by ±jitterRatio, never above max.
     */
    public computeDelay(retryIndex: number): number {
        const exponential = Math.min(this.baseDelayMs * Math.pow(2, retryIndex), this.maxDelayMs);
        const jitter = (this.random() * 2 - 1) * this.jitterRatio;
        return Math.round(Math.min(this.maxDelayMs, Math.max(0, exponential * (1 + jitter))));
    }

    /**
     * Run `fetchFn` until it succeeds, fails with a non-retryable error,
     * runs out of attempts, or the signal aborts.
     */
    public async execute<T>(fetchFn: (attempt: number) => Promise<T>, context: ExecuteContext = {}): Promise<T> {
        const state: FetchAttempt = { label: context.label ?? 'fetch', attempt: 0 };

        while (state.attempt < this.maxAttempts) {
            if (context.signal?.aborted) {
                throw new FetchCancelledError(state.attempt, state.lastError);
            }

            state.attempt++;
            try {
                return await fetchFn(state.attempt);
            } catch (raw) {
                const error = toIngestionError(raw);
                state.lastError = error;

                if (!error.retryable) {
                    throw error;
                }
                if (state.attempt >= this.maxAttempts) {
                    break;
                }
                // Never sleep past the longest allowed backoff
                if (error instanceof RateLimitedError && error.retryAfterMs !== undefined && error.retryAfterMs > this.maxDelayMs) {
                    logger.debug(`Giving up on ${state.label}: Retry-After of ${error.retryAfterMs}ms exceeds ${this.maxDelayMs}ms`);
                    break;
                }

                const delayMs = this.delayFor(error, state.attempt - 1);
                state.nextRetryAt = new Date(Date.now() + delayMs);
                logger.debug(`Retrying ${state.label} in ${delayMs}ms`, {
                    attempt: state.attempt,
                    nextRetryAt: state.nextRetryAt.toISOString(),
                    errorKind: error.kind,
                    error: error.message,
                });

                await this.sleep(delayMs, context.signal);
            }
        }

        if (!state.lastError) {
            // maxAttempts >= 1 guarantees at least one failed attempt here
            throw new Error('Retry loop ended without an attempt');
        }
        throw new RetriesExhaustedError(state.lastError, state.attempt);
    }

    private delayFor(error: IngestionError, retryIndex: number): number {
        const computed = this.computeDelay(retryIndex);
        if (error instanceof RateLimitedError && error.retryAfterMs !== undefined && error.retryAfterMs > computed) {
            return error.retryAfterMs;
        }
        return computed;
    }
}
