/**
 * Retry/backoff executor
 */

import { describe, it, expect, jest } from '@jest/globals';

jest.mock('../logger.js', () => ({
    logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn(), log: jest.fn() },
    rateLimitedLogger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn(), reset: jest.fn() },
}));

import {
    ClientError,
    FetchCancelledError,
    MalformedPayloadError,
    RateLimitedError,
    RetriesExhaustedError,
    TransientError,
} from '../ingestion/errors.js';
import { RetryExecutor, abortableSleep } from '../ingestion/retry-executor.js';
import { logger } from '../logger.js';

const policy = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 60000, jitterRatio: 0.2 };

function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
    const delays: number[] = [];
    return {
        delays,
        sleep: async (ms: number) => { delays.push(ms); },
    };
}

/**
 * Fails with each error in turn, then resolves with `value`
 */
function failingThen<T>(errors: Error[], value: T): { calls: () => number; fn: () => Promise<T> } {
    let count = 0;
    return {
        calls: () => count,
        fn: async () => {
            const error = errors[count];
            count++;
            if (error) throw error;
            return value;
        },
    };
}

describe('RetryExecutor.computeDelay', () => {
    it('doubles from the base delay without jitter at the midpoint', () => {
        const executor = new RetryExecutor({ ...policy, random: () => 0.5 });
        expect([0, 1, 2, 3].map(n => executor.computeDelay(n))).toEqual([1000, 2000, 4000, 8000]);
    });

    it('applies jitter in both directions', () => {
        expect(new RetryExecutor({ ...policy, random: () => 0 }).computeDelay(0)).toBe(800);
        expect(new RetryExecutor({ ...policy, random: () => 1 }).computeDelay(0)).toBe(1200);
    });

    it('never exceeds the maximum delay', () => {
        const executor = new RetryExecutor({ ...policy, random: () => 1 });
        expect(executor.computeDelay(10)).toBe(60000);
    });
});

describe('RetryExecutor.execute', () => {
    it('rejects a non-positive attempt count', () => {
        expect(() => new RetryExecutor({ ...policy, maxAttempts: 0 })).toThrow('maxAttempts must be a positive integer');
    });

    it('returns the first success without sleeping', async () => {
        const { delays, sleep } = recordingSleep();
        const executor = new RetryExecutor({ ...policy, sleep });

        await expect(executor.execute(async () => 'ok')).resolves.toBe('ok');
        expect(delays).toEqual([]);
    });

    it('retries transient failures with growing delays', async () => {
        const { delays, sleep } = recordingSleep();
        const executor = new RetryExecutor({ ...policy, random: () => 0.5, sleep });
        const fetch = failingThen([new TransientError('reset'), new TransientError('reset')], 42);

        await expect(executor.execute(fetch.fn)).resolves.toBe(42);
        expect(fetch.calls()).toBe(3);
        expect(delays).toEqual([1000, 2000]);
    });

    it('gives up after maxAttempts with the last error attached', async () => {
        const { delays, sleep } = recordingSleep();
        const executor = new RetryExecutor({ ...policy, random: () => 0.5, sleep });
        const last = new TransientError('OpenWeatherMap server error (503)', 503);
        const fetch = failingThen([new TransientError('first'), new TransientError('second'), last], 'never');

        const error = await executor.execute(fetch.fn).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(RetriesExhaustedError);
        if (!(error instanceof RetriesExhaustedError)) return;
        expect(error.kind).toBe('RetriesExhausted');
        expect(error.attempts).toBe(3);
        expect(error.lastError).toBe(last);
        expect(error.message).toBe('Gave up after 3 attempts: OpenWeatherMap server error (503)');
        expect(fetch.calls()).toBe(3);
        expect(delays).toEqual([1000, 2000]);
    });

    it('does not retry client errors', async () => {
        const { delays, sleep } = recordingSleep();
        const executor = new RetryExecutor({ ...policy, sleep });
        const rejected = new ClientError('OpenWeatherMap rejected the request (401)', 401);
        const fetch = failingThen([rejected], 'never');

        await expect(executor.execute(fetch.fn)).rejects.toBe(rejected);
        expect(fetch.calls()).toBe(1);
        expect(delays).toEqual([]);
    });

    it('does not retry malformed payloads', async () => {
        const { sleep } = recordingSleep();
        const executor = new RetryExecutor({ ...policy, sleep });
        const fetch = failingThen([new MalformedPayloadError('Response body is not valid JSON')], 'never');

        await expect(executor.execute(fetch.fn)).rejects.toBeInstanceOf(MalformedPayloadError);
        expect(fetch.calls()).toBe(1);
    });

    it('waits at least as long as Retry-After asks', async () => {
        const { delays, sleep } = recordingSleep();
        const executor = new RetryExecutor({ ...policy, random: () => 0.5, sleep });
        const fetch = failingThen([new RateLimitedError('Too many requests', 5000)], 'ok');

        await expect(executor.execute(fetch.fn)).resolves.toBe('ok');
        expect(delays).toEqual([5000]);
    });

    it('keeps the computed delay when Retry-After is shorter', async () => {
        const { delays, sleep } = recordingSleep();
        const executor = new RetryExecutor({ ...policy, random: () => 0.5, sleep });
        const fetch = failingThen([new RateLimitedError('Too many requests', 200)], 'ok');

        await executor.execute(fetch.fn);
        expect(delays).toEqual([1000]);
    });

    it('logs when the next attempt is due', async () => {
        jest.useFakeTimers({ now: Date.parse('2026-10-18T16:05:00Z') });
        try {
            const { sleep } = recordingSleep();
            const executor = new RetryExecutor({ ...policy, random: () => 0.5, sleep });
            const fetch = failingThen([new TransientError('reset')], 'ok');

            await executor.execute(fetch.fn, { label: 'downtown' });

            expect(logger.debug).toHaveBeenCalledWith('Retrying downtown in 1000ms', {
                attempt: 1,
                nextRetryAt: '2026-10-18T16:05:01.000Z',
                errorKind: 'Transient',
                error: 'reset',
            });
        } finally {
            jest.useRealTimers();
        }
    });

    it('gives up at once when Retry-After exceeds the maximum delay', async () => {
        const { delays, sleep } = recordingSleep();
        const executor = new RetryExecutor({ ...policy, random: () => 0.5, sleep });
        const limited = new RateLimitedError('OpenWeatherMap rate limit exceeded (429)', 24 * 60 * 60 * 1000);
        const fetch = failingThen([limited], 'ok');

        const error = await executor.execute(fetch.fn).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(RetriesExhaustedError);
        if (!(error instanceof RetriesExhaustedError)) return;
        expect(error.attempts).toBe(1);
        expect(error.lastError).toBe(limited);
        expect(fetch.calls()).toBe(1);
        expect(delays).toEqual([]);
    });

    it('honours a Retry-After equal to the maximum delay', async () => {
        const { delays, sleep } = recordingSleep();
        const executor = new RetryExecutor({ ...policy, random: () => 0.5, sleep });
        const fetch = failingThen([new RateLimitedError('Too many requests', 60000)], 'ok');

        await expect(executor.execute(fetch.fn)).resolves.toBe('ok');
        expect(delays).toEqual([60000]);
    });

    it('wraps unknown failures as transient and retries them', async () => {
        const { sleep } = recordingSleep();
        const executor = new RetryExecutor({ ...policy, maxAttempts: 2, random: () => 0.5, sleep });
        const fetch = failingThen([new Error('socket hang up'), new Error('socket hang up')], 'never');

        const error = await executor.execute(fetch.fn).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(RetriesExhaustedError);
        if (!(error instanceof RetriesExhaustedError)) return;
        expect(error.lastError).toBeInstanceOf(TransientError);
        expect(error.lastError.message).toBe('socket hang up');
    });

    it('stops with a cancellation when the signal aborts during backoff', async () => {
        const controller = new AbortController();
        const executor = new RetryExecutor({
            ...policy,
            sleep: async () => { controller.abort(); },
        });
        const transient = new TransientError('reset');
        const fetch = failingThen([transient, transient, transient], 'never');

        const error = await executor.execute(fetch.fn, { label: 'downtown', signal: controller.signal }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(FetchCancelledError);
        if (!(error instanceof FetchCancelledError)) return;
        expect(error.kind).toBe('Cancelled');
        expect(error.attempts).toBe(1);
        expect(error.lastError).toBe(transient);
        expect(fetch.calls()).toBe(1);
    });

    it('does not start when the signal is already aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const executor = new RetryExecutor(policy);
        const fetch = failingThen([], 'ok');

        await expect(executor.execute(fetch.fn, { signal: controller.signal })).rejects.toBeInstanceOf(FetchCancelledError);
        expect(fetch.calls()).toBe(0);
    });
});

describe('abortableSleep', () => {
    it('resolves early when aborted', async () => {
        jest.useFakeTimers();
        try {
            const controller = new AbortController();
            const sleeping = abortableSleep(60000, controller.signal);
            controller.abort();
            await expect(sleeping).resolves.toBeUndefined();
            expect(jest.getTimerCount()).toBe(0);
        } finally {
            jest.useRealTimers();
        }
    });

    it('resolves after the delay', async () => {
        jest.useFakeTimers();
        try {
            let done = false;
            const sleeping = abortableSleep(1000).then(() => { done = true; });
            await jest.advanceTimersByTimeAsync(999);
            expect(done).toBe(false);
            await jest.advanceTimersByTimeAsync(1);
            await sleeping;
            expect(done).toBe(true);
        } finally {
            jest.useRealTimers();
        }
    });
});
