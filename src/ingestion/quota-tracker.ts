/**
 * Quota Tracker
 * Tracks provider calls against a daily and a per-minute budget.
 *
 * Window keys are a pure function of the clock, so rollover is tested without a real clock.
 * `tryConsume()` checks and spends in one synchronous step; concurrent fetch tasks
 * on the event loop can never over-spend the budget.
 */

import { EventEmitter } from 'events';
import { logger } from '../logger.js';
import type { QuotaConfig } from '../config.js';

export type QuotaWindow = 'daily' | 'minute';

export interface QuotaTrackerOptions extends QuotaConfig {
    /** Fraction (0-1) of the daily limit at which a budgetWarning is emitted */
    warningThreshold?: number;
    now?: () => number;
}

export interface QuotaStats {
    dayKey: string;
    minuteKey: number;
    dailyUsed: number;
    dailyLimit: number;
    minuteUsed: number;
    perMinuteLimit: number;
    refused: number;
}

export type ConsumeResult =
    | { allowed: true }
    | { allowed: false; window: QuotaWindow };

/**
 * UTC calendar day, e.g. "2026-10-18"
 */
export function dayWindowKey(nowMs: number): string {
    return new Date(nowMs).toISOString().split('T')[0];
}

/**
 * Minutes since the epoch
 */
export function minuteWindowKey(nowMs: number): number {
    return Math.floor(nowMs / 60000);
}

export class QuotaTracker extends EventEmitter {
    private readonly dailyLimit: number;
    private readonly perMinuteLimit: number;
    private readonly warningThreshold: number;
    private readonly now: () => number;

    private dayKey: string;
    private minuteKey: number;
    private dailyUsed: number = 0;
    private minuteUsed: number = 0;
    private refused: number = 0;
    private warned: boolean = false;

    constructor(options: QuotaTrackerOptions) {
        super();
        if (!Number.isInteger(options.dailyLimit) || options.dailyLimit <= 0) {
            throw new Error('dailyLimit must be a positive integer');
        }
        if (!Number.isInteger(options.perMinuteLimit) || options.perMinuteLimit <= 0) {
            throw new Error('perMinuteLimit must be a positive integer');
        }
        this.dailyLimit = options.dailyLimit;
        this.perMinuteLimit = options.perMinuteLimit;
        this.warningThreshold = options.warningThreshold ?? 0.8;
        this.now = options.now ?? Date.now;

        const now = this.now();
        this.dayKey = dayWindowKey(now);
        this.minuteKey = minuteWindowKey(now);
    }

    /**
     * Spend one call if both windows have room. Nothing is spent when refused.
     */
    public tryConsume(): ConsumeResult {
        this.rollWindows();

        if (this.dailyUsed >= this.dailyLimit) {
            return this.refuse('daily');
        }
        if (this.minuteUsed >= this.perMinuteLimit) {
            return this.refuse('minute');
        }

        this.dailyUsed++;
        this.minuteUsed++;

        if (!this.warned && this.dailyUsed >= Math.ceil(this.dailyLimit * this.warningThreshold)) {
            this.warned = true;
            this.emit('budgetWarning', {
                dailyUsed: this.dailyUsed,
                dailyLimit: this.dailyLimit,
                percentage: (this.dailyUsed / this.dailyLimit) * 100,
            });
            logger.warn(`API budget warning: ${(this.dailyUsed / this.dailyLimit * 100).toFixed(1)}% of daily limit used`);
        }

        return { allowed: true };
    }

    /**
     * Calls still available right now: the smaller of the two windows
     */
    public remaining(): number {
        this.rollWindows();
        return Math.max(0, Math.min(
            this.dailyLimit - this.dailyUsed,
            this.perMinuteLimit - this.minuteUsed
        ));
    }

    public getStats(): QuotaStats {
        this.rollWindows();
        return {
            dayKey: this.dayKey,
            minuteKey: this.minuteKey,
            dailyUsed: this.dailyUsed,
            dailyLimit: this.dailyLimit,
            minuteUsed: this.minuteUsed,
            perMinuteLimit: this.perMinuteLimit,
            refused: this.refused,
        };
    }

    private refuse(window: QuotaWindow): ConsumeResult {
        this.refused++;
        this.emit('quotaExceeded', {
            window,
            dailyUsed: this.dailyUsed,
            minuteUsed: this.minuteUsed,
        });
        return { allowed: false, window };
    }

    private rollWindows(): void {
        const now = this.now();

        const today = dayWindowKey(now);
        if (today !== this.dayKey) {
            const previous = { dayKey: this.dayKey, dailyUsed: this.dailyUsed, refused: this.refused };
            this.dayKey = today;
            this.dailyUsed = 0;
            this.refused = 0;
            this.warned = false;
            this.emit('windowRollover', previous);
            logger.info('Quota tracker: day rollover, counters reset', { newDate: today, previousCalls: previous.dailyUsed });
        }

        const minute = minuteWindowKey(now);
        if (minute !== this.minuteKey) {
            this.minuteKey = minute;
            this.minuteUsed = 0;
        }
    }
}
