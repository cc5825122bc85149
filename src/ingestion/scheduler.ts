/**
 * Cycle Scheduler
 * Drives poll cycles on a fixed start-to-start cadence.
 *
 * State machine: Idle -> Running -> (Idle | Stopped). Stopped is terminal.
 * A cycle that overruns the interval is followed immediately by the next one;
 * missed ticks are dropped, never queued. After a restart the cadence simply resumes.
 */

import { EventEmitter } from 'events';
import { logger } from '../logger.js';
import type { Location } from '../weather/types.js';
import { describeError } from './errors.js';
import type { CycleResult } from './fetch-orchestrator.js';

export type SchedulerState = 'Idle' | 'Running' | 'Stopped';

export interface CycleRunner {
    runCycle(locations: readonly Location[], signal?: AbortSignal): Promise<CycleResult>;
}

export interface CycleSchedulerOptions {
    runner: CycleRunner;
    locations: readonly Location[];
    intervalMs: number;
    now?: () => number;
}

export class CycleScheduler extends EventEmitter {
    private readonly runner: CycleRunner;
    private readonly locations: readonly Location[];
    private readonly intervalMs: number;
    private readonly now: () => number;

    private state: SchedulerState = 'Idle';
    private started: boolean = false;
    private stopping: boolean = false;
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;
    private readonly abortController = new AbortController();
    private cycleCount: number = 0;

    constructor(options: CycleSchedulerOptions) {
        super();
        if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
            throw new Error('intervalMs must be positive');
        }
        this.runner = options.runner;
        this.locations = options.locations;
        this.intervalMs = options.intervalMs;
        this.now = options.now ?? Date.now;
    }

    public getState(): SchedulerState {
        return this.state;
    }

    public getCycleCount(): number {
        return this.cycleCount;
    }

    /**
     * Start polling. The first cycle runs right away.
     */
    public start(): void {
        if (this.state === 'Stopped' || this.stopping) {
            throw new Error('Scheduler has been stopped and cannot be restarted');
        }
        if (this.started) {
            return;
        }

        this.started = true;
        logger.info('Scheduler started', {
            intervalMinutes: this.intervalMs / 60000,
            locations: this.locations.map(location => location.id),
        });
        this.fire();
    }

    /**
     * Stop scheduling, interrupt retry sleeps and wait for the in-flight cycle
     * (at most `graceMs`). Resolves true if the cycle drained in time.
     */
    public async stop(graceMs: number = 30000): Promise<boolean> {
        if (this.state === 'Stopped') {
            return true;
        }
        if (this.stopping) {
            return this.drain(graceMs);
        }

        this.stopping = true;
        logger.info('Scheduler stopping', { inFlight: this.inFlight !== null });

        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        this.abortController.abort();

        const drained = await this.drain(graceMs);
        if (!drained) {
            logger.warn(`In-flight cycle did not finish within ${graceMs}ms grace period`);
        }

        this.state = 'Stopped';
        this.emit('stopped', { drained });
        logger.info('Scheduler stopped', { cycles: this.cycleCount, drained });
        return drained;
    }

    private async drain(graceMs: number): Promise<boolean> {
        const inFlight = this.inFlight;
        if (!inFlight) {
            return true;
        }

        let graceTimer: NodeJS.Timeout | undefined;
        const timeout = new Promise<boolean>(resolve => {
            graceTimer = setTimeout(() => resolve(false), graceMs);
        });
        try {
            return await Promise.race([inFlight.then(() => true), timeout]);
        } finally {
            clearTimeout(graceTimer);
        }
    }

    private fire(): void {
        this.timer = null;
        if (this.stopping) {
            return;
        }
        this.inFlight = this.runOnce().finally(() => {
            this.inFlight = null;
        });
    }

    private async runOnce(): Promise<void> {
        const startedAt = this.now();
        this.state = 'Running';
        this.cycleCount++;
        this.emit('cycleStarted', { cycle: this.cycleCount, startedAt: new Date(startedAt) });

        try {
            const result = await this.runner.runCycle(this.locations, this.abortController.signal);
            this.emit('cycleCompleted', result);
        } catch (error) {
            // Storage failure or anything unexpected: this cycle is lost, the next one still runs
            logger.error('Poll cycle failed', { cycle: this.cycleCount, error: describeError(error) });
            this.emit('cycleFailed', error);
        }

        if (this.stopping) {
            return;
        }

        this.state = 'Idle';
        const elapsed = this.now() - startedAt;
        const delay = Math.max(0, this.intervalMs - elapsed);
        if (delay === 0) {
            logger.warn('Poll cycle overran the interval, starting next cycle immediately', {
                elapsedMs: elapsed,
                intervalMs: this.intervalMs,
            });
        }
        this.timer = setTimeout(() => this.fire(), delay);
    }
}
