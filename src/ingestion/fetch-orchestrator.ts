/**
 * Location Fetch Orchestrator
 * Runs one poll cycle: one fetch per location, concurrently, each through the retry executor.
 *
 * - A failing location never stops the others
 * - When the quota cannot cover every location, the stalest ones go first and the rest are deferred
 * - All successful readings are handed to the store as a single batch
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { logger, rateLimitedLogger } from '../logger.js';
import type { PersistResult, ReadingSink } from '../storage/reading-store.js';
import type { Location, Reading, WeatherFetcher } from '../weather/types.js';
import { IngestionError, toIngestionError } from './errors.js';
import { QuotaTracker } from './quota-tracker.js';
import { RetryExecutor } from './retry-executor.js';

export interface LocationFailure {
    location: Location;
    error: IngestionError;
}

export interface CycleResult {
    cycleId: string;
    startedAt: Date;
    finishedAt: Date;
    succeeded: Reading[];
    failed: LocationFailure[];
    deferred: Location[];
    persisted: PersistResult;
}

export interface LocationFetchOrchestratorOptions {
    fetcher: WeatherFetcher;
    executor: RetryExecutor;
    store: ReadingSink;
    quota: QuotaTracker;
    now?: () => number;
}

function failureLogKey(location: Location): string {
    return `fetch-failed:${location.id}`;
}

type LocationOutcome =
    | { status: 'succeeded'; reading: Reading }
    | { status: 'failed'; failure: LocationFailure };

export class LocationFetchOrchestrator extends EventEmitter {
    private readonly fetcher: WeatherFetcher;
    private readonly executor: RetryExecutor;
    private readonly store: ReadingSink;
    private readonly quota: QuotaTracker;
    private readonly now: () => number;

    // locationId -> epoch ms of the last fetch that made it into the store
    private lastSuccess: Map<string, number> = new Map();

    constructor(options: LocationFetchOrchestratorOptions) {
        super();
        this.fetcher = options.fetcher;
        this.executor = options.executor;
        this.store = options.store;
        this.quota = options.quota;
        this.now = options.now ?? Date.now;

        for (const [locationId, fetchedAt] of this.store.lastFetchedAtByLocation()) {
            this.lastSuccess.set(locationId, fetchedAt.getTime());
        }
    }

    /**
     * Last successful fetch time for a location, if any
     */
    public getLastSuccess(locationId: string): Date | undefined {
        const value = this.lastSuccess.get(locationId);
        return value === undefined ? undefined : new Date(value);
    }

    /**
     * Split locations into the ones this cycle can afford and the ones deferred.
     * Never-fetched locations come first, then oldest success; ties keep configured order.
     */
    public prioritize(locations: readonly Location[], budget: number): { selected: Location[]; deferred: Location[] } {
        if (budget >= locations.length) {
            return { selected: [...locations], deferred: [] };
        }

        const ranked = locations
            .map((location, index) => ({
                location,
                index,
                lastSuccess: this.lastSuccess.get(location.id) ?? Number.NEGATIVE_INFINITY,
            }))
            .sort((a, b) => (a.lastSuccess - b.lastSuccess) || (a.index - b.index));

        const cut = Math.max(0, budget);
        const selectedIds = new Set(ranked.slice(0, cut).map(entry => entry.location.id));

        return {
            selected: locations.filter(location => selectedIds.has(location.id)),
            deferred: locations.filter(location => !selectedIds.has(location.id)),
        };
    }

    /**
     * Run a complete poll cycle. Throws StorageFailureError if the batch cannot be persisted.
     */
    public async runCycle(locations: readonly Location[], signal?: AbortSignal): Promise<CycleResult> {
        const cycleId = randomUUID();
        const startedAt = new Date(this.now());

        const { selected, deferred } = this.prioritize(locations, this.quota.remaining());
        if (deferred.length > 0) {
            logger.warn(`Quota covers ${selected.length} of ${locations.length} locations, deferring the rest`, {
                cycleId,
                deferred: deferred.map(location => location.id),
            });
        }

        const outcomes = await Promise.all(selected.map(location => this.fetchLocation(location, cycleId, signal)));

        const succeeded: Reading[] = [];
        const failed: LocationFailure[] = [];
        for (const outcome of outcomes) {
            if (outcome.status === 'succeeded') {
                succeeded.push(outcome.reading);
            } else {
                failed.push(outcome.failure);
            }
        }

        // One batch per cycle; a StorageFailureError propagates to the scheduler
        const persisted = this.store.persist(succeeded);
        for (const reading of succeeded) {
            this.lastSuccess.set(reading.locationId, reading.fetchedAt.getTime());
        }

        const result: CycleResult = {
            cycleId,
            startedAt,
            finishedAt: new Date(this.now()),
            succeeded,
            failed,
            deferred,
            persisted,
        };

        logger.info('Poll cycle complete', {
            cycleId,
            succeeded: succeeded.length,
            failed: failed.length,
            deferred: deferred.length,
            inserted: persisted.inserted,
            skippedDuplicate: persisted.skippedDuplicate,
            durationMs: result.finishedAt.getTime() - startedAt.getTime(),
        });
        this.emit('cycleCompleted', result);

        return result;
    }

    private async fetchLocation(location: Location, cycleId: string, signal?: AbortSignal): Promise<LocationOutcome> {
        try {
            const reading = await this.executor.execute(
                () => this.fetcher.fetch(location),
                { label: location.id, signal }
            );
            // A later failure of this location is worth a fresh log line
            rateLimitedLogger.reset(failureLogKey(location));
            logger.debug(`Fetched ${location.id}`, {
                cycleId,
                observedAt: reading.observedAt.toISOString(),
                temperature: reading.temperature,
                condition: reading.conditionDescription,
            });
            return { status: 'succeeded', reading };
        } catch (raw) {
            const error = toIngestionError(raw);
            rateLimitedLogger.warn(failureLogKey(location), `Fetch failed for ${location.id}`, {
                cycleId,
                locationId: location.id,
                errorKind: error.kind,
                error: error.message,
            });
            this.emit('locationFailed', { cycleId, location, error });
            return { status: 'failed', failure: { location, error } };
        }
    }
}
