/**
 * Ingestion Pipeline
 * Wires configuration, quota, client, retry policy, store and scheduler together.
 */

import { logger } from './logger.js';
import type { IngestionConfig } from './config.js';
import { LocationFetchOrchestrator } from './ingestion/fetch-orchestrator.js';
import type { CycleResult } from './ingestion/fetch-orchestrator.js';
import { QuotaTracker } from './ingestion/quota-tracker.js';
import { RetryExecutor } from './ingestion/retry-executor.js';
import { CycleScheduler } from './ingestion/scheduler.js';
import { SqliteReadingStore } from './storage/reading-store.js';
import { OpenWeatherClient } from './weather/openweather-client.js';
import type { Location, WeatherFetcher } from './weather/types.js';

export interface IngestionPipelineDeps {
    /** Replaces the OpenWeatherMap client */
    fetcher?: WeatherFetcher;
    store?: SqliteReadingStore;
    now?: () => number;
}

export class IngestionPipeline {
    readonly store: SqliteReadingStore;
    readonly quota: QuotaTracker;
    readonly orchestrator: LocationFetchOrchestrator;
    readonly scheduler: CycleScheduler;
    private readonly config: IngestionConfig;
    private readonly locations: readonly Location[];

    constructor(config: IngestionConfig, locations: readonly Location[], deps: IngestionPipelineDeps = {}) {
        this.config = config;
        this.locations = locations;
        const now = deps.now ?? Date.now;

        this.store = deps.store ?? new SqliteReadingStore(config.databasePath);
        this.quota = new QuotaTracker({ ...config.quota, now });
        this.quota.on('quotaExceeded', (event: { window: string }) => {
            logger.debug(`Quota refused a call (${event.window} window)`);
        });

        const fetcher = deps.fetcher ?? new OpenWeatherClient({
            apiKey: config.openWeatherApiKey,
            baseUrl: config.openWeatherBaseUrl,
            units: config.units,
            timeoutMs: config.requestTimeoutMs,
            quota: this.quota,
            now,
        });

        this.orchestrator = new LocationFetchOrchestrator({
            fetcher,
            executor: new RetryExecutor(config.retry),
            store: this.store,
            quota: this.quota,
            now,
        });

        this.scheduler = new CycleScheduler({
            runner: this.orchestrator,
            locations,
            intervalMs: config.pollIntervalMs,
            now,
        });

        logger.info(`Initialized ingestion pipeline with ${locations.length} locations: ${locations.map(l => l.id).join(', ')}`, {
            units: config.units,
            databasePath: config.databasePath,
        });
    }

    start(): void {
        this.scheduler.start();
    }

    /**
     * Graceful shutdown: drain the scheduler, then close the database
     */
    async stop(): Promise<boolean> {
        const drained = await this.scheduler.stop(this.config.shutdownGraceMs);
        this.store.close();
        return drained;
    }

    /**
     * Run exactly one cycle outside the scheduler
     */
    async runOnce(): Promise<CycleResult> {
        return this.orchestrator.runCycle(this.locations);
    }
}
