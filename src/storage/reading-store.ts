/**
 * Reading Store
 * Durable SQLite time-series of normalized readings.
 *
 * The composite primary key (location_id, observed_at) is what keeps history free of
 * duplicates, across concurrent writers and restarts alike. Each batch is one transaction.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from '../logger.js';
import type { UnitSystem } from '../config.js';
import { describeError, StorageFailureError } from '../ingestion/errors.js';
import type { Reading } from '../weather/types.js';

export interface PersistResult {
    inserted: number;
    skippedDuplicate: number;
}

/**
 * What the orchestrator needs from storage
 */
export interface ReadingSink {
    persist(readings: readonly Reading[]): PersistResult;
    lastFetchedAtByLocation(): Map<string, Date>;
}

/**
 * Read-only contract for dashboard/analytics consumers
 */
export interface ReadingQueries {
    queryRange(locationId: string, from: Date, to: Date): Iterable<Reading>;
    latestReading(locationId: string): Reading | undefined;
    recentReadings(hours: number, now?: number): Reading[];
    latestConditions(): Reading[];
}

interface ReadingRow {
    location_id: string;
    observed_at: number;
    fetched_at: number;
    temperature: number;
    feels_like: number;
    humidity: number;
    pressure: number;
    visibility: number | null;
    wind_speed: number;
    wind_direction: number;
    cloud_coverage: number;
    condition_code: number;
    condition_main: string;
    condition_description: string;
    sunrise: number;
    sunset: number;
    units: string;
    raw_payload: string;
}

const UNIT_SYSTEMS: readonly UnitSystem[] = ['metric', 'imperial', 'standard'];

function toUnitSystem(value: string): UnitSystem {
    const match = UNIT_SYSTEMS.find(unit => unit === value);
    if (!match) {
        throw new StorageFailureError(`Unknown unit system in storage: ${value}`);
    }
    return match;
}

function toRow(reading: Reading): ReadingRow {
    return {
        location_id: reading.locationId,
        observed_at: reading.observedAt.getTime(),
        fetched_at: reading.fetchedAt.getTime(),
        temperature: reading.temperature,
        feels_like: reading.feelsLike,
        humidity: reading.humidity,
        pressure: reading.pressure,
        visibility: reading.visibility,
        wind_speed: reading.windSpeed,
        wind_direction: reading.windDirection,
        cloud_coverage: reading.cloudCoverage,
        condition_code: reading.conditionCode,
        condition_main: reading.conditionMain,
        condition_description: reading.conditionDescription,
        sunrise: reading.sunrise.getTime(),
        sunset: reading.sunset.getTime(),
        units: reading.units,
        raw_payload: reading.rawPayload,
    };
}

function fromRow(row: ReadingRow): Reading {
    return {
        locationId: row.location_id,
        observedAt: new Date(row.observed_at),
        fetchedAt: new Date(row.fetched_at),
        temperature: row.temperature,
        feelsLike: row.feels_like,
        humidity: row.humidity,
        pressure: row.pressure,
        visibility: row.visibility,
        windSpeed: row.wind_speed,
        windDirection: row.wind_direction,
        cloudCoverage: row.cloud_coverage,
        conditionCode: row.condition_code,
        conditionMain: row.condition_main,
        conditionDescription: row.condition_description,
        sunrise: new Date(row.sunrise),
        sunset: new Date(row.sunset),
        units: toUnitSystem(row.units),
        rawPayload: row.raw_payload,
    };
}

export class SqliteReadingStore implements ReadingSink, ReadingQueries {
    private db: Database.Database;

    /**
     * @param dbPath file path, or ':memory:'
     */
    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
        }
        this.db = new Database(dbPath);
        this.db.pragma('journal_mode = WAL');
        this.init();
    }

    private init(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS readings (
                location_id TEXT NOT NULL,
                observed_at INTEGER NOT NULL,
                fetched_at INTEGER NOT NULL,
                temperature REAL NOT NULL,
                feels_like REAL NOT NULL,
                humidity INTEGER NOT NULL CHECK (humidity BETWEEN 0 AND 100),
                pressure REAL NOT NULL,
                visibility REAL,
                wind_speed REAL NOT NULL,
                wind_direction INTEGER NOT NULL CHECK (wind_direction BETWEEN 0 AND 359),
                cloud_coverage INTEGER NOT NULL CHECK (cloud_coverage BETWEEN 0 AND 100),
                condition_code INTEGER NOT NULL,
                condition_main TEXT NOT NULL,
                condition_description TEXT NOT NULL,
                sunrise INTEGER NOT NULL,
                sunset INTEGER NOT NULL,
                units TEXT NOT NULL CHECK (units IN ('metric', 'imperial', 'standard')),
                raw_payload TEXT NOT NULL,
                PRIMARY KEY (location_id, observed_at)
            )
        `);
        this.db.exec(`
            CREATE INDEX IF NOT EXISTS idx_readings_observed ON readings(observed_at DESC)
        `);
    }

    /**
     * Insert a batch atomically. Keys already present (or repeated within the batch)
     * are skipped and counted, not treated as errors.
     */
    persist(readings: readonly Reading[]): PersistResult {
        if (readings.length === 0) {
            return { inserted: 0, skippedDuplicate: 0 };
        }

        const insert = this.db.prepare<ReadingRow>(`
            INSERT INTO readings (
                location_id, observed_at, fetched_at, temperature, feels_like, humidity, pressure,
                visibility, wind_speed, wind_direction, cloud_coverage, condition_code,
                condition_main, condition_description, sunrise, sunset, units, raw_payload
            ) VALUES (
                @location_id, @observed_at, @fetched_at, @temperature, @feels_like, @humidity, @pressure,
                @visibility, @wind_speed, @wind_direction, @cloud_coverage, @condition_code,
                @condition_main, @condition_description, @sunrise, @sunset, @units, @raw_payload
            )
            ON CONFLICT (location_id, observed_at) DO NOTHING
        `);

        const insertBatch = this.db.transaction((batch: readonly Reading[]): PersistResult => {
            let inserted = 0;
            for (const reading of batch) {
                inserted += insert.run(toRow(reading)).changes;
            }
            return { inserted, skippedDuplicate: batch.length - inserted };
        });

        try {
            const result = insertBatch(readings);
            logger.debug('Persisted reading batch', { ...result, batchSize: readings.length });
            return result;
        } catch (error) {
            throw new StorageFailureError(`Failed to persist batch of ${readings.length} readings: ${describeError(error)}`, { cause: error });
        }
    }

    /**
     * Readings for one location with from <= observedAt <= to, oldest first.
     * Rows are pulled from SQLite as the iterator advances.
     */
    *queryRange(locationId: string, from: Date, to: Date): Generator<Reading, void, undefined> {
        const rows = this.db
            .prepare<[string, number, number], ReadingRow>(
                `SELECT * FROM readings WHERE location_id = ? AND observed_at BETWEEN ? AND ? ORDER BY observed_at ASC`
            )
            .iterate(locationId, from.getTime(), to.getTime());
        for (const row of rows) {
            yield fromRow(row);
        }
    }

    latestReading(locationId: string): Reading | undefined {
        const row = this.db
            .prepare<[string], ReadingRow>(
                `SELECT * FROM readings WHERE location_id = ? ORDER BY observed_at DESC LIMIT 1`
            )
            .get(locationId);
        return row ? fromRow(row) : undefined;
    }

    /**
     * Every location's readings observed in the last `hours`, newest first
     */
    recentReadings(hours: number, now: number = Date.now()): Reading[] {
        const since = now - hours * 60 * 60 * 1000;
        return this.db
            .prepare<[number], ReadingRow>(
                `SELECT * FROM readings WHERE observed_at > ? ORDER BY observed_at DESC, location_id ASC`
            )
            .all(since)
            .map(fromRow);
    }

    /**
     * Latest reading of each location, ordered by location id
     */
    latestConditions(): Reading[] {
        return this.db
            .prepare<[], ReadingRow>(`
                SELECT r.* FROM readings r
                JOIN (
                    SELECT location_id, MAX(observed_at) AS observed_at FROM readings GROUP BY location_id
                ) latest ON latest.location_id = r.location_id AND latest.observed_at = r.observed_at
                ORDER BY r.location_id ASC
            `)
            .all()
            .map(fromRow);
    }

    lastFetchedAtByLocation(): Map<string, Date> {
        const rows = this.db
            .prepare<[], { location_id: string; fetched_at: number }>(
                `SELECT location_id, MAX(fetched_at) AS fetched_at FROM readings GROUP BY location_id`
            )
            .all();
        return new Map(rows.map(row => [row.location_id, new Date(row.fetched_at)]));
    }

    count(locationId?: string): number {
        const row = locationId === undefined
            ? this.db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM readings`).get()
            : this.db.prepare<[string], { total: number }>(`SELECT COUNT(*) AS total FROM readings WHERE location_id = ?`).get(locationId);
        return row?.total ?? 0;
    }

    close(): void {
        this.db.close();
    }
}
