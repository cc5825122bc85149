/**
 * OpenWeatherMap API Client
 * Current conditions per location, behind a quota budget.
 * Documentation: https://openweathermap.org/api
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { logger } from '../logger.js';
import type { UnitSystem } from '../config.js';
import {
    ClientError,
    describeError,
    IngestionError,
    QuotaExceededError,
    RateLimitedError,
    TransientError,
} from '../ingestion/errors.js';
import { QuotaTracker } from '../ingestion/quota-tracker.js';
import { normalizeCurrentWeather } from './normalizer.js';
import type { Location, Reading, WeatherFetcher } from './types.js';

export interface OpenWeatherClientOptions {
    apiKey: string;
    baseUrl?: string;
    units?: UnitSystem;
    timeoutMs?: number;
    quota: QuotaTracker;
    /** Pre-built axios instance (tests pass one with a custom adapter) */
    http?: AxiosInstance;
    now?: () => number;
}

/**
 * Parse a Retry-After header: delay-seconds or an HTTP-date
 */
export function parseRetryAfter(value: unknown, nowMs: number): number | undefined {
    if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
        return value * 1000;
    }
    if (typeof value !== 'string' || value.trim() === '') {
        return undefined;
    }
    const trimmed = value.trim();
    if (/^\d+$/.test(trimmed)) {
        return Number(trimmed) * 1000;
    }
    const date = Date.parse(trimmed);
    if (Number.isNaN(date)) {
        return undefined;
    }
    return Math.max(0, date - nowMs);
}

export class OpenWeatherClient implements WeatherFetcher {
    private client: AxiosInstance;
    private apiKey: string;
    private units: UnitSystem;
    private quota: QuotaTracker;
    private now: () => number;

    constructor(options: OpenWeatherClientOptions) {
        this.apiKey = options.apiKey;
        this.units = options.units ?? 'metric';
        this.quota = options.quota;
        this.now = options.now ?? Date.now;
        this.client = options.http ?? axios.create({
            baseURL: options.baseUrl ?? 'https://api.openweathermap.org/data/2.5',
            timeout: options.timeoutMs ?? 10000,
        });
    }

    /**
     * Fetch current conditions for a location and normalize them.
     * Spends one unit of quota per call that reaches the network.
     */
    async fetch(location: Location): Promise<Reading> {
        const consumed = this.quota.tryConsume();
        if (!consumed.allowed) {
            throw new QuotaExceededError(`Quota exhausted for the current ${consumed.window} window`, consumed.window);
        }

        let body: unknown;
        try {
            const response = await this.client.get<unknown>('/weather', {
                params: {
                    lat: location.coordinates.lat,
                    lon: location.coordinates.lon,
                    appid: this.apiKey,
                    units: this.units,
                },
                responseType: 'text',
                // Keep the body verbatim; parsing happens at the normalization boundary
                transformResponse: [(data: unknown) => data],
            });
            body = response.data;
        } catch (error) {
            const classified = this.classifyError(error);
            logger.debug(`OpenWeatherMap request failed for ${location.id}`, {
                errorKind: classified.kind,
                error: classified.message,
            });
            throw classified;
        }

        const text = typeof body === 'string' ? body : JSON.stringify(body);
        return normalizeCurrentWeather(text, location, {
            units: this.units,
            fetchedAt: new Date(this.now()),
        });
    }

    private classifyError(error: unknown): IngestionError {
        if (!axios.isAxiosError(error)) {
            return new TransientError(describeError(error), undefined, { cause: error });
        }

        const status = error.response?.status;
        if (status === undefined) {
            // Timeout, connection reset, DNS: no HTTP response at all
            return new TransientError(`Network error (${error.code ?? 'unknown'}): ${error.message}`, undefined, { cause: error });
        }
        if (status === 429) {
            const retryAfterMs = parseRetryAfter(error.response?.headers['retry-after'], this.now());
            return new RateLimitedError('OpenWeatherMap rate limit exceeded (429)', retryAfterMs, { cause: error });
        }
        if (status >= 500) {
            return new TransientError(`OpenWeatherMap server error (${status})`, status, { cause: error });
        }
        if (status >= 400) {
            return new ClientError(`OpenWeatherMap rejected the request (${status})`, status, { cause: error });
        }
        return new TransientError(`Unexpected HTTP status ${status}`, status, { cause: error });
    }
}
