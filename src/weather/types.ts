/**
 * Weather data types - the stable schema every provider response is normalized into
 */

import type { UnitSystem } from '../config.js';

export interface Coordinates {
    lat: number;
    lon: number;
}

/**
 * A configured place we poll. Immutable for the lifetime of the process.
 */
export interface Location {
    readonly id: string;
    readonly name: string;
    readonly coordinates: Readonly<Coordinates>;
    readonly description?: string;
}

/**
 * One normalized observation for one location.
 * `(locationId, observedAt)` identifies a Reading; it is never mutated after creation.
 */
export interface Reading {
    readonly locationId: string;
    /** Provider-reported observation time (UTC) */
    readonly observedAt: Date;
    /** Local retrieval time (UTC), for audit */
    readonly fetchedAt: Date;
    readonly temperature: number;
    readonly feelsLike: number;
    readonly humidity: number;        // 0-100 %
    readonly pressure: number;        // hPa
    readonly visibility: number | null; // meters, null when the provider omits it
    readonly windSpeed: number;
    readonly windDirection: number;   // 0-359 degrees
    readonly cloudCoverage: number;   // 0-100 %
    readonly conditionCode: number;
    readonly conditionMain: string;
    readonly conditionDescription: string;
    readonly sunrise: Date;
    readonly sunset: Date;
    readonly units: UnitSystem;
    /** Original response body, verbatim */
    readonly rawPayload: string;
}

/**
 * Anything that can produce a Reading for a location (the API client, or a test double)
 */
export interface WeatherFetcher {
    fetch(location: Location): Promise<Reading>;
}
