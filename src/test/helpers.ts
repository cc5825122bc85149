/**
 * Shared test data
 */

import type { Location, Reading } from '../weather/types.js';

export const DOWNTOWN: Location = {
    id: 'downtown',
    name: 'Downtown Ithaca',
    coordinates: { lat: 42.443, lon: -76.5019 },
};

export const CORNELL: Location = {
    id: 'cornell-campus',
    name: 'Cornell Campus',
    coordinates: { lat: 42.4534, lon: -76.4735 },
};

export const ITHACA_COLLEGE: Location = {
    id: 'ithaca-college',
    name: 'Ithaca College',
    coordinates: { lat: 42.4206, lon: -76.4951 },
};

export const CAYUGA_LAKE: Location = {
    id: 'cayuga-lake',
    name: 'Cayuga Lake',
    coordinates: { lat: 42.4301, lon: -76.537 },
};

export const ALL_LOCATIONS: readonly Location[] = [DOWNTOWN, CORNELL, ITHACA_COLLEGE, CAYUGA_LAKE];

// 2026-10-18T16:00:00Z
export const OBSERVED_DT = 1792339200;

/**
 * A current-weather body in the provider's shape
 */
export function owmPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        coord: { lon: -76.5019, lat: 42.443 },
        weather: [{ id: 803, main: 'Clouds', description: 'broken clouds', icon: '04d' }],
        base: 'stations',
        main: { temp: 12.5, feels_like: 11.8, temp_min: 11.1, temp_max: 13.9, pressure: 1016, humidity: 71 },
        visibility: 10000,
        wind: { speed: 4.1, deg: 250 },
        clouds: { all: 75 },
        dt: OBSERVED_DT,
        sys: { type: 2, id: 2000, country: 'US', sunrise: 1792317600, sunset: 1792357200 },
        timezone: -14400,
        id: 5122432,
        name: 'Ithaca',
        cod: 200,
        ...overrides,
    };
}

export function makeReading(overrides: Partial<Reading> = {}): Reading {
    return {
        locationId: 'downtown',
        observedAt: new Date('2026-10-18T16:00:00Z'),
        fetchedAt: new Date('2026-10-18T16:05:00Z'),
        temperature: 12.5,
        feelsLike: 11.8,
        humidity: 71,
        pressure: 1016,
        visibility: 10000,
        windSpeed: 4.1,
        windDirection: 250,
        cloudCoverage: 75,
        conditionCode: 803,
        conditionMain: 'Clouds',
        conditionDescription: 'broken clouds',
        sunrise: new Date('2026-10-18T10:00:00Z'),
        sunset: new Date('2026-10-18T21:00:00Z'),
        units: 'metric',
        rawPayload: '{}',
        ...overrides,
    };
}
