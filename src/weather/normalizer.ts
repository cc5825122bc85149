/**
 * Normalization boundary: raw provider body -> Reading.
 * Field renames and unit handling happen here and nowhere else.
 */

import { MalformedPayloadError } from '../ingestion/errors.js';
import type { UnitSystem } from '../config.js';
import { owmCurrentResponseSchema } from './openweather-schema.js';
import type { OWMCurrentResponse } from './openweather-schema.js';
import type { Location, Reading } from './types.js';

export interface NormalizeOptions {
    units: UnitSystem;
    fetchedAt: Date;
}

/**
 * Parse the body text and validate it. Throws MalformedPayloadError on any failure.
 */
export function parseCurrentWeather(body: string): OWMCurrentResponse {
    let payload: unknown;
    try {
        payload = JSON.parse(body);
    } catch (error) {
        throw new MalformedPayloadError('Response body is not valid JSON', [], { cause: error });
    }

    const result = owmCurrentResponseSchema.safeParse(payload);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new MalformedPayloadError(`Response failed schema validation: ${issues.join('; ')}`, issues);
    }
    return result.data;
}

export function normalizeCurrentWeather(
    body: string,
    location: Location,
    options: NormalizeOptions
): Reading {
    const data = parseCurrentWeather(body);
    const condition = data.weather[0];

    return {
        locationId: location.id,
        observedAt: fromUnixSeconds(data.dt),
        fetchedAt: options.fetchedAt,
        temperature: data.main.temp,
        feelsLike: data.main.feels_like,
        humidity: data.main.humidity,
        pressure: data.main.pressure,
        visibility: data.visibility ?? null,
        windSpeed: data.wind.speed,
        windDirection: Math.round(data.wind.deg) % 360,
        cloudCoverage: data.clouds.all,
        conditionCode: condition.id,
        conditionMain: condition.main,
        conditionDescription: condition.description,
        sunrise: fromUnixSeconds(data.sys.sunrise),
        sunset: fromUnixSeconds(data.sys.sunset),
        units: options.units,
        rawPayload: body,
    };
}

function fromUnixSeconds(seconds: number): Date {
    return new Date(seconds * 1000);
}
