/**
 * Location list loading. The list is read once at startup and frozen.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../config.js';
import { describeError } from '../ingestion/errors.js';
import type { Location } from './types.js';

const locationEntrySchema = z.object({
    id: z.string().regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, 'id must be kebab-case'),
    name: z.string().trim().min(1),
    lat: z.number().min(-90).max(90),
    lon: z.number().min(-180).max(180),
    description: z.string().optional(),
});

const locationListSchema = z.array(locationEntrySchema);

/**
 * Validate a parsed locations document. Throws ConfigError on any problem.
 */
export function parseLocations(raw: unknown): readonly Location[] {
    const result = locationListSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid location list: ${issues.join('; ')}`);
    }
    if (result.data.length === 0) {
        throw new ConfigError('Location list is empty');
    }

    const seen = new Set<string>();
    const locations: Location[] = [];
    for (const entry of result.data) {
        if (seen.has(entry.id)) {
            throw new ConfigError(`Duplicate location id: ${entry.id}`);
        }
        seen.add(entry.id);
        locations.push(Object.freeze({
            id: entry.id,
            name: entry.name,
            coordinates: Object.freeze({ lat: entry.lat, lon: entry.lon }),
            ...(entry.description !== undefined && { description: entry.description }),
        }));
    }
    return Object.freeze(locations);
}

export function loadLocations(filePath: string): readonly Location[] {
    const resolved = path.resolve(process.cwd(), filePath);
    let text: string;
    try {
        text = fs.readFileSync(resolved, 'utf8');
    } catch (error) {
        throw new ConfigError(`Cannot read locations file ${resolved}: ${describeError(error)}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ConfigError(`Locations file ${resolved} is not valid JSON: ${describeError(error)}`);
    }
    return parseLocations(raw);
}
