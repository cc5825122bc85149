/**
 * OpenWeatherMap current weather response, as far as we depend on it.
 * Documentation: https://openweathermap.org/current
 *
 * Unknown fields are stripped, not rejected; the verbatim body is kept on the Reading.
 */

import { z } from 'zod';

const unixSeconds = z.number().int().nonnegative();

export const owmCurrentResponseSchema = z.object({
    coord: z.object({
        lon: z.number(),
        lat: z.number(),
    }),
    weather: z.array(z.object({
        id: z.number().int(),
        main: z.string(),
        description: z.string(),
    })).min(1),
    main: z.object({
        temp: z.number(),
        feels_like: z.number(),
        pressure: z.number(),
        humidity: z.number().int().min(0).max(100),
    }),
    // Not always present (missing for some stations)
    visibility: z.number().nonnegative().optional(),
    wind: z.object({
        speed: z.number().nonnegative(),
        deg: z.number().min(0).max(360),
    }),
    clouds: z.object({
        all: z.number().int().min(0).max(100),
    }),
    dt: unixSeconds,
    sys: z.object({
        sunrise: unixSeconds,
        sunset: unixSeconds,
    }),
    name: z.string().optional(),
});

export type OWMCurrentResponse = z.infer<typeof owmCurrentResponseSchema>;
