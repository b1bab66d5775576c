/**
 * Provider Types
 * Response schemas for the upstream providers and the internal shapes
 * they are converted into
 */

import { z } from 'zod';

// ============================================================================
// WorldTides
// ============================================================================

const worldTidesEnvelope = z.object({
  status: z.number().optional(),
  error: z.string().optional(),
});

export const worldTidesHeightsSchema = worldTidesEnvelope.extend({
  heights: z
    .array(
      z.object({
        dt: z.number(),
        height: z.number(),
      })
    )
    .default([]),
});

export const worldTidesExtremesSchema = worldTidesEnvelope.extend({
  extremes: z
    .array(
      z.object({
        dt: z.number(),
        height: z.number(),
        type: z.enum(['High', 'Low']),
      })
    )
    .default([]),
});

export interface TideExtreme {
  timestamp: Date;
  height: number;
  type: 'High' | 'Low';
}

// ============================================================================
// OpenWeather One Call
// ============================================================================

export const openWeatherDailySchema = z.object({
  dt: z.number(),
  sunrise: z.number().optional(),
  sunset: z.number().optional(),
  moonrise: z.number().optional(),
  moonset: z.number().optional(),
  moon_phase: z.number().optional(),
  summary: z.string().optional(),
  temp: z.object({
    day: z.number(),
    min: z.number(),
    max: z.number(),
    night: z.number(),
    eve: z.number(),
    morn: z.number(),
  }),
  feels_like: z.object({
    day: z.number(),
    night: z.number(),
    eve: z.number(),
    morn: z.number(),
  }),
  pressure: z.number(),
  humidity: z.number(),
  dew_point: z.number(),
  wind_speed: z.number().default(0),
  wind_gust: z.number().optional(),
  wind_deg: z.number(),
  weather: z.array(
    z.object({
      id: z.number(),
      main: z.string(),
      description: z.string(),
      icon: z.string(),
    })
  ),
  clouds: z.number(),
  pop: z.number(),
  uvi: z.number(),
});

export const openWeatherOneCallSchema = z.object({
  daily: z.array(openWeatherDailySchema).default([]),
});

type OpenWeatherDaily = z.infer<typeof openWeatherDailySchema>;

export interface WeatherDay
  extends Omit<OpenWeatherDaily, 'dt' | 'sunrise' | 'sunset' | 'moonrise' | 'moonset'> {
  dt: Date;
  sunrise?: Date;
  sunset?: Date;
  moonrise?: Date;
  moonset?: Date;
  wind_speed_beaufort: number;
  wind_gust_beaufort?: number;
}

// ============================================================================
// Astronomy and marine passthrough
// ============================================================================

export const sunriseSunsetSchema = z
  .object({
    results: z.record(z.union([z.string(), z.number()])),
    status: z.string(),
  })
  .passthrough();

export type SunriseSunset = z.infer<typeof sunriseSunsetSchema> & { tzid: string };

const moonPhaseRecord = z.record(z.unknown());

export const moonPhaseSchema = z.union([z.array(moonPhaseRecord).min(1), moonPhaseRecord]);

export type MoonPhase = z.infer<typeof moonPhaseRecord>;

export const marineForecastSchema = z
  .object({
    latitude: z.number(),
    longitude: z.number(),
    hourly_units: z.record(z.string()).optional(),
    hourly: z.record(z.array(z.union([z.number(), z.string(), z.null()]))).optional(),
  })
  .passthrough();

export type MarineForecast = z.infer<typeof marineForecastSchema>;

export interface MarineQuery {
  latitude: number;
  longitude: number;
  hourly: string;
  timeformat: string;
  forecastHours: number;
}
