/**
 * Conditions Types
 * Type definitions for weather, astronomy and marine endpoints
 */

import {
  MarineForecast,
  MarineQuery,
  MoonPhase,
  SunriseSunset,
  SunriseSunsetQuery,
  WeatherDay,
} from '../../lib/providers';

export enum ConditionsDataset {
  WEATHER = 'weather',
  SUNRISE_SUNSET = 'sun',
  MOON_PHASE = 'moon',
  MARINE = 'marine',
}

/**
 * Where conditions data comes from (the provider classes in production)
 */
export interface ConditionsSources {
  weather: { fetchDailyForecast(signal?: AbortSignal): Promise<WeatherDay[]> };
  sunriseSunset: { fetchDay(query: SunriseSunsetQuery, signal?: AbortSignal): Promise<SunriseSunset> };
  moonPhase: { fetchPhase(timestamp: number, signal?: AbortSignal): Promise<MoonPhase> };
  marine: { fetchForecast(query: MarineQuery, signal?: AbortSignal): Promise<MarineForecast> };
}

export interface ConditionsServiceConfig {
  weatherTtlMs: number;
  sunMoonTtlMs: number;
  marineTtlMs: number;
  keyedLimit: number;
  fetchTimeoutMs?: number;
}

export interface WeatherDayView
  extends Omit<WeatherDay, 'dt' | 'sunrise' | 'sunset' | 'moonrise' | 'moonset'> {
  dt: string;
  sunrise?: string;
  sunset?: string;
  moonrise?: string;
  moonset?: string;
}
