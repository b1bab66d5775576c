/**
 * Conditions Service
 * Weather forecast, sunrise/sunset, moon phase and marine forecast served
 * from the dataset cache
 */

import { CacheReadResult, Dataset, DatasetCacheManager, KeyedDatasets } from '../../lib/cache';
import {
  MarineForecast,
  MarineQuery,
  MoonPhase,
  SunriseSunset,
  SunriseSunsetQuery,
  WeatherDay,
} from '../../lib/providers';
import { RefreshInterval } from '../tides/tides.service';
import { ConditionsDataset, ConditionsServiceConfig, ConditionsSources } from './conditions.types';

export class ConditionsService {
  readonly weather: Dataset<readonly WeatherDay[]>;
  private readonly sunriseSunset: KeyedDatasets<SunriseSunsetQuery, SunriseSunset>;
  private readonly moonPhase: KeyedDatasets<number, MoonPhase>;
  private readonly marine: KeyedDatasets<MarineQuery, MarineForecast>;

  constructor(
    cache: DatasetCacheManager,
    sources: ConditionsSources,
    private readonly config: ConditionsServiceConfig
  ) {
    this.weather = cache.register<readonly WeatherDay[]>({
      name: ConditionsDataset.WEATHER,
      ttlMs: config.weatherTtlMs,
      timeoutMs: config.fetchTimeoutMs,
      fetch: (signal) => sources.weather.fetchDailyForecast(signal),
    });

    this.sunriseSunset = new KeyedDatasets<SunriseSunsetQuery, SunriseSunset>(cache, {
      prefix: ConditionsDataset.SUNRISE_SUNSET,
      ttlMs: config.sunMoonTtlMs,
      limit: config.keyedLimit,
      timeoutMs: config.fetchTimeoutMs,
      key: (query) => `${query.latitude}:${query.longitude}:${query.date}`,
      fetch: (query, signal) => sources.sunriseSunset.fetchDay(query, signal),
    });

    this.moonPhase = new KeyedDatasets<number, MoonPhase>(cache, {
      prefix: ConditionsDataset.MOON_PHASE,
      ttlMs: config.sunMoonTtlMs,
      limit: config.keyedLimit,
      timeoutMs: config.fetchTimeoutMs,
      key: (timestamp) => String(timestamp),
      fetch: (timestamp, signal) => sources.moonPhase.fetchPhase(timestamp, signal),
    });

    this.marine = new KeyedDatasets<MarineQuery, MarineForecast>(cache, {
      prefix: ConditionsDataset.MARINE,
      ttlMs: config.marineTtlMs,
      limit: config.keyedLimit,
      timeoutMs: config.fetchTimeoutMs,
      key: (query) =>
        `${query.latitude}:${query.longitude}:${query.hourly}:${query.timeformat}:${query.forecastHours}`,
      fetch: (query, signal) => sources.marine.fetchForecast(query, signal),
    });
  }

  getWeather(): Promise<CacheReadResult<readonly WeatherDay[]>> {
    return this.weather.get();
  }

  getSunriseSunset(query: SunriseSunsetQuery): Promise<CacheReadResult<SunriseSunset>> {
    return this.sunriseSunset.get(query);
  }

  /**
   * Moon phase at a unix timestamp (seconds)
   */
  getMoonPhase(timestamp: number): Promise<CacheReadResult<MoonPhase>> {
    return this.moonPhase.get(timestamp);
  }

  getMarineForecast(query: MarineQuery): Promise<CacheReadResult<MarineForecast>> {
    return this.marine.get(query);
  }

  refreshIntervals(): RefreshInterval[] {
    return [{ name: ConditionsDataset.WEATHER, intervalMs: this.config.weatherTtlMs }];
  }
}
