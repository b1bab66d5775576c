/**
 * OpenWeather Provider
 * Daily forecast from the One Call 3.0 API
 */

import { UpstreamError, UpstreamErrorType } from '../errors';
import { beaufort } from './beaufort';
import { UpstreamClient } from './upstream.client';
import { openWeatherOneCallSchema, WeatherDay } from './provider.types';

export const OPENWEATHER_BASE_URL = 'https://api.openweathermap.org';

export interface OpenWeatherConfig {
  apiKey?: string;
  latitude: number;
  longitude: number;
}

const fromUnix = (seconds: number | undefined): Date | undefined =>
  seconds === undefined ? undefined : new Date(seconds * 1000);

export class OpenWeatherProvider {
  constructor(
    private readonly client: UpstreamClient,
    private readonly config: OpenWeatherConfig
  ) {}

  async fetchDailyForecast(signal?: AbortSignal): Promise<WeatherDay[]> {
    if (!this.config.apiKey) {
      throw new UpstreamError(UpstreamErrorType.NOT_CONFIGURED, 'OPENWEATHER_KEY not set');
    }

    const body = await this.client.getJson(
      '/data/3.0/onecall',
      {
        lat: this.config.latitude,
        lon: this.config.longitude,
        exclude: 'minutely,hourly,alerts,current',
        units: 'metric',
        appid: this.config.apiKey,
      },
      openWeatherOneCallSchema,
      signal
    );

    return body.daily.map((day) => ({
      ...day,
      dt: new Date(day.dt * 1000),
      sunrise: fromUnix(day.sunrise),
      sunset: fromUnix(day.sunset),
      moonrise: fromUnix(day.moonrise),
      moonset: fromUnix(day.moonset),
      wind_speed_beaufort: beaufort(day.wind_speed),
      wind_gust_beaufort: day.wind_gust === undefined ? undefined : beaufort(day.wind_gust),
    }));
  }
}
