/**
 * Marine Provider
 * Hourly sea level and current forecast from Open-Meteo
 */

import { UpstreamClient } from './upstream.client';
import { MarineForecast, marineForecastSchema, MarineQuery } from './provider.types';

export const OPEN_METEO_MARINE_BASE_URL = 'https://marine-api.open-meteo.com';

export const DEFAULT_MARINE_HOURLY = 'sea_level_height_msl,ocean_current_velocity,ocean_current_direction';

export class MarineProvider {
  constructor(private readonly client: UpstreamClient) {}

  fetchForecast(query: MarineQuery, signal?: AbortSignal): Promise<MarineForecast> {
    return this.client.getJson(
      '/v1/marine',
      {
        latitude: query.latitude,
        longitude: query.longitude,
        hourly: query.hourly,
        timeformat: query.timeformat,
        forecast_hours: query.forecastHours,
      },
      marineForecastSchema,
      signal
    );
  }
}
