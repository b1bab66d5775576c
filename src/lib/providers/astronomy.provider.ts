/**
 * Astronomy Providers
 * Sunrise/sunset times and moon phase for a date
 */

import { UpstreamError, UpstreamErrorType } from '../errors';
import { UpstreamClient } from './upstream.client';
import { MoonPhase, moonPhaseSchema, SunriseSunset, sunriseSunsetSchema } from './provider.types';

export const SUNRISE_SUNSET_BASE_URL = 'https://api.sunrise-sunset.org';
export const FARMSENSE_BASE_URL = 'https://api.farmsense.net';

export interface SunriseSunsetQuery {
  date: string; // YYYY-MM-DD
  latitude: number;
  longitude: number;
}

export class SunriseSunsetProvider {
  constructor(
    private readonly client: UpstreamClient,
    private readonly timeZone: string
  ) {}

  async fetchDay(query: SunriseSunsetQuery, signal?: AbortSignal): Promise<SunriseSunset> {
    const body = await this.client.getJson(
      '/json',
      { lat: query.latitude, lng: query.longitude, date: query.date, formatted: 0 },
      sunriseSunsetSchema,
      signal
    );

    if (body.status !== 'OK') {
      throw new UpstreamError(UpstreamErrorType.UNKNOWN, `sunrise-sunset: status ${body.status}`, {
        retryable: false,
      });
    }

    return { ...body, tzid: this.timeZone };
  }
}

export class MoonPhaseProvider {
  constructor(private readonly client: UpstreamClient) {}

  /**
   * Moon phase for a unix timestamp (seconds)
   */
  async fetchPhase(timestamp: number, signal?: AbortSignal): Promise<MoonPhase> {
    const body = await this.client.getJson('/v1/moonphases/', { d: timestamp }, moonPhaseSchema, signal);
    return Array.isArray(body) ? body[0] : body;
  }
}
