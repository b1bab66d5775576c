/**
 * WorldTides Provider
 * Half-hour tide heights (chart datum) and high/low extremes
 */

import { UpstreamError, UpstreamErrorType } from '../errors';
import { TideSample } from '../gate';
import { UpstreamClient } from './upstream.client';
import { TideExtreme, worldTidesExtremesSchema, worldTidesHeightsSchema } from './provider.types';

export const WORLDTIDES_BASE_URL = 'https://www.worldtides.info';
const API_PATH = '/api/v3';
const DAY_MS = 24 * 60 * 60 * 1000;
const EXTREMES_CHUNK_DAYS = 7;

export interface WorldTidesConfig {
  apiKey?: string;
  latitude: number;
  longitude: number;
  now?: () => Date;
}

function byTimestamp<T extends { timestamp: Date }>(a: T, b: T): number {
  return a.timestamp.getTime() - b.timestamp.getTime();
}

/**
 * Sort by time and keep the first of any samples sharing a timestamp
 */
function orderSeries<T extends { timestamp: Date }>(items: T[]): T[] {
  const sorted = [...items].sort(byTimestamp);
  return sorted.filter((item, index) => index === 0 || item.timestamp.getTime() !== sorted[index - 1].timestamp.getTime());
}

function rejectErrorBody(body: { status?: number; error?: string }): void {
  if (body.error) {
    throw new UpstreamError(UpstreamErrorType.UNKNOWN, `WorldTides: ${body.error}`, {
      statusCode: body.status,
      retryable: false,
    });
  }
}

export class WorldTidesProvider {
  private readonly now: () => Date;

  constructor(
    private readonly client: UpstreamClient,
    private readonly config: WorldTidesConfig
  ) {
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Tide heights from today for `days` days, ordered by time
   */
  async fetchTideHeights(days: number, signal?: AbortSignal): Promise<TideSample[]> {
    const body = await this.client.getJson(
      API_PATH,
      this.params({ heights: '', date: this.now().toISOString().slice(0, 10), days, datum: 'CD' }),
      worldTidesHeightsSchema,
      signal
    );
    rejectErrorBody(body);

    return orderSeries(
      body.heights.map((height) => ({ timestamp: new Date(height.dt * 1000), height: height.height }))
    );
  }

  /**
   * High and low waters from now for `days` days, fetched in weekly chunks
   */
  async fetchTideExtremes(days: number, signal?: AbortSignal): Promise<TideExtreme[]> {
    const start = this.now().getTime();
    const end = start + days * DAY_MS;
    const extremes: TideExtreme[] = [];

    let current = start;
    while (current < end) {
      const chunkDays = Math.min(EXTREMES_CHUNK_DAYS, Math.floor((end - current) / DAY_MS));
      if (chunkDays <= 0) {
        break;
      }
      if (signal?.aborted) {
        throw new UpstreamError(UpstreamErrorType.TIMEOUT, 'WorldTides: extremes fetch aborted');
      }

      const body = await this.client.getJson(
        API_PATH,
        this.params({ extremes: '', date: new Date(current).toISOString().slice(0, 10), days: chunkDays }),
        worldTidesExtremesSchema,
        signal
      );
      rejectErrorBody(body);

      for (const extreme of body.extremes) {
        extremes.push({ timestamp: new Date(extreme.dt * 1000), height: extreme.height, type: extreme.type });
      }
      current += chunkDays * DAY_MS;
    }

    return orderSeries(extremes);
  }

  private params(query: Record<string, string | number>): Record<string, string | number> {
    if (!this.config.apiKey) {
      throw new UpstreamError(UpstreamErrorType.NOT_CONFIGURED, 'WORLDTIDES_KEY not set');
    }
    return {
      ...query,
      lat: this.config.latitude,
      lon: this.config.longitude,
      key: this.config.apiKey,
    };
  }
}
