/**
 * Tides Service
 * Tide heights, tide extremes and gate events served from the dataset cache.
 *
 * Gate events are a derived dataset over the tide heights: the prediction is
 * recomputed only when the tide-height dataset has actually been refreshed.
 */

import { Dataset, DatasetCacheManager, DerivedDataset } from '../../lib/cache';
import { GateEvent, predictGateEvents, resolveGateState, TideSample } from '../../lib/gate';
import { TideExtreme } from '../../lib/providers';
import {
  DatasetMeta,
  GateEventsResult,
  GateStateResult,
  TideDataset,
  TideExtremesResult,
  TideHeightsResult,
  TideServiceConfig,
  TimeRange,
} from './tides.types';

/**
 * Where tide data comes from (WorldTidesProvider in production)
 */
export interface TideSource {
  fetchTideHeights(days: number, signal?: AbortSignal): Promise<TideSample[]>;
  fetchTideExtremes(days: number, signal?: AbortSignal): Promise<TideExtreme[]>;
}

export interface RefreshInterval {
  name: string;
  intervalMs: number;
}

function inRange(timestamp: Date, range: TimeRange): boolean {
  const time = timestamp.getTime();
  if (range.start && time < range.start.getTime()) {
    return false;
  }
  if (range.end && time >= range.end.getTime()) {
    return false;
  }
  return true;
}

const isUnbounded = (range: TimeRange): boolean => !range.start && !range.end;

export class TideService {
  readonly tideHeights: Dataset<readonly TideSample[]>;
  readonly tideExtremes: Dataset<readonly TideExtreme[]>;
  readonly gateEvents: Dataset<readonly GateEvent[]>;

  constructor(
    private readonly cache: DatasetCacheManager,
    source: TideSource,
    private readonly config: TideServiceConfig,
    now?: () => number
  ) {
    this.tideHeights = cache.register<readonly TideSample[]>({
      name: TideDataset.TIDE_HEIGHTS,
      ttlMs: config.tideHeightsTtlMs,
      timeoutMs: config.fetchTimeoutMs,
      fetch: (signal) => source.fetchTideHeights(config.tideHeightsDays, signal),
    });

    this.tideExtremes = cache.register<readonly TideExtreme[]>({
      name: TideDataset.TIDE_EXTREMES,
      ttlMs: config.tideExtremesTtlMs,
      timeoutMs: config.fetchTimeoutMs,
      fetch: (signal) => source.fetchTideExtremes(config.tideExtremesDays, signal),
    });

    this.gateEvents = cache.add(
      new DerivedDataset<readonly TideSample[], readonly GateEvent[]>({
        name: TideDataset.GATE_TIMES,
        source: this.tideHeights,
        compute: (samples) => predictGateEvents(samples, config.threshold),
        ttlMs: config.gateTimesTtlMs,
        now,
      })
    );
  }

  get threshold(): number {
    return this.config.threshold;
  }

  /**
   * Tide heights inside `range`
   */
  async getTideHeights(range: TimeRange = {}): Promise<TideHeightsResult> {
    const result = await this.tideHeights.get();
    const samples = isUnbounded(range)
      ? result.value
      : result.value.filter((sample) => inRange(sample.timestamp, range));

    return { ...this.meta(result), samples };
  }

  /**
   * Gate events inside `range`. The prediction always runs over the whole
   * series so events near the range edges are interpolated from their real
   * neighbouring samples.
   */
  async getGateEvents(range: TimeRange = {}): Promise<GateEventsResult> {
    const result = await this.gateEvents.get();
    const events = isUnbounded(range)
      ? result.value
      : result.value.filter((event) => inRange(event.timestamp, range));

    return { ...this.meta(result), events };
  }

  async getTideExtremes(range: TimeRange = {}): Promise<TideExtremesResult> {
    const result = await this.tideExtremes.get();
    const extremes = isUnbounded(range)
      ? result.value
      : result.value.filter((extreme) => inRange(extreme.timestamp, range));

    return { ...this.meta(result), extremes };
  }

  async getGateState(at: Date): Promise<GateStateResult> {
    const result = await this.gateEvents.get();
    return { ...this.meta(result), ...resolveGateState(result.value, at) };
  }

  invalidate(name: string): void {
    this.cache.invalidate(name);
  }

  refreshIntervals(): RefreshInterval[] {
    return [
      { name: TideDataset.TIDE_EXTREMES, intervalMs: this.config.tideExtremesTtlMs },
      { name: TideDataset.TIDE_HEIGHTS, intervalMs: this.config.tideHeightsTtlMs },
      { name: TideDataset.GATE_TIMES, intervalMs: this.config.gateTimesTtlMs },
    ];
  }

  private meta(result: DatasetMeta): DatasetMeta {
    return { fetchedAt: result.fetchedAt, stale: result.stale, error: result.error };
  }
}
