/**
 * Tides Types
 * Type definitions for the tide and gate-time endpoints
 */

import { UpstreamError } from '../../lib/errors';
import { GateAction, GateEvent, GateState, TideSample } from '../../lib/gate';
import { TideExtreme } from '../../lib/providers';

export enum TideDataset {
  TIDE_HEIGHTS = 'tide-heights',
  TIDE_EXTREMES = 'tide-extremes',
  GATE_TIMES = 'gate-times',
}

/**
 * Instant range; start inclusive, end exclusive
 */
export interface TimeRange {
  start?: Date;
  end?: Date;
}

export interface DatasetMeta {
  fetchedAt: Date;
  stale: boolean;
  error: UpstreamError | null;
}

export interface TideHeightsResult extends DatasetMeta {
  samples: readonly TideSample[];
}

export interface TideExtremesResult extends DatasetMeta {
  extremes: readonly TideExtreme[];
}

export interface GateEventsResult extends DatasetMeta {
  events: readonly GateEvent[];
}

export interface GateStateResult extends DatasetMeta {
  state: GateState;
  lastEvent: GateEvent | null;
  nextEvent: GateEvent | null;
}

export interface TideServiceConfig {
  threshold: number;
  tideHeightsDays: number;
  tideExtremesDays: number;
  tideHeightsTtlMs: number;
  tideExtremesTtlMs: number;
  gateTimesTtlMs: number;
  fetchTimeoutMs?: number;
}

// ============================================================================
// Response views (local civil time)
// ============================================================================

export interface TideHeightView {
  dt: string;
  date: string;
  height: number;
}

export interface TideExtremeView extends TideHeightView {
  type: 'High' | 'Low';
}

export interface GateEventView {
  datetime: string;
  action: GateAction;
  height: number;
}

export interface GateStateView {
  state: GateState;
  lastEvent: GateEventView | null;
  nextEvent: GateEventView | null;
}

export interface MetaView {
  fetchedAt: string;
  stale: boolean;
  error?: ReturnType<UpstreamError['toJSON']>;
}
