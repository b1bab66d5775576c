/**
 * Tides Presenter
 * Renders instants in the site's local time for responses
 */

import { GateEvent, GateStateSnapshot, TideSample } from '../../lib/gate';
import { TideExtreme } from '../../lib/providers';
import { localDateKey, toLocalIso } from '../../lib/time/local-time';
import {
  DatasetMeta,
  GateEventView,
  GateStateView,
  MetaView,
  TideExtremeView,
  TideHeightView,
} from './tides.types';

export function toMetaView(meta: DatasetMeta, timeZone: string): MetaView {
  const view: MetaView = {
    fetchedAt: toLocalIso(meta.fetchedAt, timeZone),
    stale: meta.stale,
  };
  if (meta.error) {
    view.error = meta.error.toJSON();
  }
  return view;
}

export function toTideHeightView(sample: TideSample, timeZone: string): TideHeightView {
  return {
    dt: toLocalIso(sample.timestamp, timeZone),
    date: localDateKey(sample.timestamp, timeZone),
    height: sample.height,
  };
}

export function toTideExtremeView(extreme: TideExtreme, timeZone: string): TideExtremeView {
  return {
    ...toTideHeightView(extreme, timeZone),
    type: extreme.type,
  };
}

export function toGateEventView(event: GateEvent, timeZone: string): GateEventView {
  return {
    datetime: toLocalIso(event.timestamp, timeZone),
    action: event.action,
    height: event.height,
  };
}

/**
 * Gate events keyed by local date, in chronological order within each day
 */
export function groupEventsByLocalDate(
  events: readonly GateEvent[],
  timeZone: string
): Record<string, GateEventView[]> {
  const grouped: Record<string, GateEventView[]> = {};
  for (const event of events) {
    const date = localDateKey(event.timestamp, timeZone);
    (grouped[date] ??= []).push(toGateEventView(event, timeZone));
  }
  return grouped;
}

export function toGateStateView(snapshot: GateStateSnapshot, timeZone: string): GateStateView {
  return {
    state: snapshot.state,
    lastEvent: snapshot.lastEvent ? toGateEventView(snapshot.lastEvent, timeZone) : null,
    nextEvent: snapshot.nextEvent ? toGateEventView(snapshot.nextEvent, timeZone) : null,
  };
}
