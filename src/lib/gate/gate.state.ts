/**
 * Gate State
 * Current gate position inferred from predicted events
 */

import { GateAction, GateEvent, GateState, GateStateSnapshot } from './gate.types';

/**
 * Infer the gate state at `now` from the most recent past event, or failing
 * that from the first future event. Events must be in chronological order.
 */
export function resolveGateState(events: readonly GateEvent[], now: Date): GateStateSnapshot {
  const cutoff = now.getTime();
  let lastEvent: GateEvent | null = null;
  let nextEvent: GateEvent | null = null;

  for (const event of events) {
    if (event.timestamp.getTime() <= cutoff) {
      lastEvent = event;
    } else {
      nextEvent = event;
      break;
    }
  }

  let state = GateState.UNKNOWN;
  if (lastEvent) {
    state = lastEvent.action === GateAction.LOWER ? GateState.LOWERED : GateState.RAISED;
  } else if (nextEvent) {
    state = nextEvent.action === GateAction.LOWER ? GateState.RAISED : GateState.LOWERED;
  }

  return { state, lastEvent, nextEvent };
}
