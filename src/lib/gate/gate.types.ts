/**
 * Gate Types
 * Type definitions for tide samples and gate events
 */

/**
 * One point of the forecast tide-height series (metres above chart datum)
 */
export interface TideSample {
  timestamp: Date;
  height: number;
}

/**
 * Gate movement. The gate is lowered as the tide rises through the open
 * height and raised again once it falls back below it.
 */
export enum GateAction {
  RAISE = 'raise',
  LOWER = 'lower',
}

export interface GateEvent {
  timestamp: Date;
  action: GateAction;
  height: number;
}

export enum GateState {
  RAISED = 'raised',
  LOWERED = 'lowered',
  UNKNOWN = 'unknown',
}

export interface GateStateSnapshot {
  state: GateState;
  lastEvent: GateEvent | null;
  nextEvent: GateEvent | null;
}
