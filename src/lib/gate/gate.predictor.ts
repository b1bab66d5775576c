/**
 * Gate Event Predictor
 * Threshold crossings of a tide-height series, interpolated linearly
 * between consecutive samples
 */

import { EmptySeriesError } from '../errors';
import { GateAction, GateEvent, TideSample } from './gate.types';

export const DEFAULT_GATE_OPEN_HEIGHT = 4;

type Side = 'below' | 'above';

function interpolateCrossing(from: TideSample, to: TideSample, threshold: number): Date {
  const ratio = (threshold - from.height) / (to.height - from.height);
  const start = from.timestamp.getTime();
  const span = to.timestamp.getTime() - start;
  return new Date(Math.round(start + ratio * span));
}

/**
 * Predict when the gate is lowered (tide rising through `threshold`) and
 * raised (tide falling back through it).
 *
 * Samples lying exactly on the threshold are attributed to the sides around
 * them: a run of such samples between a low and a high side is one crossing
 * at the run's first sample, and a touch that returns to the same side is
 * not a crossing. A touch at the start of the series yields nothing. A
 * series that ends on the threshold after rising to it ends with a lower,
 * since the gate lowers once the tide reaches the threshold; ending on it
 * after falling yields nothing. No initial gate state is assumed.
 */
export function predictGateEvents(
  samples: readonly TideSample[],
  threshold: number = DEFAULT_GATE_OPEN_HEIGHT
): GateEvent[] {
  if (samples.length === 0) {
    throw new EmptySeriesError();
  }

  const events: GateEvent[] = [];
  let previous: TideSample | null = null;
  let previousSide: Side | null = null;
  let touch: TideSample | null = null;

  for (const sample of samples) {
    if (sample.height === threshold) {
      touch = touch ?? sample;
      previous = sample;
      continue;
    }

    const side: Side = sample.height < threshold ? 'below' : 'above';

    if (previous && previousSide && side !== previousSide) {
      events.push({
        timestamp: touch ? new Date(touch.timestamp.getTime()) : interpolateCrossing(previous, sample, threshold),
        action: side === 'above' ? GateAction.LOWER : GateAction.RAISE,
        height: threshold,
      });
    }

    previous = sample;
    previousSide = side;
    touch = null;
  }

  if (touch && previousSide === 'below') {
    events.push({
      timestamp: new Date(touch.timestamp.getTime()),
      action: GateAction.LOWER,
      height: threshold,
    });
  }

  return events;
}
