/**
 * Test Fixtures
 * Reusable test data
 */

import { TideSample } from '../../lib/gate';
import { WeatherDay } from '../../lib/providers';

export const T0 = Date.UTC(2025, 5, 1, 9, 0, 0); // 2025-06-01T09:00:00Z, 10:00 in London
export const HALF_HOUR = 30 * 60 * 1000;

/**
 * Half-hourly samples starting at `start`
 */
export function series(heights: number[], start: number = T0, step: number = HALF_HOUR): TideSample[] {
  return heights.map((height, index) => ({ timestamp: new Date(start + index * step), height }));
}

export const at = (offsetMs: number): Date => new Date(T0 + offsetMs);

export function weatherDay(dt: Date, overrides: Partial<WeatherDay> = {}): WeatherDay {
  return {
    dt,
    sunrise: new Date(dt.getTime() - 6 * 60 * 60 * 1000),
    sunset: new Date(dt.getTime() + 9 * 60 * 60 * 1000),
    summary: 'Sunny with light winds',
    temp: { day: 18, min: 11, max: 20, night: 12, eve: 17, morn: 13 },
    feels_like: { day: 17.5, night: 11, eve: 16, morn: 12 },
    pressure: 1018,
    humidity: 62,
    dew_point: 10.4,
    wind_speed: 4,
    wind_deg: 240,
    weather: [{ id: 800, main: 'Clear', description: 'clear sky', icon: '01d' }],
    clouds: 5,
    pop: 0,
    uvi: 6.2,
    wind_speed_beaufort: 3,
    ...overrides,
  };
}

/**
 * Fixed clock that tests can move forward
 */
export class ManualClock {
  constructor(public current: number = T0) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

/**
 * A promise with its resolve/reject exposed
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
