/**
 * Conditions Presenter
 */

import { WeatherDay } from '../../lib/providers';
import { toLocalIso } from '../../lib/time/local-time';
import { WeatherDayView } from './conditions.types';

const optionalIso = (date: Date | undefined, timeZone: string): string | undefined =>
  date ? toLocalIso(date, timeZone) : undefined;

export function toWeatherDayView(day: WeatherDay, timeZone: string): WeatherDayView {
  return {
    ...day,
    dt: toLocalIso(day.dt, timeZone),
    sunrise: optionalIso(day.sunrise, timeZone),
    sunset: optionalIso(day.sunset, timeZone),
    moonrise: optionalIso(day.moonrise, timeZone),
    moonset: optionalIso(day.moonset, timeZone),
  };
}
