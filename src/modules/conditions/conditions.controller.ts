/**
 * Conditions Controller
 * HTTP request/response handling for weather, astronomy and marine endpoints
 */

import { Request, Response } from 'express';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { setCacheHeaders } from '../../middleware/cache-headers';
import { parseDateKey, parseInteger, parseNumber, parseString } from '../../lib/http/request-params';
import { addDays, dateKeyToUnixSeconds, localDateKey } from '../../lib/time/local-time';
import { DEFAULT_MARINE_HOURLY } from '../../lib/providers';
import { toMetaView } from '../tides/tides.presenter';
import { ConditionsService } from './conditions.service';
import { toWeatherDayView } from './conditions.presenter';

const WEATHER_DAYS_AHEAD = 5;
const DEFAULT_FORECAST_HOURS = 48;

export interface SiteOptions {
  timeZone: string;
  latitude: number;
  longitude: number;
}

export class ConditionsController {
  constructor(
    private readonly conditionsService: ConditionsService,
    private readonly site: SiteOptions,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * GET /api/weather/:date
   * Daily forecast for a local date between today and five days ahead
   */
  getWeatherForDate = asyncHandler(async (req: Request, res: Response) => {
    const date = parseDateKey(req.params.date);
    const today = this.today();

    if (date < today || date > addDays(today, WEATHER_DAYS_AHEAD)) {
      throw new ApiError(404, 'No weather forecast for this date');
    }

    const result = await this.conditionsService.getWeather();
    const day = result.value.find((entry) => localDateKey(entry.dt, this.site.timeZone) === date);
    if (!day) {
      throw new ApiError(404, 'No weather forecast for this date');
    }

    setCacheHeaders(res, result);
    res.json({
      success: true,
      data: toWeatherDayView(day, this.site.timeZone),
      meta: toMetaView(result, this.site.timeZone),
    });
  });

  /**
   * GET /api/sunrise-sunset?date&lat&lng
   */
  getSunriseSunset = asyncHandler(async (req: Request, res: Response) => {
    const date = req.query.date === undefined ? this.today() : parseDateKey(req.query.date);
    const latitude = parseNumber(req.query.lat, 'lat', this.site.latitude, { min: -90, max: 90 });
    const longitude = parseNumber(req.query.lng, 'lng', this.site.longitude, { min: -180, max: 180 });

    const result = await this.conditionsService.getSunriseSunset({ date, latitude, longitude });

    setCacheHeaders(res, result);
    res.json({ success: true, data: result.value, meta: toMetaView(result, this.site.timeZone) });
  });

  /**
   * GET /api/moon-phase?date
   */
  getMoonPhase = asyncHandler(async (req: Request, res: Response) => {
    const date = req.query.date === undefined ? this.today() : parseDateKey(req.query.date);

    const result = await this.conditionsService.getMoonPhase(dateKeyToUnixSeconds(date));

    setCacheHeaders(res, result);
    res.json({ success: true, data: result.value, meta: toMetaView(result, this.site.timeZone) });
  });

  /**
   * GET /api/marine?forecast_hours&timeformat&hourly&lat&lon
   */
  getMarine = asyncHandler(async (req: Request, res: Response) => {
    const result = await this.conditionsService.getMarineForecast({
      latitude: parseNumber(req.query.lat, 'lat', this.site.latitude, { min: -90, max: 90 }),
      longitude: parseNumber(req.query.lon, 'lon', this.site.longitude, { min: -180, max: 180 }),
      hourly: parseString(req.query.hourly, DEFAULT_MARINE_HOURLY),
      timeformat: parseString(req.query.timeformat, 'unixtime'),
      forecastHours: parseInteger(req.query.forecast_hours, 'forecast_hours', DEFAULT_FORECAST_HOURS, {
        min: 1,
        max: 384,
      }),
    });

    setCacheHeaders(res, result);
    res.json({ success: true, data: result.value, meta: toMetaView(result, this.site.timeZone) });
  });

  private today(): string {
    return localDateKey(this.now(), this.site.timeZone);
  }
}
