/**
 * Tides Controller
 * HTTP request/response handling for tide and gate-time endpoints
 */

import { Request, Response } from 'express';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { setCacheHeaders } from '../../middleware/cache-headers';
import { parseDateKey, parseInstant, parseInteger } from '../../lib/http/request-params';
import { localDateKey } from '../../lib/time/local-time';
import { TideService } from './tides.service';
import {
  groupEventsByLocalDate,
  toGateEventView,
  toGateStateView,
  toMetaView,
  toTideExtremeView,
  toTideHeightView,
} from './tides.presenter';

export class TidesController {
  constructor(
    private readonly tideService: TideService,
    private readonly timeZone: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * GET /api/tides/:date
   * High and low waters on a local date
   */
  getTidesForDate = asyncHandler(async (req: Request, res: Response) => {
    const date = parseDateKey(req.params.date);
    const result = await this.tideService.getTideExtremes();
    const extremes = result.extremes.filter((extreme) => localDateKey(extreme.timestamp, this.timeZone) === date);

    if (extremes.length === 0) {
      throw new ApiError(404, 'No tide data for this date');
    }

    setCacheHeaders(res, result);
    res.json({
      success: true,
      data: extremes.map((extreme) => toTideExtremeView(extreme, this.timeZone)),
      meta: toMetaView(result, this.timeZone),
    });
  });

  /**
   * GET /api/tide-heights?offset&limit&from&to
   */
  getTideHeights = asyncHandler(async (req: Request, res: Response) => {
    const offset = parseInteger(req.query.offset, 'offset', 0, { min: 0 });
    const limit = parseInteger(req.query.limit, 'limit', 100, { min: 1, max: 10000 });
    const start = parseInstant(req.query.from, 'from');
    const end = parseInstant(req.query.to, 'to');

    const result = await this.tideService.getTideHeights({ start, end });
    const page = result.samples.slice(offset, offset + limit);

    setCacheHeaders(res, result);
    res.json({
      success: true,
      data: page.map((sample) => toTideHeightView(sample, this.timeZone)),
      total: result.samples.length,
      offset,
      limit,
      meta: toMetaView(result, this.timeZone),
    });
  });

  /**
   * GET /api/gate-times?from&to
   * Gate events grouped by local date
   */
  getGateTimes = asyncHandler(async (req: Request, res: Response) => {
    const start = parseInstant(req.query.from, 'from');
    const end = parseInstant(req.query.to, 'to');

    const result = await this.tideService.getGateEvents({ start, end });

    setCacheHeaders(res, result);
    res.json({
      success: true,
      data: groupEventsByLocalDate(result.events, this.timeZone),
      threshold: this.tideService.threshold,
      meta: toMetaView(result, this.timeZone),
    });
  });

  /**
   * GET /api/gate-times/:date
   */
  getGateTimesForDate = asyncHandler(async (req: Request, res: Response) => {
    const date = parseDateKey(req.params.date);
    const result = await this.tideService.getGateEvents();
    const events = result.events.filter((event) => localDateKey(event.timestamp, this.timeZone) === date);

    if (events.length === 0) {
      throw new ApiError(404, 'No gate times for this date');
    }

    setCacheHeaders(res, result);
    res.json({
      success: true,
      data: events.map((event) => toGateEventView(event, this.timeZone)),
      meta: toMetaView(result, this.timeZone),
    });
  });

  /**
   * GET /api/gate-state
   * Gate position now, inferred from the surrounding events
   */
  getGateState = asyncHandler(async (req: Request, res: Response) => {
    const result = await this.tideService.getGateState(this.now());

    setCacheHeaders(res, result);
    res.json({
      success: true,
      data: toGateStateView(result, this.timeZone),
      meta: toMetaView(result, this.timeZone),
    });
  });
}
