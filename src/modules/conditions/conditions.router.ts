/**
 * Conditions Router
 */

import { Router } from 'express';
import { ConditionsController } from './conditions.controller';

export function createConditionsRouter(controller: ConditionsController): Router {
  const router = Router();

  /**
   * @route   GET /api/weather/:date
   * @desc    Daily weather forecast for a local date
   */
  router.get('/weather/:date', controller.getWeatherForDate);

  /**
   * @route   GET /api/sunrise-sunset
   * @desc    Sunrise and sunset times for a date and position
   */
  router.get('/sunrise-sunset', controller.getSunriseSunset);

  /**
   * @route   GET /api/moon-phase
   */
  router.get('/moon-phase', controller.getMoonPhase);

  /**
   * @route   GET /api/marine
   * @desc    Hourly marine forecast
   */
  router.get('/marine', controller.getMarine);

  return router;
}
