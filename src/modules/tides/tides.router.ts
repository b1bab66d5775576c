/**
 * Tides Router
 * Route definitions for tide and gate-time endpoints
 */

import { Router } from 'express';
import { TidesController } from './tides.controller';

export function createTidesRouter(controller: TidesController): Router {
  const router = Router();

  /**
   * @route   GET /api/tides/:date
   * @desc    High and low waters on a local date
   */
  router.get('/tides/:date', controller.getTidesForDate);

  /**
   * @route   GET /api/tide-heights
   * @desc    Half-hour tide heights, paginated
   */
  router.get('/tide-heights', controller.getTideHeights);

  /**
   * @route   GET /api/gate-times
   * @desc    Predicted gate events grouped by local date
   */
  router.get('/gate-times', controller.getGateTimes);

  /**
   * @route   GET /api/gate-times/:date
   * @desc    Predicted gate events on a local date
   */
  router.get('/gate-times/:date', controller.getGateTimesForDate);

  /**
   * @route   GET /api/gate-state
   * @desc    Current gate position with the previous and next events
   */
  router.get('/gate-state', controller.getGateState);

  return router;
}
