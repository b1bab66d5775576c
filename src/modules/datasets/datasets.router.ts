/**
 * Datasets Router
 */

import { Router } from 'express';
import { DatasetsController } from './datasets.controller';

export function createDatasetsRouter(controller: DatasetsController): Router {
  const router = Router();

  /**
   * @route   GET /api/datasets
   * @desc    Freshness and hit counters for every registered dataset
   */
  router.get('/datasets', controller.getStats);

  /**
   * @route   POST /api/datasets/:name/refresh
   * @desc    Force a refresh of one dataset
   */
  router.post('/datasets/:name/refresh', controller.refresh);

  return router;
}
