/**
 * Datasets Controller
 * Cache statistics and manual refresh
 */

import { Request, Response } from 'express';
import { asyncHandler } from '../../middleware/error-handler';
import { setCacheHeaders } from '../../middleware/cache-headers';
import { DatasetCacheManager } from '../../lib/cache';
import { toMetaView } from '../tides/tides.presenter';

export class DatasetsController {
  constructor(
    private readonly cache: DatasetCacheManager,
    private readonly timeZone: string
  ) {}

  /**
   * GET /api/datasets
   */
  getStats = asyncHandler(async (_req: Request, res: Response) => {
    res.json({ success: true, data: this.cache.getStats() });
  });

  /**
   * POST /api/datasets/:name/refresh
   * Invalidate a dataset and wait for the refresh it triggers
   */
  refresh = asyncHandler(async (req: Request, res: Response) => {
    const name = req.params.name;
    this.cache.invalidate(name);
    const result = await this.cache.get(name);

    setCacheHeaders(res, result);
    res.json({
      success: true,
      data: { name, refreshed: !result.stale },
      meta: toMetaView(result, this.timeZone),
    });
  });
}
