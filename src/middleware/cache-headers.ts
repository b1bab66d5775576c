/**
 * Cache Headers
 * Freshness headers for responses served from the dataset cache
 */

import { Response } from 'express';
import { DatasetMeta } from '../modules/tides/tides.types';

export function setCacheHeaders(res: Response, meta: DatasetMeta): void {
  res.setHeader('X-Cache', meta.stale ? 'STALE' : 'FRESH');
  res.setHeader('X-Cache-Fetched-At', meta.fetchedAt.toISOString());
  if (meta.error) {
    res.setHeader('X-Cache-Error', meta.error.type);
  }
}
