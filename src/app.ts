/**
 * Express Application Configuration
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { EnvConfig } from './config/env';
import { errorHandler } from './middleware/error-handler';
import { authMiddleware } from './middleware/auth.middleware';
import { Services } from './services';

// Import routers
import { TidesController } from './modules/tides/tides.controller';
import { createTidesRouter } from './modules/tides/tides.router';
import { ConditionsController, createConditionsRouter } from './modules/conditions';
import { DatasetsController } from './modules/datasets/datasets.controller';
import { createDatasetsRouter } from './modules/datasets/datasets.router';

export interface AppOptions {
  config: EnvConfig;
  services: Services;
  now?: () => Date;
}

export const createApp = ({ config, services, now }: AppOptions): Application => {
  const app = express();
  const timeZone = config.SITE_TIMEZONE;

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  app.use(helmet());

  app.use(
    cors({
      origin: config.CLIENT_URL,
      credentials: true,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-API-KEY'],
      exposedHeaders: ['X-Cache', 'X-Cache-Fetched-At', 'X-Cache-Error'],
    })
  );

  app.use(express.json({ limit: '100kb' }));

  // ============================================================================
  // Routes
  // ============================================================================

  // Health check (no auth)
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      success: true,
      message: 'Tide gate API is running',
      timestamp: new Date().toISOString(),
      environment: config.NODE_ENV,
    });
  });

  const tidesController = new TidesController(services.tideService, timeZone, now);
  const conditionsController = new ConditionsController(
    services.conditionsService,
    { timeZone, latitude: config.SITE_LATITUDE, longitude: config.SITE_LONGITUDE },
    now
  );
  const datasetsController = new DatasetsController(services.cache, timeZone);

  app.use(
    '/api',
    authMiddleware({ apiKey: config.API_KEY, basicUser: config.BASIC_AUTH_USER, basicPass: config.BASIC_AUTH_PASS }),
    createTidesRouter(tidesController),
    createConditionsRouter(conditionsController),
    createDatasetsRouter(datasetsController)
  );

  // 404 Handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Route not found',
      path: req.path,
    });
  });

  // ============================================================================
  // Error Handler (must be last)
  // ============================================================================

  app.use(errorHandler);

  return app;
};
