/**
 * Express application wiring
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { SETTINGS, Settings } from '../config/settings.js';
import type { PipelineServices, AppState } from '../content-engine/fsm/src/index.js';
import { Logger, silentLogger } from '../content-engine/utils/logger.js';
import { createAssignmentHandlers } from './api/assignments.js';
import { HealthMonitor, createHealthEndpoints } from './monitoring/health-endpoints.js';
import { SecurityMiddleware } from './security/middleware.js';

export interface AppOptions {
  settings?: Settings;
  logger?: Logger;
  security?: SecurityMiddleware;
}

export function createApp(services: PipelineServices, state: AppState, options: AppOptions = {}): Express {
  const settings = options.settings ?? SETTINGS;
  const logger = options.logger ?? silentLogger;
  const security = options.security ?? new SecurityMiddleware({}, logger);

  const app = express();

  // Security middleware (applied globally)
  app.use(security.securityMiddleware());
  app.use(security.createRateLimit());

  // CORS and body parsing
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  const assignments = createAssignmentHandlers(services.pipeline, state, logger);
  app.post('/api/assignments', assignments.create);
  app.get('/api/assignments/latest', assignments.latest);
  app.get('/api/assignments/latest/export/:format', assignments.exportLatest);

  const monitor = new HealthMonitor({
    llm: services.llm,
    renderer: services.renderer,
    security,
    settings
  });
  const health = createHealthEndpoints(monitor);
  app.get('/health', health.health);
  app.get('/ready', health.ready);
  app.get('/live', health.live);
  app.get('/metrics', health.metrics);

  // Error handling
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    logger('error', 'Server error', { error: err.message, path: req.path });
    res.status(500).json({
      success: false,
      error: 'Internal server error'
    });
  });

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Endpoint not found'
    });
  });

  return app;
}
