import type { Application, Request, Response } from 'express';
import type { Dispatcher } from '../../dispatch/dispatcher.js';
import type { ErrorHandler } from '../../monitoring/error-handler.js';
import type { HealthMonitor } from '../../monitoring/health-monitor.js';
import type { ImageStore } from '../../storage/image-store.js';
import { createDispatchRoutes } from './dispatch.js';
import { createHealthRoutes } from './health.js';
import { createImageRoutes } from './images.js';
import { createJobRoutes } from './jobs.js';
import { createPredictRoutes } from './predict.js';
import { createAdminRoutes, createServiceRoutes, type AdminRouteOptions } from './services.js';

export interface RouteDependencies extends AdminRouteOptions {
  dispatcher: Dispatcher;
  healthMonitor: HealthMonitor;
  errorHandler: ErrorHandler;
  imageStore: ImageStore;
}

/**
 * Setup all API routes for the dispatch server
 * @param app - Express application instance
 * @param urlPrefix - URL prefix for all routes
 */
export function setupRoutes(app: Application, urlPrefix: string, deps: RouteDependencies): void {
  const { dispatcher, healthMonitor, errorHandler, imageStore } = deps;

  app.use(`${urlPrefix}/health`, createHealthRoutes(healthMonitor, dispatcher));
  app.use(`${urlPrefix}/predict`, createPredictRoutes(dispatcher));
  app.use(`${urlPrefix}/jobs`, createJobRoutes(dispatcher));
  app.use(`${urlPrefix}/dispatch`, createDispatchRoutes(dispatcher));
  app.use(`${urlPrefix}/services`, createServiceRoutes(dispatcher, healthMonitor));
  app.use(`${urlPrefix}/images`, createImageRoutes(imageStore));
  app.use(`${urlPrefix}/admin`, createAdminRoutes(dispatcher, deps));

  app.get(`${urlPrefix}/errors`, (req: Request, res: Response) => {
    res.json({
      success: true,
      stats: errorHandler.getErrorStats(),
      recent: errorHandler.getRecentErrors(20).map(error => ({
        id: error.id,
        code: error.code,
        message: error.message,
        severity: error.severity,
        timestamp: error.timestamp
      })),
      timestamp: new Date().toISOString()
    });
  });

  // Root endpoint
  app.get(urlPrefix || '/', (req: Request, res: Response) => {
    res.json({
      service: 'Model Dispatch',
      version: '1.0.0',
      status: 'running',
      description: 'Synchronous and queued dispatch to model backends',
      endpoints: {
        predict: `${urlPrefix}/predict/{service}`,
        jobs: `${urlPrefix}/jobs/{service}`,
        jobStatus: `${urlPrefix}/jobs/{job_id}`,
        dispatch: `${urlPrefix}/dispatch/{service}`,
        services: `${urlPrefix}/services`,
        images: `${urlPrefix}/images`,
        health: `${urlPrefix}/health`
      },
      timestamp: new Date().toISOString()
    });
  });
}
