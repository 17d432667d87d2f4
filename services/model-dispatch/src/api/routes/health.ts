import { Router, type Request, type Response, type NextFunction } from 'express';
import type { Dispatcher } from '../../dispatch/dispatcher.js';
import type { HealthMonitor } from '../../monitoring/health-monitor.js';

/**
 * Create health check routes
 */
export function createHealthRoutes(healthMonitor: HealthMonitor, dispatcher: Dispatcher): Router {
  const router = Router();

  /**
   * Overall status with queue depths and backend health
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const metrics = await healthMonitor.getHealthMetrics();

      res.status(metrics.status === 'unhealthy' ? 503 : 200).json({
        ...metrics,
        service: 'Model Dispatch',
        version: '1.0.0',
        dispatcher: dispatcher.getStats()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Liveness check endpoint
   */
  router.get('/live', (req: Request, res: Response): void => {
    res.json({
      status: 'alive',
      message: 'Service is alive',
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    });
  });

  return router;
}
