import { Router, type Request, type Response, type NextFunction } from 'express';
import type { Dispatcher } from '../../dispatch/dispatcher.js';
import { requireApiKey } from '../../middleware/api-key.js';
import type { HealthMonitor } from '../../monitoring/health-monitor.js';
import type { ServiceRegistry } from '../../registry/service-registry.js';

export function createServiceRoutes(dispatcher: Dispatcher, healthMonitor: HealthMonitor): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response): void => {
    const services = dispatcher.listServices().map(service => {
      const health = healthMonitor.getBackendHealth(service.name);
      return {
        name: service.name,
        capability: service.capability,
        address: service.address,
        health: health.health,
        ...(health.checkedAt && { checked_at: health.checkedAt })
      };
    });

    res.json({
      success: true,
      services,
      count: services.length,
      timestamp: new Date().toISOString()
    });
  });

  return router;
}

export interface AdminRouteOptions {
  adminApiKey?: string;
  loadRegistry: () => Promise<ServiceRegistry> | ServiceRegistry;
}

/**
 * Administrative operations. Reloading reads the configuration into a new
 * registry and swaps it in whole; jobs already queued are left as they are.
 */
export function createAdminRoutes(dispatcher: Dispatcher, options: AdminRouteOptions): Router {
  const router = Router();

  router.use(requireApiKey(options.adminApiKey));

  router.post('/registry/reload', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const registry = await options.loadRegistry();
      const sizes = dispatcher.reloadRegistry(registry);

      res.json({
        success: true,
        message: 'Service registry reloaded',
        previous_count: sizes.previous,
        count: sizes.current,
        services: registry.list().map(service => service.name),
        loaded_at: registry.loadedAt,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
