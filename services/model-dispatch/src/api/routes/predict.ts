import { Router, type Request, type Response, type NextFunction } from 'express';
import type { Dispatcher } from '../../dispatch/dispatcher.js';
import { jobPayloadSchema, parseBody } from '../validation.js';

/**
 * Synchronous path: POST /predict/:service forwards to the backend's gateway
 * and answers with its result. No job is recorded.
 */
export function createPredictRoutes(dispatcher: Dispatcher): Router {
  const router = Router();

  router.post('/:service', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { service } = req.params;
      dispatcher.requireService(service);
      const payload = parseBody(jobPayloadSchema, req.body);
      const result = await dispatcher.predict(service, payload);

      res.json({
        success: true,
        service,
        result,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
