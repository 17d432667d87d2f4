import { Router, type Request, type Response, type NextFunction } from 'express';
import type { Dispatcher } from '../../dispatch/dispatcher.js';
import { dispatchRequestSchema, parseBody } from '../validation.js';

/**
 * POST /dispatch/:service lets the server pick the path: 202 with a job id
 * when the request goes through the queue, 200 with the result otherwise.
 */
export function createDispatchRoutes(dispatcher: Dispatcher): Router {
  const router = Router();

  router.post('/:service', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      dispatcher.requireService(req.params.service);
      const request = parseBody(dispatchRequestSchema, req.body);
      const outcome = await dispatcher.dispatch(req.params.service, request);
      const timestamp = new Date().toISOString();

      if (outcome.mode === 'async') {
        res.status(202).json({ success: true, mode: outcome.mode, ...outcome.job, timestamp });
      } else {
        res.json({ success: true, mode: outcome.mode, service: outcome.service, result: outcome.result, timestamp });
      }
    } catch (error) {
      next(error);
    }
  });

  return router;
}
