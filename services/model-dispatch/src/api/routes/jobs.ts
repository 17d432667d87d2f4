import { Router, type Request, type Response, type NextFunction } from 'express';
import type { Dispatcher } from '../../dispatch/dispatcher.js';
import { batchStatusRequestSchema, fanOutRequestSchema, jobPayloadSchema, parseBody } from '../validation.js';

/**
 * Asynchronous path: enqueue jobs and read their status and results back by id.
 */
export function createJobRoutes(dispatcher: Dispatcher): Router {
  const router = Router();

  /**
   * Fan one payload out to several services
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { services, payload } = parseBody(fanOutRequestSchema, req.body);
      const jobs = await dispatcher.submitMany(services, payload);

      res.status(202).json({
        success: true,
        jobs,
        count: jobs.length,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Status of several jobs at once. Registered before /:service so "status" is never read as a service name.
   */
  router.post('/status', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { job_ids } = parseBody(batchStatusRequestSchema, req.body);
      const jobs = await dispatcher.getJobStatuses(job_ids);

      res.json({
        success: true,
        jobs,
        count: jobs.length,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:service', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      dispatcher.requireService(req.params.service);
      const payload = parseBody(jobPayloadSchema, req.body);
      const submitted = await dispatcher.submit(req.params.service, payload);

      res.status(202).json({
        success: true,
        ...submitted,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:jobId', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const view = await dispatcher.getJobStatus(req.params.jobId);

      res.json({
        success: true,
        ...view,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Raw result artifact of a succeeded job
   */
  router.get('/:jobId/result', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const bytes = await dispatcher.getResult(req.params.jobId);
      res.type('application/octet-stream').send(bytes);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:jobId', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const view = await dispatcher.cancel(req.params.jobId);

      res.json({
        success: true,
        ...view,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
