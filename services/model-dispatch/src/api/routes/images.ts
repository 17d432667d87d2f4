import express, { Router, type Request, type Response, type NextFunction } from 'express';
import { ValidationError } from '../../errors.js';
import { extensionFor, type ImageStore } from '../../storage/image-store.js';

/**
 * POST /images takes the raw image bytes and answers with the `image_ref`
 * that job and prediction payloads use to point at them.
 */
export function createImageRoutes(imageStore: ImageStore, limit: string = '20mb'): Router {
  const router = Router();

  router.post(
    '/',
    express.raw({ type: () => true, limit }),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        if (!Buffer.isBuffer(req.body)) {
          throw new ValidationError('Expected raw image bytes in the request body');
        }
        const filename = typeof req.query.filename === 'string' ? req.query.filename : undefined;
        const stored = await imageStore.put(req.body, extensionFor(req.get('Content-Type'), filename));

        res.status(stored.created ? 201 : 200).json({
          success: true,
          image_ref: stored.imageRef,
          hash_md5: stored.hashMd5,
          timestamp: new Date().toISOString()
        });
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
