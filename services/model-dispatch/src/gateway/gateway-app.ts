import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import { createProcessingContext, isRecord } from '../backends/index.js';
import { TimeoutError, ValidationError } from '../errors.js';
import { ErrorHandler } from '../monitoring/error-handler.js';
import type { BackendModule, BackendOutput } from '../types/index.js';

export interface GatewayOptions {
  backend: BackendModule;
  timeoutMs: number;
  bodyLimit?: string;
  errorHandler?: ErrorHandler;
}

/**
 * Synchronous Gateway for one backend: POST /predict runs the processing
 * routine inline and answers with its result. No job is created.
 */
export function createGatewayApp(options: GatewayOptions): Application {
  const { backend, timeoutMs } = options;
  const errorHandler = options.errorHandler ?? new ErrorHandler();
  const app = express();

  app.use(express.json({ limit: options.bodyLimit ?? '10mb' }));

  app.get('/status', (req: Request, res: Response) => {
    res.json({
      status: 'running',
      service: backend.name,
      capability: backend.capability,
      uptime: process.uptime(),
      timestamp: new Date().toISOString()
    });
  });

  app.post('/predict', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      if (!isRecord(req.body)) {
        throw new ValidationError('Request body must be a JSON object');
      }
      const context = createProcessingContext({ serviceName: backend.name, signal: controller.signal });
      const output = await runWithTimeout(backend.process(req.body, context), timeoutMs, controller);
      sendOutput(res, output);
    } catch (error) {
      next(error);
    }
  });

  app.use(errorHandler.middleware());

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      timestamp: new Date().toISOString()
    });
  });

  return app;
}

function sendOutput(res: Response, output: BackendOutput): void {
  if (Buffer.isBuffer(output)) {
    res.type('application/octet-stream').send(output);
  } else if (typeof output === 'string') {
    res.type('text/plain').send(output);
  } else {
    res.json(output);
  }
}

async function runWithTimeout(
  work: Promise<BackendOutput>,
  timeoutMs: number,
  controller: AbortController
): Promise<BackendOutput> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(`Prediction exceeded ${timeoutMs}ms`, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
