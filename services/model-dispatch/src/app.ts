import express, { type Application, type Request, type Response } from 'express';
import { setupRoutes } from './api/routes/index.js';
import { createBuiltinBackends, createRemoteBackend } from './backends/index.js';
import { BackendClient } from './clients/backend-client.js';
import type { DispatchConfig } from './config.js';
import { Dispatcher } from './dispatch/dispatcher.js';
import { ErrorHandler } from './monitoring/error-handler.js';
import { HealthMonitor } from './monitoring/health-monitor.js';
import { InMemoryJobQueue } from './queue/in-memory-job-queue.js';
import type { JobQueue } from './queue/job-queue.js';
import { connectRedis } from './queue/redis-client.js';
import { RedisJobQueue } from './queue/redis-job-queue.js';
import type { RegistryHandle, ServiceRegistry } from './registry/service-registry.js';
import type { ImageStore } from './storage/image-store.js';
import { FileResultStore, RedisResultStore } from './storage/result-store.js';
import type { BackendModule, ResultStore, ServiceDescriptor, ServiceResolver } from './types/index.js';
import { Worker } from './worker/worker.js';

export type AppConfig = Pick<
  DispatchConfig,
  'urlPrefix' | 'syncTimeoutMs' | 'syncMaxPayloadBytes' | 'healthCheckIntervalMs' | 'adminApiKey' | 'nodeEnv'
>;

export interface DispatchAppDependencies {
  config: AppConfig;
  registry: RegistryHandle;
  queue: JobQueue;
  resultStore: ResultStore;
  imageStore: ImageStore;
  loadRegistry: () => Promise<ServiceRegistry> | ServiceRegistry;
  backendClient?: BackendClient;
}

export interface DispatchApp {
  app: Application;
  dispatcher: Dispatcher;
  healthMonitor: HealthMonitor;
  errorHandler: ErrorHandler;
}

/**
 * Wire the Dispatch Server's Express application. Starting listeners and
 * background timers is left to the caller.
 */
export function createDispatchApp(deps: DispatchAppDependencies): DispatchApp {
  const { config, registry, queue, resultStore, imageStore } = deps;
  const backendClient = deps.backendClient ?? new BackendClient({ timeoutMs: config.syncTimeoutMs });

  const dispatcher = new Dispatcher(registry, queue, resultStore, backendClient, {
    syncTimeoutMs: config.syncTimeoutMs,
    syncMaxPayloadBytes: config.syncMaxPayloadBytes
  });
  const healthMonitor = new HealthMonitor(registry, backendClient, queue, {
    intervalMs: config.healthCheckIntervalMs
  });
  const errorHandler = new ErrorHandler({ exposeStack: config.nodeEnv === 'development' });

  const app = express();
  app.use(express.json({ limit: '10mb' }));

  setupRoutes(app, config.urlPrefix, {
    dispatcher,
    healthMonitor,
    errorHandler,
    imageStore,
    adminApiKey: config.adminApiKey,
    loadRegistry: deps.loadRegistry
  });

  // Error handling middleware (must be after routes)
  app.use(errorHandler.middleware());

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      timestamp: new Date().toISOString()
    });
  });

  return { app, dispatcher, healthMonitor, errorHandler };
}

export interface Infrastructure {
  kind: 'redis' | 'in-memory';
  queue: JobQueue;
  resultStore: ResultStore;
  close(): Promise<void>;
}

/**
 * REDIS_URL set: Redis queue and Redis results, shared by every process.
 * Unset: in-process queue with results on disk, for a single process with embedded workers.
 */
export async function createInfrastructure(
  config: Pick<DispatchConfig, 'redisUrl' | 'resultsDir' | 'visibilityTimeoutMs' | 'maxDeliveries'>,
  resolver: ServiceResolver
): Promise<Infrastructure> {
  const queueOptions = {
    visibilityTimeoutMs: config.visibilityTimeoutMs,
    maxDeliveries: config.maxDeliveries
  };

  if (config.redisUrl) {
    const client = await connectRedis(config.redisUrl);
    console.log('🔗 Connected to Redis job queue');

    const queue = new RedisJobQueue(client, resolver, queueOptions);
    return {
      kind: 'redis',
      queue,
      resultStore: new RedisResultStore(client),
      close: () => queue.close()
    };
  }

  console.log('📦 No REDIS_URL set, using the in-process job queue');
  const queue = new InMemoryJobQueue(resolver, queueOptions);
  return {
    kind: 'in-memory',
    queue,
    resultStore: new FileResultStore(config.resultsDir),
    close: () => queue.close()
  };
}

/**
 * The processing routine a worker runs for a service: the built-in module
 * when one exists, otherwise a forwarder to the service's gateway.
 */
export function resolveBackend(
  descriptor: ServiceDescriptor,
  builtins: Map<string, BackendModule>,
  client: BackendClient,
  timeoutMs: number
): BackendModule {
  return builtins.get(descriptor.name) ?? createRemoteBackend(descriptor, client, timeoutMs);
}

export interface WorkerSetOptions {
  services: readonly ServiceDescriptor[];
  queue: JobQueue;
  resultStore: ResultStore;
  imageStore: ImageStore;
  backendClient: BackendClient;
  jobTimeoutMs: number;
  concurrency?: number;
}

export function createWorkers(options: WorkerSetOptions): Worker[] {
  const builtins = createBuiltinBackends({ imageStore: options.imageStore });
  const concurrency = options.concurrency ?? 1;
  const workers: Worker[] = [];

  for (const descriptor of options.services) {
    const backend = resolveBackend(descriptor, builtins, options.backendClient, options.jobTimeoutMs);
    for (let i = 0; i < concurrency; i++) {
      workers.push(new Worker({
        serviceName: descriptor.name,
        queue: options.queue,
        resultStore: options.resultStore,
        backend,
        jobTimeoutMs: options.jobTimeoutMs
      }));
    }
  }

  return workers;
}
