import dotenv from 'dotenv';
import { createInfrastructure, resolveBackend } from './src/app.js';
import { createBuiltinBackends } from './src/backends/index.js';
import { BackendClient } from './src/clients/backend-client.js';
import { loadConfig } from './src/config.js';
import { ConfigError } from './src/errors.js';
import { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { RegistryHandle, ServiceRegistry } from './src/registry/service-registry.js';
import { ImageStore } from './src/storage/image-store.js';
import { Worker } from './src/worker/worker.js';

dotenv.config();

/**
 * Usage: worker-service <service_name> [concurrency]
 * The service name is always given explicitly; a worker never guesses which queue it owns.
 */
async function startWorker(argv: string[]): Promise<void> {
  const [serviceName, concurrencyArg] = argv;
  if (!serviceName) {
    throw new ConfigError('Usage: worker-service <service_name> [concurrency]');
  }
  const concurrency = concurrencyArg ? Number.parseInt(concurrencyArg, 10) : 1;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`Concurrency must be a positive integer, got "${concurrencyArg}"`);
  }

  const config = loadConfig();
  if (!config.redisUrl) {
    throw new ConfigError('REDIS_URL is required: a worker process shares its queue with the dispatch server');
  }

  const registry = new RegistryHandle(ServiceRegistry.loadFromFile(config.servicesConfigPath));
  const descriptor = registry.require(serviceName);

  const infrastructure = await createInfrastructure(config, registry);
  const backendClient = new BackendClient({ timeoutMs: config.jobTimeoutMs });
  const builtins = createBuiltinBackends({ imageStore: new ImageStore(config.imagesDir) });
  const backend = resolveBackend(descriptor, builtins, backendClient, config.jobTimeoutMs);

  const workers = Array.from({ length: concurrency }, () => new Worker({
    serviceName,
    queue: infrastructure.queue,
    resultStore: infrastructure.resultStore,
    backend,
    jobTimeoutMs: config.jobTimeoutMs
  }));

  const gracefulShutdown = new GracefulShutdown({ timeout: config.shutdownTimeoutMs });
  gracefulShutdown.addCleanupTask('workers', async () => {
    await Promise.all(workers.map(worker => worker.stop()));
  });
  gracefulShutdown.addCleanupTask('job-queue', () => infrastructure.close());

  console.log(`🚀 Starting ${concurrency} worker(s) for ${serviceName} (${builtins.has(serviceName) ? 'built-in' : 'remote'} backend)`);
  workers.forEach(worker => worker.start());
}

startWorker(process.argv.slice(2)).catch((error: unknown) => {
  console.error('💥 Failed to start worker:', error);
  process.exit(1);
});
