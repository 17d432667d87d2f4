import dotenv from 'dotenv';
import type { Server } from 'http';
import { createDispatchApp, createInfrastructure, createWorkers } from './src/app.js';
import { BackendClient } from './src/clients/backend-client.js';
import { loadConfig } from './src/config.js';
import { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { LeaseReaper } from './src/queue/job-queue.js';
import { RegistryHandle, ServiceRegistry } from './src/registry/service-registry.js';
import { ImageStore } from './src/storage/image-store.js';

dotenv.config();

async function startService(): Promise<void> {
  const config = loadConfig();

  console.log('🚀 Starting Model Dispatch Service (Production Mode)...');
  console.log(`Environment: ${config.nodeEnv}`);
  console.log(`Port: ${config.port}`);
  console.log(`URL Prefix: ${config.urlPrefix || '/'}`);

  console.log('📋 Loading service registry...');
  const registry = new RegistryHandle(ServiceRegistry.loadFromFile(config.servicesConfigPath));
  console.log(`✅ ${registry.current.size} services registered`);

  const infrastructure = await createInfrastructure(config, registry);
  const imageStore = new ImageStore(config.imagesDir);
  const backendClient = new BackendClient({ timeoutMs: config.syncTimeoutMs });

  const { app, healthMonitor, errorHandler } = createDispatchApp({
    config,
    registry,
    queue: infrastructure.queue,
    resultStore: infrastructure.resultStore,
    imageStore,
    backendClient,
    loadRegistry: () => ServiceRegistry.loadFromFile(config.servicesConfigPath)
  });

  const gracefulShutdown = new GracefulShutdown({ timeout: config.shutdownTimeoutMs });

  // the dispatch server owns lease expiry; worker processes only consume
  const reaper = new LeaseReaper(infrastructure.queue, config.reaperIntervalMs);
  reaper.start();
  healthMonitor.start();

  const workers = config.embeddedWorkers
    ? createWorkers({
      services: registry.current.list(),
      queue: infrastructure.queue,
      resultStore: infrastructure.resultStore,
      imageStore,
      backendClient,
      jobTimeoutMs: config.jobTimeoutMs
    })
    : [];
  if (infrastructure.kind === 'in-memory' && workers.length === 0) {
    console.warn('⚠️  In-process queue without EMBEDDED_WORKERS=true: queued jobs will never run');
  }
  workers.forEach(worker => worker.start());

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.port, () => resolve(listening));
  });
  console.log('🌐 Model Dispatch service running on port', config.port);
  console.log(`🔍 Health check available at: http://localhost:${config.port}${config.urlPrefix}/health`);
  console.log(`🚨 Error stats available at: http://localhost:${config.port}${config.urlPrefix}/errors`);

  gracefulShutdown.addCleanupTask('http-server', () => new Promise<void>((resolve, reject) => {
    console.log('🛑 Closing HTTP server...');
    server.close((error) => (error ? reject(error) : resolve()));
  }));
  gracefulShutdown.addCleanupTask('workers', async () => {
    await Promise.all(workers.map(worker => worker.stop()));
  });
  gracefulShutdown.addCleanupTask('background-tasks', async () => {
    reaper.stop();
    healthMonitor.stop();
    const cleared = errorHandler.clearOldErrors();
    console.log(`🧹 Cleared ${cleared} old error records`);
  });
  gracefulShutdown.addCleanupTask('job-queue', () => infrastructure.close());

  console.log('🎉 Model Dispatch Service started successfully!');
}

startService().catch((error: unknown) => {
  console.error('💥 Failed to start service:', error);
  process.exit(1);
});
