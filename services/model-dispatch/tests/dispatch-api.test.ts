import axios, { type AxiosInstance } from 'axios';
import crypto from 'crypto';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { createDispatchApp, type DispatchApp } from '../src/app.js';
import { createBuiltinBackends } from '../src/backends/index.js';
import { parseImagePayload } from '../src/backends/image-hash.js';
import { createGatewayApp } from '../src/gateway/gateway-app.js';
import { InMemoryJobQueue } from '../src/queue/in-memory-job-queue.js';
import { RegistryHandle, ServiceRegistry } from '../src/registry/service-registry.js';
import { ImageStore } from '../src/storage/image-store.js';
import { FileResultStore } from '../src/storage/result-store.js';
import type { BackendModule, ServiceDescriptor } from '../src/types/index.js';
import { Worker } from '../src/worker/worker.js';
import { deferred, listen, type RunningServer } from './helpers.js';

const ADMIN_API_KEY = 'test-secret';

const faceDetectStandIn: BackendModule = {
  name: 'face_detect',
  capability: 'predict',
  async process(payload) {
    return { image_ref: parseImagePayload(payload), faces: [] };
  }
};

const slowModel: BackendModule = {
  name: 'slow_model',
  capability: 'predict',
  process: (payload, context) => new Promise((resolve) => {
    const timer = setTimeout(() => resolve({ done: true }), 3000);
    context.signal.addEventListener('abort', () => {
      clearTimeout(timer);
      resolve({ done: false });
    });
  })
};

function appConfig(adminApiKey: string | undefined) {
  return {
    urlPrefix: '',
    syncTimeoutMs: 1000,
    syncMaxPayloadBytes: 1024,
    healthCheckIntervalMs: 60000,
    adminApiKey,
    nodeEnv: 'test'
  };
}

describe('Dispatch Server HTTP API', () => {
  let directory: string;
  let imageStore: ImageStore;
  let resultStore: FileResultStore;
  let queue: InMemoryJobQueue;
  let imageHash: BackendModule;
  let dispatchApp: DispatchApp;
  let server: RunningServer;
  let http: AxiosInstance;
  let reloadTarget: ServiceRegistry;
  const gateways: RunningServer[] = [];

  const imageBytes = Buffer.from('dispatch-test-image');
  const imageMd5 = crypto.createHash('md5').update(imageBytes).digest('hex');
  const imageRef = `${imageMd5}.png`;

  beforeAll(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'model-dispatch-api-'));
    imageStore = new ImageStore(path.join(directory, 'images'));
    resultStore = new FileResultStore(path.join(directory, 'results'));

    const builtin = createBuiltinBackends({ imageStore }).get('image_hash');
    if (!builtin) {
      throw new Error('image_hash backend missing');
    }
    imageHash = builtin;

    const imageHashGateway = await listen(createGatewayApp({ backend: imageHash, timeoutMs: 2000 }));
    const faceDetectGateway = await listen(createGatewayApp({ backend: faceDetectStandIn, timeoutMs: 2000 }));
    const slowGateway = await listen(createGatewayApp({ backend: slowModel, timeoutMs: 5000 }));
    gateways.push(imageHashGateway, faceDetectGateway, slowGateway);

    // a port nothing listens on
    const gone = await listen(createGatewayApp({ backend: slowModel, timeoutMs: 50 }));
    await gone.close();

    const services: ServiceDescriptor[] = [
      { name: 'image_hash', address: imageHashGateway.url, capability: 'predict' },
      { name: 'face_detect', address: faceDetectGateway.url, capability: 'predict' },
      { name: 'slow_model', address: slowGateway.url, capability: 'predict' },
      { name: 'mnist_fashion', address: gone.url, capability: 'train' }
    ];
    const registry = new RegistryHandle(new ServiceRegistry(services));
    reloadTarget = new ServiceRegistry([
      ...services,
      { name: 'image_shape', address: 'http://127.0.0.1:5013', capability: 'predict' }
    ]);

    queue = new InMemoryJobQueue(registry, { visibilityTimeoutMs: 5000 });
    dispatchApp = createDispatchApp({
      config: appConfig(ADMIN_API_KEY),
      registry,
      queue,
      resultStore,
      imageStore,
      loadRegistry: () => reloadTarget
    });
    server = await listen(dispatchApp.app);
    http = axios.create({ baseURL: server.url, validateStatus: () => true });
  });

  afterAll(async () => {
    await queue.close();
    await server.close();
    await Promise.all(gateways.map(gateway => gateway.close()));
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('stores an uploaded image under its md5 hash', async () => {
    const response = await http.post('/images', imageBytes, { headers: { 'Content-Type': 'image/png' } });

    expect(response.status).toBe(201);
    expect(response.data).toMatchObject({ success: true, image_ref: imageRef, hash_md5: imageMd5 });
  });

  it('takes an asynchronous job from queued through running to succeeded', async () => {
    const entered = deferred();
    const gate = deferred();
    const worker = new Worker({
      serviceName: 'image_hash',
      queue,
      resultStore,
      backend: {
        name: imageHash.name,
        capability: imageHash.capability,
        process: async (payload, context) => {
          entered.resolve();
          await gate.promise;
          return imageHash.process(payload, context);
        }
      },
      jobTimeoutMs: 2000
    });

    const submitted = await http.post('/jobs/image_hash', { image_ref: imageRef });
    expect(submitted.status).toBe(202);
    expect(submitted.data).toMatchObject({ success: true, service: 'image_hash', status: 'queued' });
    const jobId: string = submitted.data.job_id;

    expect((await http.get(`/jobs/${jobId}`)).data.status).toBe('queued');

    const run = worker.runOnce();
    await entered.promise;
    expect((await http.get(`/jobs/${jobId}`)).data).toMatchObject({ status: 'running', attempts: 1 });

    gate.resolve();
    expect((await run)?.status).toBe('succeeded');

    const finished = await http.get(`/jobs/${jobId}`);
    expect(finished.status).toBe(200);
    expect(finished.data).toMatchObject({
      job_id: jobId,
      service: 'image_hash',
      status: 'succeeded',
      result_ref: `result://${jobId}`,
      result: { image_ref: imageRef, size_bytes: imageBytes.length, hash_md5: imageMd5 }
    });

    const download = await http.get<ArrayBuffer>(`/jobs/${jobId}/result`, { responseType: 'arraybuffer' });
    expect(download.status).toBe(200);
    expect(JSON.parse(Buffer.from(download.data).toString('utf8'))).toMatchObject({ hash_md5: imageMd5 });
  });

  it('answers synchronous predictions inline without creating a job', async () => {
    const response = await http.post('/predict/image_hash', { image_ref: imageRef });

    expect(response.status).toBe(200);
    expect(response.data).toMatchObject({ success: true, service: 'image_hash', result: { hash_md5: imageMd5 } });
    expect(await queue.stats('image_hash')).toEqual({ serviceName: 'image_hash', pending: 0, running: 0 });
  });

  it('reports a backend rejection as BackendFailure and records no job', async () => {
    const response = await http.post('/predict/face_detect', { image: 'not-a-ref' });

    expect(response.status).toBe(502);
    expect(response.data.error).toBe('BackendFailure');
    expect(response.data.details).toMatchObject({ service: 'face_detect', status: 400 });
    expect(await queue.stats('face_detect')).toEqual({ serviceName: 'face_detect', pending: 0, running: 0 });
  });

  it('surfaces a slow backend as Timeout', async () => {
    const response = await http.post('/predict/slow_model', {});

    expect(response.status).toBe(504);
    expect(response.data.error).toBe('Timeout');
  });

  it('rejects unknown services on both paths', async () => {
    const sync = await http.post('/predict/scene_detect', {});
    const queued = await http.post('/jobs/scene_detect', {});

    expect(sync.status).toBe(404);
    expect(sync.data).toMatchObject({ success: false, error: 'UnknownService', details: { services: ['scene_detect'] } });
    expect(queued.status).toBe(404);
    expect(queued.data.error).toBe('UnknownService');
  });

  it('names the unknown service before looking at the body', async () => {
    const responses = await Promise.all([
      http.post('/predict/scene_detect', [1, 2]),
      http.post('/jobs/scene_detect', [1, 2]),
      http.post('/dispatch/scene_detect', [1, 2])
    ]);

    expect(responses.map(response => response.status)).toEqual([404, 404, 404]);
    expect(responses.map(response => response.data.error)).toEqual(['UnknownService', 'UnknownService', 'UnknownService']);
  });

  it('answers 404 for unknown job ids', async () => {
    const response = await http.get('/jobs/no-such-job');

    expect(response.status).toBe(404);
    expect(response.data.error).toBe('JobNotFound');
  });

  it('validates request bodies', async () => {
    const emptyFanOut = await http.post('/jobs', { services: [], payload: {} });
    const notAnObject = await http.post('/jobs/image_hash', 'not json', {
      headers: { 'Content-Type': 'application/json' }
    });

    expect(emptyFanOut.status).toBe(400);
    expect(emptyFanOut.data.error).toBe('ValidationError');
    expect(notAnObject.status).toBe(400);
    expect(notAnObject.data.error).toBe('ValidationError');
  });

  it('fans a payload out to several services and reports their status in one call', async () => {
    const rejected = await http.post('/jobs', { services: ['mnist_fashion', 'scene_detect'], payload: {} });
    expect(rejected.status).toBe(404);
    expect(rejected.data.details).toEqual({ services: ['scene_detect'] });
    expect((await queue.stats('mnist_fashion')).pending).toBe(0);

    const accepted = await http.post('/jobs', { services: ['mnist_fashion', 'slow_model'], payload: { epochs: 1 } });
    expect(accepted.status).toBe(202);
    expect(accepted.data.count).toBe(2);
    const firstId: string = accepted.data.jobs[0].job_id;

    const status = await http.post('/jobs/status', { job_ids: [firstId, 'no-such-job'] });
    expect(status.status).toBe(200);
    expect(status.data.jobs[0]).toMatchObject({ job_id: firstId, service: 'mnist_fashion', status: 'queued' });
    expect(status.data.jobs[1]).toEqual({ job_id: 'no-such-job', error: 'JobNotFound' });
  });

  it('picks the path by request type and size', async () => {
    const training = await http.post('/dispatch/mnist_fashion', { kind: 'train', payload: { epochs: 1 } });
    const prediction = await http.post('/dispatch/image_hash', { kind: 'predict', payload: { image_ref: imageRef } });
    const large = await http.post('/dispatch/image_hash', {
      kind: 'predict',
      payload: { image_ref: imageRef, note: 'x'.repeat(2048) }
    });

    expect(training.status).toBe(202);
    expect(training.data).toMatchObject({ mode: 'async', service: 'mnist_fashion', status: 'queued' });
    expect(prediction.status).toBe(200);
    expect(prediction.data).toMatchObject({ mode: 'sync', result: { hash_md5: imageMd5 } });
    expect(large.status).toBe(202);
    expect(large.data.mode).toBe('async');
  });

  it('cancels a queued job and refuses to cancel it twice', async () => {
    const submitted = await http.post('/jobs/mnist_fashion', { epochs: 2 });
    const jobId: string = submitted.data.job_id;

    const cancelled = await http.delete(`/jobs/${jobId}`);
    const again = await http.delete(`/jobs/${jobId}`);
    const result = await http.get(`/jobs/${jobId}/result`);

    expect(cancelled.status).toBe(200);
    expect(cancelled.data).toMatchObject({ status: 'failed', error: { code: 'Cancelled' } });
    expect(again.status).toBe(409);
    expect(again.data.error).toBe('JobConflict');
    expect(result.status).toBe(409);
  });

  it('reports backend health on /services and /health', async () => {
    const before = await http.get('/health');
    expect(before.status).toBe(200);
    expect(before.data.status).toBe('healthy');
    expect(before.data.queues).toHaveLength(4);

    await dispatchApp.healthMonitor.checkAll();

    const services = await http.get('/services');
    const health = new Map<string, string>(
      services.data.services.map((service: { name: string; health: string }) => [service.name, service.health])
    );
    expect(health.get('image_hash')).toBe('up');
    expect(health.get('mnist_fashion')).toBe('down');

    const after = await http.get('/health');
    expect(after.status).toBe(200);
    expect(after.data.status).toBe('degraded');
  });

  it('reloads the registry only with the admin key', async () => {
    const missing = await http.post('/admin/registry/reload');
    const wrong = await http.post('/admin/registry/reload', {}, { headers: { 'x-api-key': 'wrong-key' } });
    const reloaded = await http.post('/admin/registry/reload', {}, { headers: { 'x-api-key': ADMIN_API_KEY } });

    expect(missing.status).toBe(401);
    expect(wrong.status).toBe(401);
    expect(reloaded.status).toBe(200);
    expect(reloaded.data).toMatchObject({ previous_count: 4, count: 5, loaded_at: reloadTarget.loadedAt });
    expect((await http.get('/services')).data.count).toBe(5);

    const errors = await http.get('/errors');
    expect(errors.data.stats.byCode.Unauthorized).toBe(2);
  });

  it('answers 404 for unknown routes', async () => {
    const response = await http.get('/no/such/route');

    expect(response.status).toBe(404);
    expect(response.data.error).toBe('Not Found');
  });
});

describe('Dispatch Server without an admin key', () => {
  it('keeps the administrative API switched off', async () => {
    const registry = new RegistryHandle(new ServiceRegistry([]));
    const queue = new InMemoryJobQueue(registry);
    const { app } = createDispatchApp({
      config: appConfig(undefined),
      registry,
      queue,
      resultStore: new FileResultStore(path.join(os.tmpdir(), 'model-dispatch-unused')),
      imageStore: new ImageStore(path.join(os.tmpdir(), 'model-dispatch-unused')),
      loadRegistry: () => new ServiceRegistry([])
    });
    const server = await listen(app);

    try {
      const response = await axios.post(`${server.url}/admin/registry/reload`, {}, {
        headers: { 'x-api-key': ADMIN_API_KEY },
        validateStatus: () => true
      });

      expect(response.status).toBe(503);
      expect(response.data.error).toBe('ServiceUnavailable');
    } finally {
      await server.close();
      await queue.close();
    }
  });
});
