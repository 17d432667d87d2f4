import { describe, it, expect, vi } from 'vitest';
import { ConfigError } from '../src/errors.js';
import { InMemoryJobQueue } from '../src/queue/in-memory-job-queue.js';
import { ServiceRegistry } from '../src/registry/service-registry.js';
import { InMemoryResultStore, resultRefFor } from '../src/storage/result-store.js';
import type { BackendModule, BackendOutput, JobPayload, ProcessingContext } from '../src/types/index.js';
import { Worker, summarizeError } from '../src/worker/worker.js';
import { manualClock } from './helpers.js';

const registry = new ServiceRegistry([
  { name: 'face_detect', address: 'http://127.0.0.1:5012', capability: 'predict' }
]);

function backend(run: (payload: JobPayload, context: ProcessingContext) => Promise<BackendOutput>): BackendModule {
  return { name: 'face_detect', capability: 'predict', process: run };
}

function setup(run: BackendModule['process'], jobTimeoutMs: number = 1000) {
  const clock = manualClock();
  const queue = new InMemoryJobQueue(registry, { visibilityTimeoutMs: 5000, now: clock.now });
  const resultStore = new InMemoryResultStore();
  const worker = new Worker({
    serviceName: 'face_detect',
    queue,
    resultStore,
    backend: backend(run),
    workerId: 'worker-1',
    jobTimeoutMs
  });
  return { queue, resultStore, worker, clock };
}

describe('Worker', () => {
  it('writes the result and acknowledges success', async () => {
    const { queue, resultStore, worker } = setup(async () => ({ faces: 2 }));
    const jobId = await queue.enqueue('face_detect', { image_ref: 'a.png' });

    const job = await worker.runOnce();

    expect(job?.status).toBe('succeeded');
    expect(job?.resultRef).toBe(`result://${jobId}`);
    expect((await resultStore.get(`result://${jobId}`)).toString()).toBe('{"faces":2}');
    expect(worker.getStats()).toMatchObject({ processed: 1, succeeded: 1, failed: 0 });
  });

  it('passes the payload to the processing routine', async () => {
    const run = vi.fn(async (payload: JobPayload) => ({ echoed: payload }));
    const { queue, worker } = setup(run);
    await queue.enqueue('face_detect', { image_ref: 'b.png' });

    await worker.runOnce();

    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0]).toEqual({ image_ref: 'b.png' });
  });

  it('records a failure instead of dropping it', async () => {
    const { queue, resultStore, worker } = setup(async () => {
      throw new Error('model exploded');
    });
    const jobId = await queue.enqueue('face_detect', {});

    const job = await worker.runOnce();

    expect(job?.status).toBe('failed');
    expect(job?.error).toEqual({ code: 'BackendFailure', message: 'model exploded' });
    expect(await resultStore.has(`result://${jobId}`)).toBe(false);
  });

  it('fails a job that runs past its time limit', async () => {
    const { queue, worker } = setup((payload, context) => new Promise<BackendOutput>((_, reject) => {
      context.signal.addEventListener('abort', () => reject(new Error('aborted')));
    }), 20);
    await queue.enqueue('face_detect', {});

    const job = await worker.runOnce();

    expect(job?.status).toBe('failed');
    expect(job?.error?.code).toBe('Timeout');
  });

  it('stops at the next checkpoint once cancellation is requested', async () => {
    const { queue, worker } = setup(async (payload, context) => {
      if (context.jobId) {
        await queue.cancel(context.jobId);
      }
      await context.checkpoint();
      return { faces: 1 };
    });
    await queue.enqueue('face_detect', {});

    const job = await worker.runOnce();

    expect(job?.status).toBe('failed');
    expect(job?.error?.code).toBe('Cancelled');
  });

  it('reuses an artifact left by an earlier delivery', async () => {
    const run = vi.fn(async () => ({ faces: 3 }));
    const { queue, resultStore, worker } = setup(run);
    const jobId = await queue.enqueue('face_detect', {});
    await resultStore.put(jobId, Buffer.from('{"faces":1}'));

    const job = await worker.runOnce();

    expect(job?.status).toBe('succeeded');
    expect(job?.resultRef).toBe(resultRefFor(jobId));
    expect(run).not.toHaveBeenCalled();
    expect((await resultStore.get(resultRefFor(jobId))).toString()).toBe('{"faces":1}');
  });

  it('fails the job when the result store cannot be reached', async () => {
    const run = vi.fn(async () => ({ faces: 3 }));
    const { queue, resultStore, worker } = setup(run);
    vi.spyOn(resultStore, 'has').mockRejectedValue(new Error('store unreachable'));
    const jobId = await queue.enqueue('face_detect', {});

    const acked = await worker.runOnce();
    const job = await queue.getJob(jobId);

    expect(acked?.status).toBe('failed');
    expect(job?.status).toBe('failed');
    expect(job?.error).toEqual({ code: 'BackendFailure', message: 'store unreachable' });
    expect(run).not.toHaveBeenCalled();
  });

  it('discards its outcome when the lease was lost', async () => {
    const harness = setup(async () => {
      harness.clock.advance(6000);
      await harness.queue.reapExpired();
      await harness.queue.dequeue('face_detect', { workerId: 'worker-2', block: false });
      return { faces: 0 };
    });
    const jobId = await harness.queue.enqueue('face_detect', {});

    const acked = await harness.worker.runOnce();
    const job = await harness.queue.getJob(jobId);

    expect(acked).toBeNull();
    expect(job?.status).toBe('running');
    expect(job?.workerId).toBe('worker-2');
    expect(harness.worker.getStats().leasesLost).toBe(1);
  });

  it('returns null when there is nothing to do', async () => {
    const { worker } = setup(async () => ({}));

    expect(await worker.runOnce()).toBeNull();
  });

  it('consumes the queue until stopped', async () => {
    const { queue, worker } = setup(async () => ({ faces: 1 }));
    worker.start();

    const jobId = await queue.enqueue('face_detect', {});
    await vi.waitFor(async () => {
      expect((await queue.getJob(jobId))?.status).toBe('succeeded');
    });

    await worker.stop();
    expect(worker.getStats().isRunning).toBe(false);
  });

  it('refuses a processing routine for another service', () => {
    const { queue } = setup(async () => ({}));

    expect(() => new Worker({
      serviceName: 'image_hash',
      queue,
      resultStore: new InMemoryResultStore(),
      backend: backend(async () => ({}))
    })).toThrow(ConfigError);
  });
});

describe('summarizeError', () => {
  it('keeps timeout and cancellation codes and folds the rest into BackendFailure', () => {
    expect(summarizeError(new Error('boom'))).toEqual({ code: 'BackendFailure', message: 'boom' });
    expect(summarizeError('plain failure')).toEqual({ code: 'BackendFailure', message: 'plain failure' });
  });
});
