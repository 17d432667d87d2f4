import { v4 as uuidv4 } from 'uuid';
import {
  EnqueueFailureError,
  JobConflictError,
  JobNotFoundError,
  LeaseLostError,
  UnknownServiceError
} from '../errors.js';
import type {
  CancelResult,
  DequeueOptions,
  Job,
  JobOutcome,
  JobPayload,
  QueueStats,
  ServiceResolver
} from '../types/index.js';
import {
  DEFAULT_QUEUE_OPTIONS,
  type JobQueue,
  type JobQueueOptions,
  type ReapResult,
  abandonedError,
  applyOutcome,
  assertTransition,
  cancelledError,
  isTerminal
} from './job-queue.js';

interface Lease {
  workerId: string;
  expiresAt: number;
}

interface Waiter {
  workerId: string;
  deliver: (job: Job | null) => void;
}

/**
 * Single-process queue (tests, local development, embedded workers).
 * The event loop serialises every operation, so a claim is never shared.
 */
export class InMemoryJobQueue implements JobQueue {
  private readonly jobs: Map<string, Job> = new Map();
  private readonly pending: Map<string, string[]> = new Map();
  private readonly leases: Map<string, Lease> = new Map();
  private readonly waiters: Map<string, Waiter[]> = new Map();
  private readonly options: JobQueueOptions;
  private closed: boolean = false;

  constructor(
    private readonly resolver: ServiceResolver,
    options: Partial<JobQueueOptions> = {}
  ) {
    this.options = { ...DEFAULT_QUEUE_OPTIONS, ...options };
  }

  async enqueue(serviceName: string, payload: JobPayload): Promise<string> {
    if (!this.resolver.resolve(serviceName)) {
      throw new UnknownServiceError(serviceName);
    }
    if (this.closed) {
      throw new EnqueueFailureError('Job queue is closed');
    }

    const job: Job = {
      id: uuidv4(),
      serviceName,
      payload: structuredClone(payload),
      status: 'queued',
      createdAt: this.timestamp(),
      attempts: 0,
      cancelRequested: false
    };

    this.jobs.set(job.id, job);
    this.pendingFor(serviceName).push(job.id);
    this.wakeWaiters(serviceName);
    return job.id;
  }

  async dequeue(serviceName: string, options: DequeueOptions): Promise<Job | null> {
    const claimed = this.claimNext(serviceName, options.workerId);
    if (claimed || options.block === false || this.closed || options.signal?.aborted) {
      return claimed;
    }

    return new Promise<Job | null>((resolve) => {
      const onAbort = (): void => {
        this.removeWaiter(serviceName, waiter);
        resolve(null);
      };
      const waiter: Waiter = {
        workerId: options.workerId,
        deliver: (job) => {
          options.signal?.removeEventListener('abort', onAbort);
          resolve(job);
        }
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });
      this.waitersFor(serviceName).push(waiter);
    });
  }

  async ack(jobId: string, workerId: string, outcome: JobOutcome): Promise<Job> {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }

    // an expired lease is lost even before the reaper gets to it
    const lease = this.leases.get(jobId);
    if (!lease || lease.workerId !== workerId || lease.expiresAt <= this.options.now()) {
      throw new LeaseLostError(jobId, workerId);
    }

    applyOutcome(job, outcome, this.timestamp());
    this.leases.delete(jobId);
    return structuredClone(job);
  }

  async getJob(jobId: string): Promise<Job | null> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  async cancel(jobId: string): Promise<CancelResult> {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    if (isTerminal(job.status)) {
      throw new JobConflictError(`Job ${jobId} has already ${job.status}`, jobId);
    }

    const queue = this.pendingFor(job.serviceName);
    const index = queue.indexOf(jobId);
    if (index >= 0) {
      queue.splice(index, 1);
      applyOutcome(job, { status: 'failed', error: cancelledError() }, this.timestamp());
      return { job: structuredClone(job), removed: true };
    }

    job.cancelRequested = true;
    return { job: structuredClone(job), removed: false };
  }

  async isCancelRequested(jobId: string): Promise<boolean> {
    return this.jobs.get(jobId)?.cancelRequested ?? false;
  }

  async reapExpired(): Promise<ReapResult> {
    const now = this.options.now();
    const result: ReapResult = { requeued: [], failed: [] };
    const touched = new Set<string>();

    for (const [jobId, lease] of this.leases) {
      if (lease.expiresAt > now) {
        continue;
      }
      this.leases.delete(jobId);

      const job = this.jobs.get(jobId);
      if (!job || isTerminal(job.status)) {
        continue;
      }

      if (job.cancelRequested) {
        applyOutcome(job, { status: 'failed', error: cancelledError() }, this.timestamp());
        result.failed.push(jobId);
      } else if (job.attempts < this.options.maxDeliveries) {
        job.workerId = undefined;
        this.pendingFor(job.serviceName).unshift(jobId);
        touched.add(job.serviceName);
        result.requeued.push(jobId);
      } else {
        applyOutcome(job, { status: 'failed', error: abandonedError(job.attempts) }, this.timestamp());
        result.failed.push(jobId);
      }
    }

    for (const serviceName of touched) {
      this.wakeWaiters(serviceName);
    }
    return result;
  }

  async stats(serviceName: string): Promise<QueueStats> {
    let running = 0;
    for (const jobId of this.leases.keys()) {
      if (this.jobs.get(jobId)?.serviceName === serviceName) {
        running++;
      }
    }
    return {
      serviceName,
      pending: this.pendingFor(serviceName).length,
      running
    };
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const waiters of this.waiters.values()) {
      for (const waiter of waiters.splice(0)) {
        waiter.deliver(null);
      }
    }
  }

  private claimNext(serviceName: string, workerId: string): Job | null {
    const queue = this.pendingFor(serviceName);
    let jobId = queue.shift();
    while (jobId !== undefined) {
      const job = this.jobs.get(jobId);
      if (job && !isTerminal(job.status)) {
        assertTransition(job, 'running');
        const now = this.options.now();
        job.status = 'running';
        job.startedAt = job.startedAt ?? new Date(now).toISOString();
        job.workerId = workerId;
        job.attempts++;
        this.leases.set(jobId, { workerId, expiresAt: now + this.options.visibilityTimeoutMs });
        return structuredClone(job);
      }
      jobId = queue.shift();
    }
    return null;
  }

  private wakeWaiters(serviceName: string): void {
    const waiters = this.waitersFor(serviceName);
    while (waiters.length > 0) {
      const waiter = waiters[0];
      const job = this.claimNext(serviceName, waiter.workerId);
      if (!job) {
        return;
      }
      waiters.shift();
      waiter.deliver(job);
    }
  }

  private removeWaiter(serviceName: string, waiter: Waiter): void {
    const waiters = this.waitersFor(serviceName);
    const index = waiters.indexOf(waiter);
    if (index >= 0) {
      waiters.splice(index, 1);
    }
  }

  private pendingFor(serviceName: string): string[] {
    let queue = this.pending.get(serviceName);
    if (!queue) {
      queue = [];
      this.pending.set(serviceName, queue);
    }
    return queue;
  }

  private waitersFor(serviceName: string): Waiter[] {
    let waiters = this.waiters.get(serviceName);
    if (!waiters) {
      waiters = [];
      this.waiters.set(serviceName, waiters);
    }
    return waiters;
  }

  private timestamp(): string {
    return new Date(this.options.now()).toISOString();
  }
}
