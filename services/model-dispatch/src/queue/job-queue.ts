import { z } from 'zod';
import { JobConflictError } from '../errors.js';
import type {
  CancelResult,
  DequeueOptions,
  Job,
  JobOutcome,
  JobPayload,
  JobStatus,
  QueueStats
} from '../types/index.js';

export interface JobQueueOptions {
  /** How long a claimed job stays invisible to other workers before it counts as abandoned. */
  visibilityTimeoutMs: number;
  /** Total deliveries allowed per job, the first one included. */
  maxDeliveries: number;
  now: () => number;
}

export const DEFAULT_QUEUE_OPTIONS: JobQueueOptions = {
  visibilityTimeoutMs: 60000,
  maxDeliveries: 2,
  now: () => Date.now()
};

export interface ReapResult {
  requeued: string[];
  failed: string[];
}

/**
 * Durable per-service FIFO with leased delivery.
 * enqueue rejects unknown services; dequeue hands each job to exactly one worker
 * and records a lease; ack is only accepted from the worker holding that lease.
 */
export interface JobQueue {
  enqueue(serviceName: string, payload: JobPayload): Promise<string>;
  dequeue(serviceName: string, options: DequeueOptions): Promise<Job | null>;
  ack(jobId: string, workerId: string, outcome: JobOutcome): Promise<Job>;
  getJob(jobId: string): Promise<Job | null>;
  cancel(jobId: string): Promise<CancelResult>;
  isCancelRequested(jobId: string): Promise<boolean>;
  /** Requeue or fail every job whose lease has expired. */
  reapExpired(): Promise<ReapResult>;
  stats(serviceName: string): Promise<QueueStats>;
  close(): Promise<void>;
}

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['running', 'failed'],
  // running -> running is a redelivery claim after an abandoned lease
  running: ['running', 'succeeded', 'failed'],
  succeeded: [],
  failed: []
};

export function isTerminal(status: JobStatus): boolean {
  return status === 'succeeded' || status === 'failed';
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(job: Job, to: JobStatus): void {
  if (!canTransition(job.status, to)) {
    throw new JobConflictError(`Job ${job.id} cannot move from ${job.status} to ${to}`, job.id);
  }
}

/**
 * Apply a worker outcome to a job record in place.
 */
export function applyOutcome(job: Job, outcome: JobOutcome, completedAt: string): void {
  assertTransition(job, outcome.status);
  job.status = outcome.status;
  job.completedAt = completedAt;
  if (outcome.status === 'succeeded') {
    job.resultRef = outcome.resultRef;
    job.error = undefined;
  } else {
    job.error = outcome.error;
  }
}

export function abandonedError(attempts: number): { code: string; message: string } {
  return {
    code: 'WorkerCrash',
    message: `Job abandoned: lease expired on delivery ${attempts} with no acknowledgement`
  };
}

export function cancelledError(): { code: string; message: string } {
  return { code: 'Cancelled', message: 'Job was cancelled before completion' };
}

const JobRecordSchema = z.object({
  id: z.string(),
  serviceName: z.string(),
  payload: z.record(z.unknown()),
  status: z.enum(['queued', 'running', 'succeeded', 'failed']),
  createdAt: z.string(),
  startedAt: z.string().optional(),
  completedAt: z.string().optional(),
  resultRef: z.string().optional(),
  error: z.object({ code: z.string(), message: z.string() }).optional(),
  attempts: z.number().int().nonnegative(),
  workerId: z.string().optional(),
  cancelRequested: z.boolean()
});

export function parseJobRecord(raw: string): Job {
  return JobRecordSchema.parse(JSON.parse(raw));
}

/**
 * Runs reapExpired on an interval for one queue.
 */
export class LeaseReaper {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly queue: JobQueue,
    private readonly intervalMs: number
  ) {}

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async tick(): Promise<ReapResult> {
    if (this.running) {
      return { requeued: [], failed: [] };
    }
    this.running = true;
    try {
      const result = await this.queue.reapExpired();
      if (result.requeued.length > 0) {
        console.warn(`♻️  Redelivering ${result.requeued.length} abandoned job(s): ${result.requeued.join(', ')}`);
      }
      if (result.failed.length > 0) {
        console.warn(`💀 Failed ${result.failed.length} abandoned job(s): ${result.failed.join(', ')}`);
      }
      return result;
    } catch (error) {
      console.error('Lease reaper pass failed:', error);
      return { requeued: [], failed: [] };
    } finally {
      this.running = false;
    }
  }
}
