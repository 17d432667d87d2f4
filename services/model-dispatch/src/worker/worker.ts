import { v4 as uuidv4 } from 'uuid';
import { createProcessingContext, encodeOutput } from '../backends/index.js';
import {
  ConfigError,
  DispatchError,
  JobConflictError,
  LeaseLostError,
  TimeoutError,
  errorMessage
} from '../errors.js';
import type { JobQueue } from '../queue/job-queue.js';
import { resultRefFor } from '../storage/result-store.js';
import type { BackendModule, BackendOutput, Job, JobError, JobOutcome, ResultStore } from '../types/index.js';

export interface WorkerOptions {
  serviceName: string;
  queue: JobQueue;
  resultStore: ResultStore;
  backend: BackendModule;
  workerId?: string;
  jobTimeoutMs?: number;
  /** Pause after a failed dequeue (broker unreachable) before trying again. */
  errorBackoffMs?: number;
}

export interface WorkerStats {
  workerId: string;
  serviceName: string;
  isRunning: boolean;
  currentJobId: string | null;
  processed: number;
  succeeded: number;
  failed: number;
  leasesLost: number;
}

const PASSTHROUGH_CODES = new Set(['Timeout', 'Cancelled']);

/**
 * Turn any processing failure into the error summary stored on the job.
 */
export function summarizeError(error: unknown): JobError {
  if (error instanceof DispatchError && PASSTHROUGH_CODES.has(error.code)) {
    return { code: error.code, message: error.message };
  }
  return { code: 'BackendFailure', message: errorMessage(error) };
}

/**
 * Consumes one service's queue, one job at a time.
 * Run several Worker instances (in one process or many) to scale a service.
 */
export class Worker {
  readonly workerId: string;
  readonly serviceName: string;
  private readonly queue: JobQueue;
  private readonly resultStore: ResultStore;
  private readonly backend: BackendModule;
  private readonly jobTimeoutMs: number;
  private readonly errorBackoffMs: number;
  private readonly stopController: AbortController = new AbortController();
  private loop: Promise<void> | null = null;
  private currentJobId: string | null = null;
  private readonly counters = { processed: 0, succeeded: 0, failed: 0, leasesLost: 0 };

  constructor(options: WorkerOptions) {
    if (options.backend.name !== options.serviceName) {
      throw new ConfigError(
        `Worker for ${options.serviceName} cannot run the processing routine of ${options.backend.name}`
      );
    }
    this.serviceName = options.serviceName;
    this.queue = options.queue;
    this.resultStore = options.resultStore;
    this.backend = options.backend;
    this.workerId = options.workerId ?? `${options.serviceName}-${uuidv4().slice(0, 8)}`;
    this.jobTimeoutMs = options.jobTimeoutMs ?? 45000;
    this.errorBackoffMs = options.errorBackoffMs ?? 1000;
  }

  start(): void {
    if (this.loop) {
      return;
    }
    console.log(`👷 Worker ${this.workerId} consuming queue for ${this.serviceName}`);
    this.loop = this.run();
  }

  /**
   * Stop taking new jobs and wait for the job in hand to be acknowledged.
   */
  async stop(): Promise<void> {
    this.stopController.abort();
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    console.log(`🛑 Worker ${this.workerId} stopped`);
  }

  /**
   * Take at most one job and see it through to acknowledgement.
   * Returns the acknowledged job, or null when nothing was taken or the lease was lost.
   */
  async runOnce(block: boolean = false): Promise<Job | null> {
    const job = await this.queue.dequeue(this.serviceName, {
      workerId: this.workerId,
      block,
      signal: this.stopController.signal
    });
    if (!job) {
      return null;
    }
    return this.execute(job);
  }

  getStats(): WorkerStats {
    return {
      workerId: this.workerId,
      serviceName: this.serviceName,
      isRunning: this.loop !== null && !this.stopController.signal.aborted,
      currentJobId: this.currentJobId,
      ...this.counters
    };
  }

  private async run(): Promise<void> {
    while (!this.stopController.signal.aborted) {
      try {
        await this.runOnce(true);
      } catch (error) {
        console.error(`Worker ${this.workerId} failed to take a job:`, error);
        await this.pause(this.errorBackoffMs);
      }
    }
  }

  private async execute(job: Job): Promise<Job | null> {
    this.currentJobId = job.id;
    console.log(`⚙️  [${this.workerId}] Running job ${job.id} (delivery ${job.attempts})`);
    const startedAt = Date.now();

    try {
      const outcome = await this.produceOutcome(job);
      this.counters.processed++;
      const acked = await this.queue.ack(job.id, this.workerId, outcome);
      if (acked.status === 'succeeded') {
        this.counters.succeeded++;
        console.log(`✅ [${this.workerId}] Job ${job.id} succeeded in ${Date.now() - startedAt}ms`);
      } else {
        this.counters.failed++;
        console.error(`❌ [${this.workerId}] Job ${job.id} failed: ${acked.error?.code} - ${acked.error?.message}`);
      }
      return acked;
    } catch (error) {
      if (error instanceof LeaseLostError) {
        this.counters.leasesLost++;
        console.warn(`⚠️  [${this.workerId}] Lease on job ${job.id} expired before acknowledgement; outcome discarded`);
        return null;
      }
      throw error;
    } finally {
      this.currentJobId = null;
    }
  }

  private async produceOutcome(job: Job): Promise<JobOutcome> {
    const expectedRef = resultRefFor(job.id);
    const jobController = new AbortController();
    const context = createProcessingContext({
      serviceName: this.serviceName,
      jobId: job.id,
      signal: jobController.signal,
      isCancelled: () => this.queue.isCancelRequested(job.id)
    });

    try {
      // an earlier delivery may have written the artifact and died before acknowledging
      if (await this.resultStore.has(expectedRef)) {
        return { status: 'succeeded', resultRef: expectedRef };
      }
      await context.checkpoint();
      const output = await this.withTimeout(this.backend.process(job.payload, context), jobController);
      await context.checkpoint();
      return { status: 'succeeded', resultRef: await this.storeResult(job.id, output) };
    } catch (error) {
      return { status: 'failed', error: summarizeError(error) };
    }
  }

  private async storeResult(jobId: string, output: BackendOutput): Promise<string> {
    try {
      return await this.resultStore.put(jobId, encodeOutput(output));
    } catch (error) {
      // artifacts are write-once; a concurrent delivery already stored this one
      if (error instanceof JobConflictError) {
        return resultRefFor(jobId);
      }
      throw error;
    }
  }

  private async withTimeout(work: Promise<BackendOutput>, controller: AbortController): Promise<BackendOutput> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // reject before aborting so the race settles as a timeout
        reject(new TimeoutError(`Job exceeded its ${this.jobTimeoutMs}ms time limit`, this.jobTimeoutMs));
        controller.abort();
      }, this.jobTimeoutMs);
    });
    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private pause(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(done, ms);
      const signal = this.stopController.signal;
      function done(): void {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        resolve();
      }
      signal.addEventListener('abort', done, { once: true });
    });
  }
}
