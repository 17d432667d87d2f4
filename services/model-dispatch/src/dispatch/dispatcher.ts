import type { BackendClient } from '../clients/backend-client.js';
import {
  DispatchError,
  EnqueueFailureError,
  JobConflictError,
  JobNotFoundError,
  UnknownServiceError,
  errorMessage
} from '../errors.js';
import type { JobQueue } from '../queue/job-queue.js';
import type { RegistryHandle, ServiceRegistry } from '../registry/service-registry.js';
import type {
  DispatchKind,
  DispatchOutcome,
  Job,
  JobPayload,
  JobStatusView,
  ResultStore,
  ServiceDescriptor,
  SubmitResponse
} from '../types/index.js';

export interface DispatcherOptions {
  syncTimeoutMs: number;
  syncMaxPayloadBytes: number;
}

export interface DispatchRequest {
  kind: DispatchKind;
  payload: JobPayload;
}

export type BatchStatusEntry = JobStatusView | { job_id: string; error: 'JobNotFound' };

/** A fan-out job cancelled because a later enqueue failed; `cancelled` is false if it could not be removed. */
export interface WithdrawnJob extends SubmitResponse {
  cancelled: boolean;
}

/**
 * Single entry point for prediction and training requests.
 *
 * Synchronous requests go straight to the backend's gateway and are never recorded.
 * Asynchronous requests become jobs on the service's queue; their status and result
 * are read back by job id.
 */
export class Dispatcher {
  private readonly options: DispatcherOptions;
  private readonly counters = { syncRequests: 0, syncFailures: 0, jobsSubmitted: 0, enqueueFailures: 0 };

  constructor(
    private readonly registry: RegistryHandle,
    private readonly queue: JobQueue,
    private readonly resultStore: ResultStore,
    private readonly backendClient: BackendClient,
    options: Partial<DispatcherOptions> = {}
  ) {
    this.options = {
      syncTimeoutMs: 30000,
      syncMaxPayloadBytes: 1024 * 1024,
      ...options
    };
  }

  /**
   * Synchronous path: forward to the backend and return its response body.
   * Fails with UnknownService, Timeout or BackendFailure.
   */
  async predict(serviceName: string, payload: JobPayload): Promise<unknown> {
    const descriptor = this.registry.require(serviceName);
    this.counters.syncRequests++;
    try {
      return await this.backendClient.predict(descriptor, payload, { timeoutMs: this.options.syncTimeoutMs });
    } catch (error) {
      this.counters.syncFailures++;
      throw error;
    }
  }

  /**
   * Asynchronous path: enqueue and return at once with the job id.
   */
  async submit(serviceName: string, payload: JobPayload): Promise<SubmitResponse> {
    this.registry.require(serviceName);
    const jobId = await this.enqueue(serviceName, payload);
    return { job_id: jobId, service: serviceName, status: 'queued' };
  }

  /**
   * Fan one payload out to several services. Every name is checked before
   * anything is enqueued, so an unknown service creates no jobs at all.
   * If an enqueue fails part way, the jobs already queued are cancelled and
   * listed under `details.jobs` of the EnqueueFailure.
   */
  async submitMany(serviceNames: string[], payload: JobPayload): Promise<SubmitResponse[]> {
    const unique = Array.from(new Set(serviceNames));
    const unknown = unique.filter(name => !this.registry.resolve(name));
    if (unknown.length > 0) {
      throw new UnknownServiceError(unknown);
    }

    const submitted: SubmitResponse[] = [];
    for (const serviceName of unique) {
      try {
        submitted.push(await this.submit(serviceName, payload));
      } catch (error) {
        if (submitted.length === 0) {
          throw error;
        }
        const jobs = await this.withdraw(submitted);
        if (error instanceof EnqueueFailureError) {
          throw new EnqueueFailureError(error.message, { jobs });
        }
        throw error;
      }
    }
    return submitted;
  }

  /**
   * Pick the path by request type and size, never by which backend is named.
   */
  async dispatch(serviceName: string, request: DispatchRequest): Promise<DispatchOutcome> {
    this.registry.require(serviceName);
    if (this.chooseMode(request) === 'async') {
      return { mode: 'async', job: await this.submit(serviceName, request.payload) };
    }
    return { mode: 'sync', service: serviceName, result: await this.predict(serviceName, request.payload) };
  }

  chooseMode(request: DispatchRequest): 'sync' | 'async' {
    if (request.kind === 'train') {
      return 'async';
    }
    return payloadSize(request.payload) > this.options.syncMaxPayloadBytes ? 'async' : 'sync';
  }

  async getJob(jobId: string): Promise<Job> {
    const job = await this.queue.getJob(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  /**
   * Pure state query: Queued, Running, Succeeded (with result) or Failed (with error).
   * An artifact that cannot be read leaves `result` out; the status and `result_ref` still answer.
   */
  async getJobStatus(jobId: string): Promise<JobStatusView> {
    const job = await this.getJob(jobId);
    const view = toStatusView(job);
    if (job.status === 'succeeded' && job.resultRef) {
      try {
        view.result = decodeResult(await this.resultStore.get(job.resultRef));
      } catch (error) {
        console.warn(`⚠️  Result ${job.resultRef} of job ${jobId} could not be read: ${errorMessage(error)}`);
      }
    }
    return view;
  }

  async getJobStatuses(jobIds: string[]): Promise<BatchStatusEntry[]> {
    const entries: BatchStatusEntry[] = [];
    for (const jobId of jobIds) {
      try {
        entries.push(await this.getJobStatus(jobId));
      } catch (error) {
        if (!(error instanceof JobNotFoundError)) {
          throw error;
        }
        entries.push({ job_id: jobId, error: 'JobNotFound' });
      }
    }
    return entries;
  }

  async getResult(jobId: string): Promise<Buffer> {
    const job = await this.getJob(jobId);
    if (job.status !== 'succeeded' || !job.resultRef) {
      throw new JobConflictError(`Job ${jobId} has no result (status: ${job.status})`, jobId);
    }
    return this.resultStore.get(job.resultRef);
  }

  async cancel(jobId: string): Promise<JobStatusView> {
    const { job, removed } = await this.queue.cancel(jobId);
    console.log(removed ? `🚫 Job ${jobId} cancelled before execution` : `🚫 Cancellation requested for running job ${jobId}`);
    return toStatusView(job);
  }

  /**
   * Fail fast with UnknownService, before anything else about the request is looked at.
   */
  requireService(serviceName: string): ServiceDescriptor {
    return this.registry.require(serviceName);
  }

  listServices(): ServiceDescriptor[] {
    return this.registry.current.list();
  }

  /**
   * Swap in a freshly loaded registry. Requests already in flight keep the one they resolved against.
   */
  reloadRegistry(next: ServiceRegistry): { previous: number; current: number } {
    const previous = this.registry.swap(next);
    console.log(`🔄 Service registry reloaded: ${previous.size} -> ${next.size} services`);
    return { previous: previous.size, current: next.size };
  }

  getStats(): { syncRequests: number; syncFailures: number; jobsSubmitted: number; enqueueFailures: number } {
    return { ...this.counters };
  }

  private async withdraw(submitted: SubmitResponse[]): Promise<WithdrawnJob[]> {
    const withdrawn: WithdrawnJob[] = [];
    for (const entry of submitted) {
      try {
        const { job, removed } = await this.queue.cancel(entry.job_id);
        withdrawn.push({ ...entry, status: job.status, cancelled: removed });
      } catch (error) {
        console.error(`Could not withdraw job ${entry.job_id} after a failed fan-out: ${errorMessage(error)}`);
        withdrawn.push({ ...entry, cancelled: false });
      }
    }
    return withdrawn;
  }

  private async enqueue(serviceName: string, payload: JobPayload): Promise<string> {
    try {
      const jobId = await this.queue.enqueue(serviceName, payload);
      this.counters.jobsSubmitted++;
      console.log(`📥 Queued job ${jobId} for ${serviceName}`);
      return jobId;
    } catch (error) {
      if (error instanceof DispatchError && !(error instanceof EnqueueFailureError)) {
        throw error;
      }
      this.counters.enqueueFailures++;
      if (error instanceof EnqueueFailureError) {
        throw error;
      }
      throw new EnqueueFailureError(`Unable to enqueue job for ${serviceName}: ${errorMessage(error)}`);
    }
  }
}

export function toStatusView(job: Job): JobStatusView {
  const view: JobStatusView = {
    job_id: job.id,
    service: job.serviceName,
    status: job.status,
    created_at: job.createdAt,
    attempts: job.attempts,
    cancel_requested: job.cancelRequested
  };
  if (job.startedAt) view.started_at = job.startedAt;
  if (job.completedAt) view.completed_at = job.completedAt;
  if (job.resultRef) view.result_ref = job.resultRef;
  if (job.error) view.error = job.error;
  return view;
}

/**
 * JSON results are returned parsed, other text as a string, binary output base64-encoded.
 */
export function decodeResult(bytes: Buffer): unknown {
  const text = bytes.toString('utf8');
  try {
    return JSON.parse(text);
  } catch {
    if (Buffer.from(text, 'utf8').equals(bytes)) {
      return text;
    }
    return { encoding: 'base64', data: bytes.toString('base64') };
  }
}

export function payloadSize(payload: JobPayload): number {
  return Buffer.byteLength(JSON.stringify(payload), 'utf8');
}
