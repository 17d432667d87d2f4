import { v4 as uuidv4 } from 'uuid';
import {
  EnqueueFailureError,
  JobConflictError,
  JobNotFoundError,
  LeaseLostError,
  UnknownServiceError,
  errorMessage
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
  isTerminal,
  parseJobRecord
} from './job-queue.js';
import type { RedisCommands } from './redis-client.js';

export interface RedisJobQueueOptions extends JobQueueOptions {
  keyPrefix: string;
  /** Upper bound on one BLMOVE wait, so a stopping worker notices its abort signal. */
  blockTimeoutSeconds: number;
}

// Removes the lease only while it belongs to the acknowledging worker and has not expired.
// An expired lease is left for the reaper.
export const RELEASE_LEASE_SCRIPT = `
if redis.call('HGET', KEYS[2], ARGV[1]) ~= ARGV[2] then
  return 0
end
local expiresAt = redis.call('ZSCORE', KEYS[1], ARGV[1])
if not expiresAt or tonumber(expiresAt) <= tonumber(ARGV[3]) then
  return 0
end
redis.call('HDEL', KEYS[2], ARGV[1])
return redis.call('ZREM', KEYS[1], ARGV[1])
`;

/**
 * Redis-backed queue (production use).
 *
 * Layout per service: a pending list (LPUSH in, pop from the right, so FIFO)
 * and a processing list. BLMOVE moves a job id between them atomically, which is
 * what guarantees a single consumer. Leases live in one sorted set scored by
 * expiry time; the reaper claims an expired lease with ZREM before acting on it.
 */
export class RedisJobQueue implements JobQueue {
  private readonly client: RedisCommands;
  private readonly blockingClients: Map<string, RedisCommands> = new Map();
  private readonly options: RedisJobQueueOptions;

  constructor(
    client: RedisCommands,
    private readonly resolver: ServiceResolver,
    options: Partial<RedisJobQueueOptions> = {}
  ) {
    this.client = client;
    this.options = {
      ...DEFAULT_QUEUE_OPTIONS,
      keyPrefix: 'dispatch:',
      blockTimeoutSeconds: 2,
      ...options
    };
  }

  async enqueue(serviceName: string, payload: JobPayload): Promise<string> {
    if (!this.resolver.resolve(serviceName)) {
      throw new UnknownServiceError(serviceName);
    }

    const job: Job = {
      id: uuidv4(),
      serviceName,
      payload,
      status: 'queued',
      createdAt: this.timestamp(),
      attempts: 0,
      cancelRequested: false
    };

    try {
      await this.client
        .multi()
        .set(this.jobKey(job.id), JSON.stringify(job))
        .sAdd(this.servicesKey(), serviceName)
        .lPush(this.pendingKey(serviceName), job.id)
        .exec();
    } catch (error) {
      throw new EnqueueFailureError(`Unable to enqueue job for ${serviceName}: ${errorMessage(error)}`);
    }
    return job.id;
  }

  async dequeue(serviceName: string, options: DequeueOptions): Promise<Job | null> {
    const pending = this.pendingKey(serviceName);
    const processing = this.processingKey(serviceName);

    while (!options.signal?.aborted) {
      const jobId =
        options.block === false
          ? await this.client.lMove(pending, processing)
          : await (await this.blockingClientFor(options.workerId)).blMove(
              pending,
              processing,
              this.options.blockTimeoutSeconds
            );

      if (jobId) {
        const job = await this.claim(serviceName, jobId, options.workerId);
        if (job) {
          return job;
        }
        continue;
      }
      if (options.block === false) {
        return null;
      }
    }
    return null;
  }

  async ack(jobId: string, workerId: string, outcome: JobOutcome): Promise<Job> {
    const job = await this.readJob(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }

    const released = await this.client.eval(RELEASE_LEASE_SCRIPT, {
      keys: [this.leasesKey(), this.ownersKey()],
      arguments: [jobId, workerId, String(this.options.now())]
    });
    if (released !== 1) {
      throw new LeaseLostError(jobId, workerId);
    }

    applyOutcome(job, outcome, this.timestamp());
    await this.client
      .multi()
      .set(this.jobKey(jobId), JSON.stringify(job))
      .lRem(this.processingKey(job.serviceName), 1, jobId)
      .del(this.cancelKey(jobId))
      .exec();
    return job;
  }

  async getJob(jobId: string): Promise<Job | null> {
    const job = await this.readJob(jobId);
    if (!job) {
      return null;
    }
    if (!isTerminal(job.status) && !job.cancelRequested) {
      job.cancelRequested = await this.isCancelRequested(jobId);
    }
    return job;
  }

  async cancel(jobId: string): Promise<CancelResult> {
    const job = await this.readJob(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    if (isTerminal(job.status)) {
      throw new JobConflictError(`Job ${jobId} has already ${job.status}`, jobId);
    }

    // whoever removes the id from the pending list owns the job
    const removed = await this.client.lRem(this.pendingKey(job.serviceName), 1, jobId);
    if (removed > 0) {
      applyOutcome(job, { status: 'failed', error: cancelledError() }, this.timestamp());
      await this.writeJob(job);
      return { job, removed: true };
    }

    await this.client.set(this.cancelKey(jobId), '1');
    job.cancelRequested = true;
    return { job, removed: false };
  }

  async isCancelRequested(jobId: string): Promise<boolean> {
    return this.client.exists(this.cancelKey(jobId));
  }

  async reapExpired(): Promise<ReapResult> {
    const now = this.options.now();
    const result: ReapResult = { requeued: [], failed: [] };

    await this.adoptOrphans(now);

    const expired = await this.client.zRangeByScore(this.leasesKey(), 0, now);
    for (const jobId of expired) {
      if ((await this.client.zRem(this.leasesKey(), jobId)) === 0) {
        continue; // acked or reaped elsewhere
      }
      await this.client.hDel(this.ownersKey(), jobId);

      const job = await this.readJob(jobId);
      if (!job) {
        continue;
      }
      await this.client.lRem(this.processingKey(job.serviceName), 1, jobId);
      if (isTerminal(job.status)) {
        continue;
      }

      if (await this.isCancelRequested(jobId)) {
        applyOutcome(job, { status: 'failed', error: cancelledError() }, this.timestamp());
        await this.writeJob(job);
        result.failed.push(jobId);
      } else if (job.attempts < this.options.maxDeliveries) {
        job.workerId = undefined;
        await this.client
          .multi()
          .set(this.jobKey(jobId), JSON.stringify(job))
          .rPush(this.pendingKey(job.serviceName), jobId)
          .exec();
        result.requeued.push(jobId);
      } else {
        applyOutcome(job, { status: 'failed', error: abandonedError(job.attempts) }, this.timestamp());
        await this.writeJob(job);
        result.failed.push(jobId);
      }
    }

    return result;
  }

  async stats(serviceName: string): Promise<QueueStats> {
    const [pending, running] = await Promise.all([
      this.client.lLen(this.pendingKey(serviceName)),
      this.client.lLen(this.processingKey(serviceName))
    ]);
    return { serviceName, pending, running };
  }

  async close(): Promise<void> {
    for (const blocking of this.blockingClients.values()) {
      await blocking.disconnect();
    }
    this.blockingClients.clear();
    await this.client.quit();
  }

  private async claim(serviceName: string, jobId: string, workerId: string): Promise<Job | null> {
    const now = this.options.now();
    await this.client
      .multi()
      .zAdd(this.leasesKey(), { score: now + this.options.visibilityTimeoutMs, value: jobId })
      .hSet(this.ownersKey(), jobId, workerId)
      .exec();

    const job = await this.readJob(jobId);
    if (!job || isTerminal(job.status)) {
      await this.client
        .multi()
        .zRem(this.leasesKey(), jobId)
        .hDel(this.ownersKey(), jobId)
        .lRem(this.processingKey(serviceName), 1, jobId)
        .exec();
      return null;
    }

    assertTransition(job, 'running');
    job.status = 'running';
    job.startedAt = job.startedAt ?? new Date(now).toISOString();
    job.workerId = workerId;
    job.attempts++;
    await this.writeJob(job);
    return job;
  }

  /**
   * A consumer that died between BLMOVE and recording its lease leaves an id in
   * the processing list with no lease. Give such ids a lease so they expire normally.
   */
  private async adoptOrphans(now: number): Promise<void> {
    const services = await this.client.sMembers(this.servicesKey());
    for (const serviceName of services) {
      const inFlight = await this.client.lRange(this.processingKey(serviceName), 0, -1);
      for (const jobId of inFlight) {
        if ((await this.client.zScore(this.leasesKey(), jobId)) === null) {
          await this.client.zAdd(
            this.leasesKey(),
            { score: now + this.options.visibilityTimeoutMs, value: jobId },
            { onlyIfAbsent: true }
          );
        }
      }
    }
  }

  private async blockingClientFor(workerId: string): Promise<RedisCommands> {
    let blocking = this.blockingClients.get(workerId);
    if (!blocking) {
      blocking = await this.client.openBlockingConnection(workerId);
      this.blockingClients.set(workerId, blocking);
    }
    return blocking;
  }

  private async readJob(jobId: string): Promise<Job | null> {
    const raw = await this.client.get(this.jobKey(jobId));
    return raw ? parseJobRecord(raw) : null;
  }

  private async writeJob(job: Job): Promise<void> {
    await this.client.set(this.jobKey(job.id), JSON.stringify(job));
  }

  private timestamp(): string {
    return new Date(this.options.now()).toISOString();
  }

  private jobKey(jobId: string): string {
    return `${this.options.keyPrefix}job:${jobId}`;
  }

  private cancelKey(jobId: string): string {
    return `${this.options.keyPrefix}cancel:${jobId}`;
  }

  private pendingKey(serviceName: string): string {
    return `${this.options.keyPrefix}queue:${serviceName}:pending`;
  }

  private processingKey(serviceName: string): string {
    return `${this.options.keyPrefix}queue:${serviceName}:processing`;
  }

  private leasesKey(): string {
    return `${this.options.keyPrefix}leases`;
  }

  private ownersKey(): string {
    return `${this.options.keyPrefix}lease-owners`;
  }

  private servicesKey(): string {
    return `${this.options.keyPrefix}services`;
  }
}
