// Core Types
export type Capability = 'predict' | 'train';

export interface ServiceDescriptor {
  readonly name: string;
  readonly address: string;
  readonly capability: Capability;
}

/**
 * Anything that can turn a service name into its descriptor.
 * Implemented by the registry and by the handle that swaps registries on reload.
 */
export interface ServiceResolver {
  resolve(name: string): ServiceDescriptor | null;
}

// Job Types
export type JobStatus = 'queued' | 'running' | 'succeeded' | 'failed';

export type JobPayload = Record<string, unknown>;

export interface JobError {
  code: string;
  message: string;
}

export interface Job {
  id: string;
  serviceName: string;
  payload: JobPayload;
  status: JobStatus;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  resultRef?: string;
  error?: JobError;
  attempts: number;
  workerId?: string;
  cancelRequested: boolean;
}

export type JobOutcome =
  | { status: 'succeeded'; resultRef: string }
  | { status: 'failed'; error: JobError };

export interface DequeueOptions {
  workerId: string;
  block?: boolean;
  signal?: AbortSignal;
}

export interface QueueStats {
  serviceName: string;
  pending: number;
  running: number;
}

export interface CancelResult {
  job: Job;
  /** true when the job was removed before any worker claimed it */
  removed: boolean;
}

// Result Types
export interface ResultStore {
  put(jobId: string, bytes: Buffer): Promise<string>;
  get(ref: string): Promise<Buffer>;
  has(ref: string): Promise<boolean>;
}

// API Types
export interface JobStatusView {
  job_id: string;
  service: string;
  status: JobStatus;
  created_at: string;
  started_at?: string;
  completed_at?: string;
  attempts: number;
  cancel_requested: boolean;
  result_ref?: string;
  result?: unknown;
  error?: JobError;
}

export interface SubmitResponse {
  job_id: string;
  service: string;
  status: JobStatus;
}

export type DispatchKind = 'predict' | 'train';

export type DispatchOutcome =
  | { mode: 'sync'; service: string; result: unknown }
  | { mode: 'async'; job: SubmitResponse };

// Backend Types
export interface ProcessingContext {
  jobId?: string;
  serviceName: string;
  signal: AbortSignal;
  /** Throws JobCancelledError once cancellation has been requested. */
  checkpoint(): Promise<void>;
}

export type BackendOutput = Buffer | string | Record<string, unknown> | unknown[];

export interface BackendModule {
  name: string;
  capability: Capability;
  process(payload: JobPayload, context: ProcessingContext): Promise<BackendOutput>;
}

export type BackendHealth = 'up' | 'down' | 'unknown';

export interface BackendHealthRecord {
  service: string;
  health: BackendHealth;
  checkedAt?: string;
  latencyMs?: number;
  error?: string;
}
