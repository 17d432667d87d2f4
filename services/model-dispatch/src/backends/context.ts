import { JobCancelledError } from '../errors.js';
import type { BackendOutput, ProcessingContext } from '../types/index.js';

export interface ContextOptions {
  serviceName: string;
  jobId?: string;
  signal: AbortSignal;
  isCancelled?: () => Promise<boolean>;
}

export function createProcessingContext(options: ContextOptions): ProcessingContext {
  return {
    serviceName: options.serviceName,
    jobId: options.jobId,
    signal: options.signal,
    async checkpoint(): Promise<void> {
      const cancelled = options.signal.aborted || (options.isCancelled ? await options.isCancelled() : false);
      if (cancelled) {
        throw new JobCancelledError(options.jobId ?? 'request');
      }
    }
  };
}

/**
 * Serialise a backend result into the bytes stored as the Result Artifact.
 */
export function encodeOutput(output: BackendOutput): Buffer {
  if (Buffer.isBuffer(output)) {
    return output;
  }
  if (typeof output === 'string') {
    return Buffer.from(output, 'utf8');
  }
  return Buffer.from(JSON.stringify(output), 'utf8');
}

/**
 * Normalise an untyped response body into a BackendOutput.
 */
export function toBackendOutput(value: unknown): BackendOutput {
  if (Buffer.isBuffer(value) || typeof value === 'string' || Array.isArray(value)) {
    return value;
  }
  if (isRecord(value)) {
    return value;
  }
  return { value: value ?? null };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !Buffer.isBuffer(value);
}
