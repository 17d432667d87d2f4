import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { JobConflictError, ResultNotFoundError, ValidationError } from '../errors.js';
import type { RedisCommands } from '../queue/redis-client.js';
import type { ResultStore } from '../types/index.js';

const REF_SCHEME = 'result://';
const JOB_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/**
 * Result Artifacts are addressed by job id: `result://<job_id>`.
 */
export function resultRefFor(jobId: string): string {
  if (!JOB_ID_PATTERN.test(jobId)) {
    throw new ValidationError(`Invalid job id for result storage: ${jobId}`);
  }
  return `${REF_SCHEME}${jobId}`;
}

export function jobIdFromRef(ref: string): string {
  const jobId = ref.startsWith(REF_SCHEME) ? ref.slice(REF_SCHEME.length) : '';
  if (!JOB_ID_PATTERN.test(jobId)) {
    throw new ResultNotFoundError(ref);
  }
  return jobId;
}

function alreadyWritten(jobId: string): JobConflictError {
  return new JobConflictError(`Result for job ${jobId} has already been written`, jobId);
}

/**
 * In-memory result store (dev/local use)
 */
export class InMemoryResultStore implements ResultStore {
  private readonly results: Map<string, Buffer> = new Map();

  async put(jobId: string, bytes: Buffer): Promise<string> {
    const ref = resultRefFor(jobId);
    if (this.results.has(jobId)) {
      throw alreadyWritten(jobId);
    }
    this.results.set(jobId, Buffer.from(bytes));
    return ref;
  }

  async get(ref: string): Promise<Buffer> {
    const bytes = this.results.get(jobIdFromRef(ref));
    if (!bytes) {
      throw new ResultNotFoundError(ref);
    }
    return Buffer.from(bytes);
  }

  async has(ref: string): Promise<boolean> {
    return this.results.has(jobIdFromRef(ref));
  }

  get size(): number {
    return this.results.size;
  }
}

/**
 * Files on a volume shared by workers (write) and the dispatch server (read).
 * The final file appears through a hard link, which fails if it already exists,
 * so each artifact is written once and never seen half-written.
 */
export class FileResultStore implements ResultStore {
  constructor(private readonly directory: string) {}

  async put(jobId: string, bytes: Buffer): Promise<string> {
    const ref = resultRefFor(jobId);
    await fs.mkdir(this.directory, { recursive: true });

    const finalPath = this.pathFor(jobId);
    const tempPath = `${finalPath}.${uuidv4()}.tmp`;
    await fs.writeFile(tempPath, bytes);
    try {
      await fs.link(tempPath, finalPath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        throw alreadyWritten(jobId);
      }
      throw error;
    } finally {
      await fs.rm(tempPath, { force: true });
    }
    return ref;
  }

  async get(ref: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.pathFor(jobIdFromRef(ref)));
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new ResultNotFoundError(ref);
      }
      throw error;
    }
  }

  async has(ref: string): Promise<boolean> {
    try {
      await fs.access(this.pathFor(jobIdFromRef(ref)));
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  private pathFor(jobId: string): string {
    return path.join(this.directory, `${jobId}.result`);
  }
}

/**
 * Redis-backed result store (production use, alongside RedisJobQueue)
 */
export class RedisResultStore implements ResultStore {
  constructor(
    private readonly client: RedisCommands,
    private readonly keyPrefix: string = 'dispatch:'
  ) {}

  async put(jobId: string, bytes: Buffer): Promise<string> {
    const ref = resultRefFor(jobId);
    const stored = await this.client.set(this.key(jobId), bytes.toString('base64'), { onlyIfAbsent: true });
    if (!stored) {
      throw alreadyWritten(jobId);
    }
    return ref;
  }

  async get(ref: string): Promise<Buffer> {
    const data = await this.client.get(this.key(jobIdFromRef(ref)));
    if (data === null) {
      throw new ResultNotFoundError(ref);
    }
    return Buffer.from(data, 'base64');
  }

  async has(ref: string): Promise<boolean> {
    return this.client.exists(this.key(jobIdFromRef(ref)));
  }

  private key(jobId: string): string {
    return `${this.keyPrefix}result:${jobId}`;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
