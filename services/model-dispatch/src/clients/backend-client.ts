/**
 * Backend client for the dispatch server and workers
 * Talks to a backend's Synchronous Gateway: POST /predict and GET /status
 */

import axios, { type AxiosInstance } from 'axios';
import { BackendFailureError, TimeoutError, errorMessage } from '../errors.js';
import type { JobPayload, ServiceDescriptor } from '../types/index.js';

export interface BackendClientOptions {
  timeoutMs: number;
  statusTimeoutMs: number;
  userAgent: string;
}

export interface PredictOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface StatusCheck {
  ok: boolean;
  latencyMs: number;
  error?: string;
}

export class BackendClient {
  private readonly clients: Map<string, AxiosInstance> = new Map();
  private readonly options: BackendClientOptions;

  constructor(options: Partial<BackendClientOptions> = {}) {
    this.options = {
      timeoutMs: 30000,
      statusTimeoutMs: 5000,
      userAgent: 'ModelDispatch/1.0.0',
      ...options
    };
  }

  /**
   * Run one inference on the backend and return its response body unchanged.
   */
  async predict(descriptor: ServiceDescriptor, payload: JobPayload, options: PredictOptions = {}): Promise<unknown> {
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    try {
      const response = await this.clientFor(descriptor).post('/predict', payload, {
        timeout: timeoutMs,
        signal: options.signal
      });
      return response.data;
    } catch (error) {
      throw this.translateError(descriptor, error, timeoutMs);
    }
  }

  async checkStatus(descriptor: ServiceDescriptor): Promise<StatusCheck> {
    const startedAt = Date.now();
    try {
      await this.clientFor(descriptor).get('/status', { timeout: this.options.statusTimeoutMs });
      return { ok: true, latencyMs: Date.now() - startedAt };
    } catch (error) {
      return { ok: false, latencyMs: Date.now() - startedAt, error: errorMessage(error) };
    }
  }

  private clientFor(descriptor: ServiceDescriptor): AxiosInstance {
    const cacheKey = `${descriptor.name}@${descriptor.address}`;
    let client = this.clients.get(cacheKey);
    if (!client) {
      client = axios.create({
        baseURL: descriptor.address,
        timeout: this.options.timeoutMs,
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': this.options.userAgent
        }
      });

      client.interceptors.response.use(
        (response) => response,
        (error) => {
          if (axios.isAxiosError(error) && error.code !== 'ERR_CANCELED') {
            console.error(`Backend ${descriptor.name} API error:`, {
              message: error.message,
              status: error.response?.status,
              data: error.response?.data
            });
          }
          return Promise.reject(error);
        }
      );

      this.clients.set(cacheKey, client);
    }
    return client;
  }

  private translateError(descriptor: ServiceDescriptor, error: unknown, timeoutMs: number): Error {
    if (!axios.isAxiosError(error)) {
      return new BackendFailureError(`Backend ${descriptor.name} failed: ${errorMessage(error)}`, {
        service: descriptor.name
      });
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new TimeoutError(`Backend ${descriptor.name} did not respond within ${timeoutMs}ms`, timeoutMs);
    }

    if (error.code === 'ERR_CANCELED') {
      return error;
    }

    if (error.response) {
      return new BackendFailureError(`Backend ${descriptor.name} responded with status ${error.response.status}`, {
        service: descriptor.name,
        status: error.response.status,
        body: error.response.data
      });
    }

    return new BackendFailureError(`Backend ${descriptor.name} is unreachable: ${error.message}`, {
      service: descriptor.name,
      cause: error.code
    });
  }
}
