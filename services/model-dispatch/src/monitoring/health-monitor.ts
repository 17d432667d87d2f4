import type { BackendClient } from '../clients/backend-client.js';
import { errorMessage } from '../errors.js';
import type { JobQueue } from '../queue/job-queue.js';
import type { RegistryHandle } from '../registry/service-registry.js';
import type { BackendHealthRecord, QueueStats } from '../types/index.js';

export interface HealthMetrics {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  memory: {
    used: number;
    total: number;
    percentage: number;
  };
  queues: QueueStats[];
  backends: BackendHealthRecord[];
  errors: string[];
}

export interface HealthMonitorOptions {
  intervalMs: number;
}

/**
 * Polls every registered backend's GET /status and folds the answers,
 * together with queue depths, into one health report.
 * Results are reported only; the registry is never changed by them.
 */
export class HealthMonitor {
  private readonly startTime: number = Date.now();
  private readonly records: Map<string, BackendHealthRecord> = new Map();
  private timer: NodeJS.Timeout | null = null;
  private checking: Promise<void> | null = null;

  constructor(
    private readonly registry: RegistryHandle,
    private readonly client: BackendClient,
    private readonly queue: JobQueue,
    private readonly options: HealthMonitorOptions = { intervalMs: 30000 }
  ) {}

  start(): void {
    if (this.timer) {
      return;
    }
    void this.checkAll();
    this.timer = setInterval(() => {
      void this.checkAll();
    }, this.options.intervalMs);
    this.timer.unref();
    console.log(`🩺 Health checks every ${this.options.intervalMs}ms`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Ping every backend once. Concurrent calls share the round in progress.
   */
  checkAll(): Promise<void> {
    if (!this.checking) {
      this.checking = this.runChecks().finally(() => {
        this.checking = null;
      });
    }
    return this.checking;
  }

  getBackendHealth(serviceName: string): BackendHealthRecord {
    return this.records.get(serviceName) ?? { service: serviceName, health: 'unknown' };
  }

  async getHealthMetrics(): Promise<HealthMetrics> {
    const memoryUsage = process.memoryUsage();
    const services = this.registry.current.list();
    const errors: string[] = [];

    let queues: QueueStats[] = [];
    try {
      queues = await Promise.all(services.map(service => this.queue.stats(service.name)));
    } catch (error) {
      errors.push(`Job queue unreachable: ${errorMessage(error)}`);
    }

    const backends = services.map(service => this.getBackendHealth(service.name));
    for (const backend of backends) {
      if (backend.health === 'down') {
        errors.push(`Backend ${backend.service} is down${backend.error ? `: ${backend.error}` : ''}`);
      }
    }

    return {
      status: this.determineHealthStatus(queues.length === services.length, errors),
      timestamp: new Date().toISOString(),
      uptime: Date.now() - this.startTime,
      memory: {
        used: memoryUsage.heapUsed,
        total: memoryUsage.heapTotal,
        percentage: memoryUsage.heapUsed / memoryUsage.heapTotal
      },
      queues,
      backends,
      errors
    };
  }

  private determineHealthStatus(queueReachable: boolean, errors: string[]): HealthMetrics['status'] {
    // without the queue no asynchronous work can be accepted
    if (!queueReachable) {
      return 'unhealthy';
    }
    return errors.length === 0 ? 'healthy' : 'degraded';
  }

  private async runChecks(): Promise<void> {
    const services = this.registry.current.list();
    await Promise.all(services.map(async (service) => {
      const previous = this.records.get(service.name);
      const check = await this.client.checkStatus(service);
      const record: BackendHealthRecord = {
        service: service.name,
        health: check.ok ? 'up' : 'down',
        checkedAt: new Date().toISOString(),
        latencyMs: check.latencyMs,
        ...(check.error && { error: check.error })
      };
      this.records.set(service.name, record);

      if (previous?.health !== record.health) {
        if (record.health === 'down') {
          console.warn(`⚠️  Backend ${service.name} is not responding: ${check.error ?? 'unknown error'}`);
        } else if (previous) {
          console.log(`💚 Backend ${service.name} is back up`);
        }
      }
    }));

    // forget services dropped by a registry reload
    const names = new Set(services.map(service => service.name));
    for (const name of this.records.keys()) {
      if (!names.has(name)) {
        this.records.delete(name);
      }
    }
  }
}
