import path from 'path';
import { ConfigError } from './errors.js';

export interface DispatchConfig {
  port: number;
  gatewayPort: number;
  urlPrefix: string;
  nodeEnv: string;
  redisUrl?: string;
  servicesConfigPath: string;
  resultsDir: string;
  imagesDir: string;
  syncTimeoutMs: number;
  syncMaxPayloadBytes: number;
  visibilityTimeoutMs: number;
  maxDeliveries: number;
  jobTimeoutMs: number;
  reaperIntervalMs: number;
  healthCheckIntervalMs: number;
  shutdownTimeoutMs: number;
  adminApiKey?: string;
  embeddedWorkers: boolean;
}

type Env = Record<string, string | undefined>;

function getNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

function getOptional(env: Env, key: string): string | undefined {
  const raw = env[key];
  return raw === undefined || raw === '' ? undefined : raw;
}

/**
 * Build the typed service configuration from environment variables.
 * Call dotenv.config() first when running as a process.
 */
export function loadConfig(env: Env = process.env): DispatchConfig {
  const config: DispatchConfig = {
    port: getNumber(env, 'PORT', 5000),
    gatewayPort: getNumber(env, 'GATEWAY_PORT', 5010),
    urlPrefix: (env['URL_PREFIX'] ?? '').replace(/\/+$/, ''),
    nodeEnv: env['NODE_ENV'] || 'development',
    redisUrl: getOptional(env, 'REDIS_URL'),
    servicesConfigPath: path.resolve(env['SERVICES_CONFIG'] || 'services/model-dispatch/config/services.json'),
    resultsDir: path.resolve(env['RESULTS_DIR'] || 'data/results'),
    imagesDir: path.resolve(env['IMAGES_DIR'] || 'data/images'),
    syncTimeoutMs: getNumber(env, 'SYNC_TIMEOUT_MS', 30000),
    syncMaxPayloadBytes: getNumber(env, 'SYNC_MAX_PAYLOAD_BYTES', 1024 * 1024),
    visibilityTimeoutMs: getNumber(env, 'VISIBILITY_TIMEOUT_MS', 60000),
    maxDeliveries: getNumber(env, 'MAX_DELIVERIES', 2),
    jobTimeoutMs: getNumber(env, 'JOB_TIMEOUT_MS', 45000),
    reaperIntervalMs: getNumber(env, 'REAPER_INTERVAL_MS', 5000),
    healthCheckIntervalMs: getNumber(env, 'HEALTH_CHECK_INTERVAL_MS', 30000),
    shutdownTimeoutMs: getNumber(env, 'SHUTDOWN_TIMEOUT_MS', 30000),
    adminApiKey: getOptional(env, 'ADMIN_API_KEY'),
    embeddedWorkers: env['EMBEDDED_WORKERS'] === 'true'
  };

  if (config.maxDeliveries < 1) {
    throw new ConfigError('MAX_DELIVERIES must be at least 1');
  }

  // a job must time out inside its own lease, otherwise it is redelivered while still running
  if (config.jobTimeoutMs >= config.visibilityTimeoutMs) {
    throw new ConfigError(
      `JOB_TIMEOUT_MS (${config.jobTimeoutMs}) must be lower than VISIBILITY_TIMEOUT_MS (${config.visibilityTimeoutMs})`
    );
  }

  return config;
}
