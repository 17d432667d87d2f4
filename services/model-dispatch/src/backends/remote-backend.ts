import type { BackendClient } from '../clients/backend-client.js';
import type { BackendModule, ServiceDescriptor } from '../types/index.js';
import { toBackendOutput } from './context.js';

/**
 * Processing routine for a service that has no built-in module: the worker
 * forwards the payload to the service's own gateway.
 */
export function createRemoteBackend(
  descriptor: ServiceDescriptor,
  client: BackendClient,
  timeoutMs: number
): BackendModule {
  return {
    name: descriptor.name,
    capability: descriptor.capability,
    async process(payload, context) {
      await context.checkpoint();
      const result = await client.predict(descriptor, payload, { timeoutMs, signal: context.signal });
      return toBackendOutput(result);
    }
  };
}
