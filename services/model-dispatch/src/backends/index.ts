import type { ImageStore } from '../storage/image-store.js';
import type { BackendModule } from '../types/index.js';
import { createExampleModelBackend } from './example-model.js';
import { createImageHashBackend } from './image-hash.js';

export { createRemoteBackend } from './remote-backend.js';
export { createProcessingContext, encodeOutput, isRecord, toBackendOutput } from './context.js';
export type { ContextOptions } from './context.js';

export interface BackendDependencies {
  imageStore: ImageStore;
}

/**
 * Backends whose processing routine ships with this package. Any other
 * registered service is processed remotely through its gateway.
 */
export function createBuiltinBackends(deps: BackendDependencies): Map<string, BackendModule> {
  const backends = [createImageHashBackend(deps.imageStore), createExampleModelBackend()];
  return new Map(backends.map(backend => [backend.name, backend]));
}
