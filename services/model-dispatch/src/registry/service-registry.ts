import fs from 'fs';
import { z } from 'zod';
import { ConfigError, UnknownServiceError, errorMessage } from '../errors.js';
import type { ServiceDescriptor, ServiceResolver } from '../types/index.js';

const ServiceDescriptorSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/i, 'service names may only contain letters, digits, "_" and "-"'),
  address: z.string().url(),
  capability: z.enum(['predict', 'train'])
});

const RegistryFileSchema = z.object({
  services: z.array(ServiceDescriptorSchema)
});

/**
 * Immutable name -> descriptor lookup, built once from static configuration.
 * A reload builds a new registry; see RegistryHandle.
 */
export class ServiceRegistry implements ServiceResolver {
  private readonly services: ReadonlyMap<string, ServiceDescriptor>;
  readonly loadedAt: string;

  constructor(descriptors: readonly ServiceDescriptor[]) {
    const services = new Map<string, ServiceDescriptor>();
    for (const descriptor of descriptors) {
      if (services.has(descriptor.name)) {
        throw new ConfigError(`Duplicate service name in registry: ${descriptor.name}`);
      }
      services.set(
        descriptor.name,
        Object.freeze({
          name: descriptor.name,
          address: descriptor.address.replace(/\/+$/, ''),
          capability: descriptor.capability
        })
      );
    }
    this.services = services;
    this.loadedAt = new Date().toISOString();
  }

  static fromJson(raw: unknown): ServiceRegistry {
    const parsed = RegistryFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Invalid service registry configuration: ${issues.join('; ')}`);
    }
    return new ServiceRegistry(parsed.data.services);
  }

  static loadFromFile(filePath: string): ServiceRegistry {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Unable to read service registry from ${filePath}: ${errorMessage(error)}`);
    }
    return ServiceRegistry.fromJson(raw);
  }

  resolve(name: string): ServiceDescriptor | null {
    return this.services.get(name) ?? null;
  }

  /**
   * Resolve or fail with UnknownService.
   */
  require(name: string): ServiceDescriptor {
    const descriptor = this.resolve(name);
    if (!descriptor) {
      throw new UnknownServiceError(name);
    }
    return descriptor;
  }

  list(): ServiceDescriptor[] {
    return Array.from(this.services.values());
  }

  get size(): number {
    return this.services.size;
  }
}

/**
 * Holds the registry currently in use. Readers always see a complete registry;
 * a reload replaces the reference in one assignment.
 */
export class RegistryHandle implements ServiceResolver {
  private registry: ServiceRegistry;

  constructor(registry: ServiceRegistry) {
    this.registry = registry;
  }

  get current(): ServiceRegistry {
    return this.registry;
  }

  resolve(name: string): ServiceDescriptor | null {
    return this.registry.resolve(name);
  }

  require(name: string): ServiceDescriptor {
    return this.registry.require(name);
  }

  swap(next: ServiceRegistry): ServiceRegistry {
    const previous = this.registry;
    this.registry = next;
    return previous;
  }
}
