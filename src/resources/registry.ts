import { DuplicateTypeError, UnknownTypeError } from '../errors';
import { FieldBag } from '../types';
import { appServiceDefinition } from './app-service';
import { CacheDBOptions, createCacheDBDefinition } from './cache-db';
import { Resource } from './resource';
import { storageAccountDefinition } from './storage-account';
import { RegisterOptions, ResourceFactory, ResourceTypeDefinition } from './types';

/**
 * Registry of resource types. Maps a type name to the factory that builds it,
 * so new variants plug in without changes to the manager.
 */
export class ResourceRegistry {
  private definitions: Map<string, ResourceTypeDefinition> = new Map();

  /**
   * Register a resource type
   * @throws DuplicateTypeError if the name is taken; registrations are never overwritten
   */
  register(typeName: string, factory: ResourceFactory, options: RegisterOptions = {}): void {
    if (this.definitions.has(typeName)) {
      throw new DuplicateTypeError(typeName);
    }
    this.definitions.set(typeName, {
      typeName,
      description: options.description ?? typeName,
      fields: options.fields ?? [],
      factory
    });
  }

  /**
   * Register a complete type definition
   */
  registerDefinition(definition: ResourceTypeDefinition): void {
    this.register(definition.typeName, definition.factory, {
      description: definition.description,
      fields: definition.fields
    });
  }

  /**
   * Build a resource through the factory registered for `typeName`
   * @throws UnknownTypeError if the type was never registered
   */
  create(typeName: string, name: string, fields: FieldBag, createdAt?: Date): Resource {
    return this.getDefinition(typeName).factory(name, fields, createdAt);
  }

  has(typeName: string): boolean {
    return this.definitions.has(typeName);
  }

  getDefinition(typeName: string): ResourceTypeDefinition {
    const definition = this.definitions.get(typeName);
    if (!definition) {
      throw new UnknownTypeError(typeName, this.registeredTypes());
    }
    return definition;
  }

  /**
   * Registered type names, in registration order
   */
  registeredTypes(): string[] {
    return Array.from(this.definitions.keys());
  }

  getAllDefinitions(): ResourceTypeDefinition[] {
    return Array.from(this.definitions.values());
  }
}

export type DefaultRegistryOptions = CacheDBOptions;

/**
 * Create a registry holding the built-in types: AppService, StorageAccount, CacheDB
 */
export function createDefaultRegistry(options: DefaultRegistryOptions = {}): ResourceRegistry {
  const registry = new ResourceRegistry();
  registry.registerDefinition(appServiceDefinition);
  registry.registerDefinition(storageAccountDefinition);
  registry.registerDefinition(createCacheDBDefinition(options));
  return registry;
}
