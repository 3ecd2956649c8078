import { MemoryAuditSink } from '../audit/memory-audit-sink';
import { AuditSink } from '../audit/types';
import { DuplicateNameError, NotFoundError, ValidationError, isResourceConsoleError } from '../errors';
import { Logger, getLogger } from '../logger';
import { ResourceRegistry, createDefaultRegistry } from '../resources/registry';
import { Resource } from '../resources/resource';
import { ResourceTypeDefinition } from '../resources/types';
import {
  AuditEntry,
  FieldBag,
  LifecycleOperation,
  OperationResult,
  ResourceFilter,
  ResourceSummary
} from '../types';
import { ManagedResource, ResourceManagerOptions } from './types';

/**
 * Owns the resource collection. Enforces name uniqueness and lifecycle rules,
 * and records an audit entry for every committed change.
 *
 * Every public operation runs its checks before any effect and returns an
 * {@link OperationResult}; console errors never escape as exceptions.
 */
export class ResourceManager {
  private readonly registry: ResourceRegistry;
  private readonly sink: AuditSink;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly records: Map<string, ManagedResource> = new Map();

  constructor(options: ResourceManagerOptions = {}) {
    this.registry = options.registry ?? createDefaultRegistry();
    this.sink = options.sink ?? new MemoryAuditSink();
    this.logger = options.logger ?? getLogger();
    this.clock = options.clock ?? (() => new Date());
  }

  create(typeName: string, name: string, fields: FieldBag): OperationResult<ResourceSummary> {
    return this.run(() => {
      // Deleted names are still in the collection, so they stay reserved.
      if (this.records.has(name)) {
        throw new DuplicateNameError(name);
      }

      const at = this.clock();
      const resource = this.registry.create(typeName, name, fields, at);
      if (resource.name !== name) {
        throw new ValidationError('name', `Factory for ${typeName} returned a resource named '${resource.name}'`);
      }
      const record: ManagedResource = { resource, history: [] };
      this.records.set(name, record);
      this.audit(record, `${resource.typeTag} created`, at);

      this.logger.debug('Resource created', { name, type: resource.typeTag });
      return resource.summary();
    });
  }

  start(name: string): OperationResult<ResourceSummary> {
    return this.transition(name, 'start', resource => {
      const detail = resource.startDetail();
      return detail ? `${resource.typeTag} started ${detail}` : `${resource.typeTag} started`;
    });
  }

  stop(name: string): OperationResult<ResourceSummary> {
    return this.transition(name, 'stop', resource => `${resource.typeTag} stopped`);
  }

  delete(name: string): OperationResult<ResourceSummary> {
    return this.transition(name, 'delete', resource => `${resource.typeTag} marked as deleted`);
  }

  /**
   * Audit history for a resource in any state, oldest first
   */
  viewLogs(name: string): OperationResult<AuditEntry[]> {
    return this.run(() =>
      this.require(name).history.map(entry => ({ ...entry, timestamp: new Date(entry.timestamp.getTime()) }))
    );
  }

  get(name: string): OperationResult<ResourceSummary> {
    return this.run(() => this.require(name).resource.summary());
  }

  /**
   * Summaries of every resource, deleted ones included, in creation order
   */
  list(filter: ResourceFilter = {}): ResourceSummary[] {
    return Array.from(this.records.values())
      .map(record => record.resource)
      .filter(resource => !filter.state || resource.currentState() === filter.state)
      .filter(resource => !filter.type || resource.typeTag === filter.type)
      .map(resource => resource.summary());
  }

  registeredTypes(): string[] {
    return this.registry.registeredTypes();
  }

  typeDefinitions(): ResourceTypeDefinition[] {
    return this.registry.getAllDefinitions();
  }

  get size(): number {
    return this.records.size;
  }

  private transition(
    name: string,
    operation: LifecycleOperation,
    describe: (resource: Resource) => string
  ): OperationResult<ResourceSummary> {
    return this.run(() => {
      const record = this.require(name);
      const { resource } = record;
      const from = resource.currentState();
      const at = this.clock();
      const to = resource.transition(operation, at);

      this.audit(record, describe(resource), at);
      this.logger.debug('Resource transitioned', { name, operation, from, to });
      return resource.summary();
    });
  }

  private require(name: string): ManagedResource {
    const record = this.records.get(name);
    if (!record) {
      throw new NotFoundError(name);
    }
    return record;
  }

  /**
   * Record an audit entry and forward it to the sink. The state change is
   * already committed, so a failing sink is reported and otherwise ignored.
   */
  private audit(record: ManagedResource, message: string, timestamp: Date): void {
    const entry: AuditEntry = {
      resourceName: record.resource.name,
      message,
      timestamp: new Date(timestamp.getTime())
    };
    record.history.push(entry);

    try {
      this.sink.append(entry.resourceName, entry.message, entry.timestamp);
    } catch (error) {
      this.logger.warn('Audit sink append failed', {
        resource: entry.resourceName,
        entry: entry.message,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private run<T>(operation: () => T): OperationResult<T> {
    try {
      return { success: true, value: operation() };
    } catch (error) {
      if (isResourceConsoleError(error)) {
        return { success: false, error: error.toOperationError() };
      }
      throw error;
    }
  }
}
