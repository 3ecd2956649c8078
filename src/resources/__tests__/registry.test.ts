import { describe, it, expect, beforeEach } from 'vitest';
import Joi from 'joi';
import { ResourceRegistry, createDefaultRegistry } from '../registry';
import { Resource } from '../resource';
import { validateFields } from '../schema';
import { DuplicateTypeError, UnknownTypeError } from '../../errors';
import { FieldBag } from '../../types';

const databaseSchema = Joi.object<{ engine: string; size_gb: number }>({
  engine: Joi.string().valid('postgres', 'mysql').required(),
  size_gb: Joi.number().integer().positive().required()
});

class Database extends Resource {
  readonly typeTag = 'Database';
  readonly engine: string;
  readonly sizeGb: number;

  constructor(name: string, fields: FieldBag) {
    super(name);
    const validated = validateFields(databaseSchema, fields);
    this.engine = validated.engine;
    this.sizeGb = validated.size_gb;
  }

  describe(): string {
    return `Database: engine=${this.engine}, size=${this.sizeGb}GB`;
  }
}

describe('ResourceRegistry', () => {
  let registry: ResourceRegistry;

  beforeEach(() => {
    registry = new ResourceRegistry();
  });

  it('should create a registered type through its factory', () => {
    registry.register('Database', (name, fields) => new Database(name, fields));

    const resource = registry.create('Database', 'db1', { engine: 'postgres', size_gb: 20 });

    expect(resource).toBeInstanceOf(Database);
    expect(resource.name).toBe('db1');
    expect(resource.currentState()).toBe('Stopped');
    expect(resource.describe()).toBe('Database: engine=postgres, size=20GB');
  });

  it('should reject an unregistered type', () => {
    registry.register('Database', (name, fields) => new Database(name, fields));

    expect(() => registry.create('Unregistered', 'x', {})).toThrow(UnknownTypeError);
    expect(() => registry.create('Unregistered', 'x', {})).toThrow("Unknown resource type: 'Unregistered'");
  });

  it('should reject a second registration instead of overwriting', () => {
    const first = (name: string, fields: FieldBag) => new Database(name, fields);
    registry.register('Database', first);

    expect(() => registry.register('Database', (name, fields) => new Database(name, fields))).toThrow(
      DuplicateTypeError
    );
    expect(registry.getDefinition('Database').factory).toBe(first);
  });

  it('should default description and fields', () => {
    registry.register('Database', (name, fields) => new Database(name, fields));

    const definition = registry.getDefinition('Database');
    expect(definition.description).toBe('Database');
    expect(definition.fields).toEqual([]);
  });

  it('should list types in registration order', () => {
    registry.register('Database', (name, fields) => new Database(name, fields));
    registry.register('Queue', (name, fields) => new Database(name, fields), { description: 'Message queue' });

    expect(registry.registeredTypes()).toEqual(['Database', 'Queue']);
    expect(registry.has('Queue')).toBe(true);
    expect(registry.has('Topic')).toBe(false);
  });

  describe('createDefaultRegistry', () => {
    it('should register the built-in types', () => {
      expect(createDefaultRegistry().registeredTypes()).toEqual(['AppService', 'StorageAccount', 'CacheDB']);
    });

    it('should keep accepting new types after the built-ins', () => {
      const defaults = createDefaultRegistry();
      defaults.register('Database', (name, fields) => new Database(name, fields));

      expect(defaults.create('Database', 'db1', { engine: 'mysql', size_gb: 5 }).typeTag).toBe('Database');
      expect(() => defaults.register('AppService', (name, fields) => new Database(name, fields))).toThrow(
        'Resource type already registered: AppService'
      );
    });

    it('should pass eviction policies to CacheDB', () => {
      const defaults = createDefaultRegistry({ evictionPolicies: ['LFU'] });
      const cache = defaults.create('CacheDB', 'cache1', { ttl_seconds: 60, capacity_mb: 64, eviction_policy: 'LFU' });

      expect(cache.describe()).toBe('CacheDB: ttl=60s, capacity=64MB, policy=LFU');
    });
  });
});
