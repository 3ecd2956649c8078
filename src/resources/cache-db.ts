import Joi from 'joi';
import { FieldBag } from '../types';
import { Resource } from './resource';
import { validateFields } from './schema';
import { ResourceTypeDefinition } from './types';

export const DEFAULT_EVICTION_POLICIES: readonly string[] = ['LRU', 'FIFO'];

export interface CacheDBConfig {
  ttl_seconds: number;
  capacity_mb: number;
  eviction_policy: string;
}

export interface CacheDBOptions {
  /** Accepted eviction policies; the enumeration is open and set by configuration. */
  evictionPolicies?: readonly string[];
}

function createCacheDBSchema(policies: readonly string[]): Joi.ObjectSchema<CacheDBConfig> {
  return Joi.object<CacheDBConfig>({
    ttl_seconds: Joi.number()
      .integer()
      .positive()
      .required()
      .messages({
        'number.base': 'ttl_seconds must be a positive integer',
        'number.integer': 'ttl_seconds must be a positive integer',
        'number.positive': 'ttl_seconds must be a positive integer'
      }),
    capacity_mb: Joi.number()
      .integer()
      .positive()
      .required()
      .messages({
        'number.base': 'capacity_mb must be a positive integer',
        'number.integer': 'capacity_mb must be a positive integer',
        'number.positive': 'capacity_mb must be a positive integer'
      }),
    eviction_policy: Joi.string()
      .valid(...policies)
      .required()
      .messages({
        'any.only': `eviction_policy must be one of: ${policies.join(', ')}`
      })
  }).unknown(false);
}

const defaultSchema = createCacheDBSchema(DEFAULT_EVICTION_POLICIES);

export class CacheDB extends Resource {
  readonly typeTag = 'CacheDB';
  readonly ttlSeconds: number;
  readonly capacityMb: number;
  readonly evictionPolicy: string;

  constructor(
    name: string,
    fields: FieldBag,
    createdAt?: Date,
    schema: Joi.ObjectSchema<CacheDBConfig> = defaultSchema
  ) {
    super(name, createdAt);
    const validated = validateFields(schema, fields);
    this.ttlSeconds = validated.ttl_seconds;
    this.capacityMb = validated.capacity_mb;
    this.evictionPolicy = validated.eviction_policy;
  }

  describe(): string {
    return `CacheDB: ttl=${this.ttlSeconds}s, capacity=${this.capacityMb}MB, policy=${this.evictionPolicy}`;
  }

  startDetail(): string {
    return `with ${this.capacityMb}MB, ${this.evictionPolicy} eviction`;
  }
}

export function createCacheDBDefinition(options: CacheDBOptions = {}): ResourceTypeDefinition {
  const policies = options.evictionPolicies ?? DEFAULT_EVICTION_POLICIES;
  const schema = createCacheDBSchema(policies);

  return {
    typeName: 'CacheDB',
    description: 'In-memory cache database with TTL, capacity and eviction policy',
    fields: [
      { key: 'ttl_seconds', message: 'Enter TTL (seconds)', kind: 'integer' },
      { key: 'capacity_mb', message: 'Enter capacity (MB)', kind: 'integer' },
      { key: 'eviction_policy', message: 'Select eviction policy', kind: 'choice', choices: policies }
    ],
    factory: (name, fields, createdAt) => new CacheDB(name, fields, createdAt, schema)
  };
}
