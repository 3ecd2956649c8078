import Joi from 'joi';
import { FieldBag } from '../types';
import { Resource } from './resource';
import { validateFields } from './schema';
import { ResourceTypeDefinition } from './types';

export interface StorageAccountConfig {
  encryption_enabled: boolean;
  access_key: string;
  max_size_gb: number;
}

const storageAccountSchema = Joi.object<StorageAccountConfig>({
  encryption_enabled: Joi.boolean()
    .required()
    .messages({
      'boolean.base': 'encryption_enabled must be true or false'
    }),
  // Opaque credential; only presence is checked.
  access_key: Joi.string()
    .required()
    .messages({
      'string.empty': 'access_key must not be empty'
    }),
  max_size_gb: Joi.number()
    .integer()
    .positive()
    .required()
    .messages({
      'number.base': 'max_size_gb must be a positive integer',
      'number.integer': 'max_size_gb must be a positive integer',
      'number.positive': 'max_size_gb must be a positive integer'
    })
}).unknown(false);

export class StorageAccount extends Resource {
  readonly typeTag = 'StorageAccount';
  readonly encryptionEnabled: boolean;
  readonly maxSizeGb: number;
  private readonly accessKey: string;

  constructor(name: string, fields: FieldBag, createdAt?: Date) {
    super(name, createdAt);
    const validated = validateFields(storageAccountSchema, fields);
    this.encryptionEnabled = validated.encryption_enabled;
    this.accessKey = validated.access_key;
    this.maxSizeGb = validated.max_size_gb;
  }

  describe(): string {
    return `StorageAccount: encryption=${this.encryptionEnabled}, size=${this.maxSizeGb}GB`;
  }

  startDetail(): string {
    return `with ${this.maxSizeGb}GB${this.encryptionEnabled ? ', encrypted' : ''}`;
  }
}

export const storageAccountDefinition: ResourceTypeDefinition = {
  typeName: 'StorageAccount',
  description: 'Storage account with optional encryption and a size cap',
  fields: [
    { key: 'encryption_enabled', message: 'Enable encryption?', kind: 'boolean' },
    { key: 'access_key', message: 'Enter access key', kind: 'secret' },
    { key: 'max_size_gb', message: 'Enter max size (GB)', kind: 'integer' }
  ],
  factory: (name, fields, createdAt) => new StorageAccount(name, fields, createdAt)
};
