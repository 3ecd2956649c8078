import Joi from 'joi';
import { FieldBag } from '../types';
import { Resource } from './resource';
import { validateFields } from './schema';
import { ResourceTypeDefinition } from './types';

export const APP_SERVICE_RUNTIMES = ['python', 'nodejs', 'dotnet'] as const;
export const APP_SERVICE_REGIONS = ['EastUS', 'WestEurope', 'CentralIndia'] as const;
export const APP_SERVICE_REPLICA_COUNTS = [1, 2, 3] as const;

export type AppServiceRuntime = (typeof APP_SERVICE_RUNTIMES)[number];
export type AppServiceRegion = (typeof APP_SERVICE_REGIONS)[number];
export type AppServiceReplicaCount = (typeof APP_SERVICE_REPLICA_COUNTS)[number];

export interface AppServiceConfig {
  runtime: AppServiceRuntime;
  region: AppServiceRegion;
  replica_count: AppServiceReplicaCount;
}

const appServiceSchema = Joi.object<AppServiceConfig>({
  runtime: Joi.string()
    .valid(...APP_SERVICE_RUNTIMES)
    .required()
    .messages({
      'any.only': `runtime must be one of: ${APP_SERVICE_RUNTIMES.join(', ')}`
    }),
  region: Joi.string()
    .valid(...APP_SERVICE_REGIONS)
    .required()
    .messages({
      'any.only': `region must be one of: ${APP_SERVICE_REGIONS.join(', ')}`
    }),
  replica_count: Joi.number()
    .integer()
    .min(1)
    .max(3)
    .required()
    .messages({
      'number.base': 'replica_count must be a number',
      'number.integer': 'replica_count must be one of: 1, 2, 3',
      'number.min': 'replica_count must be one of: 1, 2, 3',
      'number.max': 'replica_count must be one of: 1, 2, 3'
    })
}).unknown(false);

export class AppService extends Resource {
  readonly typeTag = 'AppService';
  readonly runtime: AppServiceRuntime;
  readonly region: AppServiceRegion;
  readonly replicaCount: AppServiceReplicaCount;

  constructor(name: string, fields: FieldBag, createdAt?: Date) {
    super(name, createdAt);
    const validated = validateFields(appServiceSchema, fields);
    this.runtime = validated.runtime;
    this.region = validated.region;
    this.replicaCount = validated.replica_count;
  }

  describe(): string {
    return `AppService: runtime=${this.runtime}, region=${this.region}, replicas=${this.replicaCount}`;
  }

  startDetail(): string {
    return `in ${this.region}`;
  }
}

export const appServiceDefinition: ResourceTypeDefinition = {
  typeName: 'AppService',
  description: 'Application service with a runtime, region and replica count',
  fields: [
    { key: 'runtime', message: 'Select runtime', kind: 'choice', choices: APP_SERVICE_RUNTIMES },
    { key: 'region', message: 'Select region', kind: 'choice', choices: APP_SERVICE_REGIONS },
    { key: 'replica_count', message: 'Select replica count', kind: 'choice', choices: APP_SERVICE_REPLICA_COUNTS.map(String) }
  ],
  factory: (name, fields, createdAt) => new AppService(name, fields, createdAt)
};
