// Configuration-specific types
import { LogLevel } from '../logger';

export type AuditSinkKind = 'file' | 'memory';

export interface AuditSettings {
  sink: AuditSinkKind;
  directory: string;
}

export interface LoggingSettings {
  level: LogLevel;
}

export interface CacheDBSettings {
  eviction_policies: string[];
}

export interface ResourceSettings {
  cache_db: CacheDBSettings;
}

export interface ConsoleConfig {
  audit: AuditSettings;
  logging: LoggingSettings;
  resources: ResourceSettings;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<ConsoleConfig>;
  validate(config: unknown): ConfigValidationResult;
}
