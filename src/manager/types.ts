// Manager-specific types
import { AuditSink } from '../audit/types';
import { Logger } from '../logger';
import { ResourceRegistry } from '../resources/registry';
import { Resource } from '../resources/resource';
import { AuditEntry } from '../types';

export interface ManagedResource {
  resource: Resource;
  history: AuditEntry[];
}

export interface ResourceManagerOptions {
  registry?: ResourceRegistry;
  sink?: AuditSink;
  logger?: Logger;
  /** Time source for transitions and audit entries */
  clock?: () => Date;
}
