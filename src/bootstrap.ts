import { FileAuditSink } from './audit/file-audit-sink';
import { MemoryAuditSink } from './audit/memory-audit-sink';
import { AuditSink } from './audit/types';
import { ConsoleConfig } from './config/types';
import { Logger, getLogger } from './logger';
import { ResourceManager } from './manager/resource-manager';
import { ResourceRegistry, createDefaultRegistry } from './resources/registry';

export interface ConsoleRuntime {
  registry: ResourceRegistry;
  sink: AuditSink;
  manager: ResourceManager;
  logPathFor: (resourceName: string) => string | undefined;
}

/**
 * Wire registry, audit sink and manager from configuration. Registration of
 * the built-in types happens here, before any user interaction.
 */
export function createConsoleRuntime(config: ConsoleConfig, logger: Logger = getLogger()): ConsoleRuntime {
  const registry = createDefaultRegistry({
    evictionPolicies: config.resources.cache_db.eviction_policies
  });

  let sink: AuditSink;
  let logPathFor: (resourceName: string) => string | undefined = () => undefined;
  if (config.audit.sink === 'file') {
    const fileSink = new FileAuditSink(config.audit.directory);
    sink = fileSink;
    logPathFor = resourceName => fileSink.getLogPath(resourceName);
  } else {
    sink = new MemoryAuditSink();
  }

  logger.debug('Console runtime ready', {
    types: registry.registeredTypes(),
    sink: config.audit.sink
  });

  return {
    registry,
    sink,
    manager: new ResourceManager({ registry, sink, logger }),
    logPathFor
  };
}
