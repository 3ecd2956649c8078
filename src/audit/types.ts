// Audit-specific types

/**
 * Destination for audit lines. One line per lifecycle event, scoped per resource.
 */
export interface AuditSink {
  append(resourceName: string, message: string, at?: Date): void;
}
