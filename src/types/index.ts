// Core type definitions for the resource console

export type ResourceState = 'Stopped' | 'Running' | 'Deleted';

export type LifecycleOperation = 'start' | 'stop' | 'delete';

/**
 * Untyped construction input for a resource. Each variant validates and
 * narrows it with its own schema.
 */
export type FieldBag = Record<string, unknown>;

export interface ResourceSummary {
  id: string;
  name: string;
  type: string;
  state: ResourceState;
  createdAt: Date;
  lastTransitionAt: Date;
  details: string;
}

export interface AuditEntry {
  resourceName: string;
  message: string;
  timestamp: Date;
}

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'DUPLICATE_NAME'
  | 'UNKNOWN_TYPE'
  | 'DUPLICATE_TYPE'
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION';

export interface OperationError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  remediation?: string;
}

export type OperationResult<T> =
  | { success: true; value: T }
  | { success: false; error: OperationError };

export interface ResourceFilter {
  state?: ResourceState;
  type?: string;
}
