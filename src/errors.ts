import { ErrorCode, LifecycleOperation, OperationError, ResourceState } from './types';

/**
 * Base class for every error the console raises on purpose. Anything else
 * reaching the manager boundary is a bug and is rethrown.
 */
export abstract class ResourceConsoleError extends Error {
  abstract readonly code: ErrorCode;
  readonly remediation?: string;

  constructor(message: string, remediation?: string) {
    super(message);
    this.name = new.target.name;
    this.remediation = remediation;
  }

  protected details(): Record<string, unknown> | undefined {
    return undefined;
  }

  toOperationError(): OperationError {
    const error: OperationError = { code: this.code, message: this.message };
    const details = this.details();
    if (details) {
      error.details = details;
    }
    if (this.remediation) {
      error.remediation = this.remediation;
    }
    return error;
  }
}

export class ValidationError extends ResourceConsoleError {
  readonly code = 'VALIDATION_ERROR';
  readonly field: string;
  readonly violations: string[];

  constructor(field: string, message: string, violations: string[] = [message]) {
    super(message);
    this.field = field;
    this.violations = violations;
  }

  protected details(): Record<string, unknown> {
    return { field: this.field, violations: this.violations };
  }
}

export class DuplicateNameError extends ResourceConsoleError {
  readonly code = 'DUPLICATE_NAME';

  constructor(readonly resourceName: string) {
    super(
      `A resource named '${resourceName}' already exists.`,
      'Resource names stay reserved after deletion; choose another name'
    );
  }

  protected details(): Record<string, unknown> {
    return { name: this.resourceName };
  }
}

export class UnknownTypeError extends ResourceConsoleError {
  readonly code = 'UNKNOWN_TYPE';

  constructor(readonly typeName: string, readonly knownTypes: string[]) {
    super(
      `Unknown resource type: '${typeName}'`,
      knownTypes.length > 0 ? `Registered types: ${knownTypes.join(', ')}` : undefined
    );
  }

  protected details(): Record<string, unknown> {
    return { type: this.typeName, knownTypes: this.knownTypes };
  }
}

export class DuplicateTypeError extends ResourceConsoleError {
  readonly code = 'DUPLICATE_TYPE';

  constructor(readonly typeName: string) {
    super(`Resource type already registered: ${typeName}`);
  }
}

export class NotFoundError extends ResourceConsoleError {
  readonly code = 'NOT_FOUND';

  constructor(readonly resourceName: string) {
    super(`Resource '${resourceName}' not found.`);
  }
}

export class InvalidTransitionError extends ResourceConsoleError {
  readonly code = 'INVALID_TRANSITION';

  constructor(
    readonly resourceName: string,
    readonly operation: LifecycleOperation,
    readonly from: ResourceState,
    message: string,
    remediation?: string
  ) {
    super(message, remediation);
  }

  protected details(): Record<string, unknown> {
    return { name: this.resourceName, operation: this.operation, state: this.from };
  }
}

export function isResourceConsoleError(error: unknown): error is ResourceConsoleError {
  return error instanceof ResourceConsoleError;
}
