import { InvalidTransitionError } from '../errors';
import { LifecycleOperation, ResourceState } from '../types';

/**
 * Resolve the state a resource moves to when `operation` is applied in state
 * `from`. Illegal transitions throw `InvalidTransitionError`; the caller's state
 * is never touched here.
 */
export function nextState(
  resourceName: string,
  operation: LifecycleOperation,
  from: ResourceState
): ResourceState {
  switch (operation) {
    case 'start':
      return start(resourceName, from);
    case 'stop':
      return stop(resourceName, from);
    case 'delete':
      return remove(resourceName, from);
    default:
      return assertNever(operation);
  }
}

function start(name: string, from: ResourceState): ResourceState {
  switch (from) {
    case 'Stopped':
      return 'Running';
    case 'Running':
      throw new InvalidTransitionError(name, 'start', from, `Resource '${name}' is already running.`);
    case 'Deleted':
      throw new InvalidTransitionError(
        name,
        'start',
        from,
        `Resource '${name}' is deleted and cannot be started.`
      );
    default:
      return assertNever(from);
  }
}

function stop(name: string, from: ResourceState): ResourceState {
  switch (from) {
    case 'Running':
      return 'Stopped';
    case 'Stopped':
      throw new InvalidTransitionError(name, 'stop', from, `Resource '${name}' is already stopped.`);
    case 'Deleted':
      throw new InvalidTransitionError(
        name,
        'stop',
        from,
        `Resource '${name}' is deleted and cannot be stopped.`
      );
    default:
      return assertNever(from);
  }
}

function remove(name: string, from: ResourceState): ResourceState {
  switch (from) {
    case 'Stopped':
      return 'Deleted';
    case 'Running':
      throw new InvalidTransitionError(
        name,
        'delete',
        from,
        `Cannot delete: Resource '${name}' must be stopped first.`,
        `Stop '${name}' before deleting it`
      );
    case 'Deleted':
      throw new InvalidTransitionError(name, 'delete', from, `Resource '${name}' is already deleted.`);
    default:
      return assertNever(from);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled lifecycle value: ${String(value)}`);
}
