import { v4 as uuidv4 } from 'uuid';
import { nextState } from '../manager/lifecycle';
import { LifecycleOperation, ResourceState, ResourceSummary } from '../types';
import { validateResourceName } from './naming';

/**
 * Base class for all managed resources.
 *
 * Variants hold their own validated configuration and supply `typeTag` and
 * `describe()`. State only changes through {@link Resource.transition}, which
 * consults the lifecycle table before mutating anything.
 */
export abstract class Resource {
  readonly id: string;
  readonly name: string;
  abstract readonly typeTag: string;

  private readonly created: Date;
  private state: ResourceState = 'Stopped';
  private transitionedAt: Date;

  constructor(name: string, createdAt: Date = new Date()) {
    this.id = uuidv4();
    this.name = validateResourceName(name);
    this.created = new Date(createdAt.getTime());
    this.transitionedAt = new Date(createdAt.getTime());
  }

  /** Human-readable summary of the type-specific configuration. */
  abstract describe(): string;

  /** Text appended to the start audit entry, e.g. `in WestEurope`. */
  startDetail(): string | undefined {
    return undefined;
  }

  currentState(): ResourceState {
    return this.state;
  }

  get createdAt(): Date {
    return new Date(this.created.getTime());
  }

  get lastTransitionAt(): Date {
    return new Date(this.transitionedAt.getTime());
  }

  /**
   * Apply a lifecycle operation.
   * @throws InvalidTransitionError when the operation is illegal in the current state
   */
  transition(operation: LifecycleOperation, at: Date = new Date()): ResourceState {
    const next = nextState(this.name, operation, this.state);
    this.state = next;
    this.transitionedAt = new Date(at.getTime());
    return next;
  }

  /** Snapshot with its own Date copies; mutating it never reaches the resource. */
  summary(): ResourceSummary {
    return {
      id: this.id,
      name: this.name,
      type: this.typeTag,
      state: this.state,
      createdAt: this.createdAt,
      lastTransitionAt: this.lastTransitionAt,
      details: this.describe()
    };
  }
}
