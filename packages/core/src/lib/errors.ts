/**
 * Error types for the bridge layer.
 *
 * Invariant violations are fatal and never caught inside the library.
 * Allocation failures come from `@arenabridge/arena` and are recoverable.
 *
 * @fileoverview Error taxonomy.
 */

export {ArenaAllocationError, ArenaFreedError} from '@arenabridge/arena';

/**
 * The identity invariant (one wrapper per native record) has been broken,
 * or a host object was released more often than it was referenced.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolation';
  }
}

/**
 * Thrown when a wrapper type is instantiated with `new` instead of through
 * the construction protocol.
 */
export class ForbiddenConstructionError extends TypeError {
  constructor(public readonly typeName: string) {
    super(`Objects of type ${typeName} may not be created directly.`);
    this.name = 'ForbiddenConstructionError';
  }
}

/**
 * Thrown when a module state, or a wrapper it invalidated, is used after
 * teardown.
 */
export class ModuleStateDisposedError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation}: module state has been disposed`);
    this.name = 'ModuleStateDisposedError';
  }
}
