/**
 * Reference-counted base for host-visible objects.
 *
 * @packageDocumentation
 */

import {InvariantViolation} from './errors.js';

/**
 * A host object with an explicit reference count.
 *
 * A new object holds one reference, owned by whoever created it. When the
 * count drops to zero `dealloc()` runs once and the object is dead.
 *
 * `using` declarations release a reference when the scope ends:
 *
 * ```ts
 * using arena = Arena.new(state);
 * ```
 */
export abstract class HostObject {
  #refCount = 1;

  /**
   * Short type name used in diagnostics.
   */
  abstract get typeName(): string;

  get refCount(): number {
    return this.#refCount;
  }

  get alive(): boolean {
    return this.#refCount > 0;
  }

  incref(): void {
    if (this.#refCount <= 0) {
      throw new InvariantViolation(
        `Cannot reference deallocated ${this.typeName}`,
      );
    }
    this.#refCount++;
  }

  decref(): void {
    if (this.#refCount <= 0) {
      throw new InvariantViolation(
        `${this.typeName} released more times than it was referenced`,
      );
    }
    if (--this.#refCount === 0) {
      this.dealloc();
    }
  }

  [Symbol.dispose](): void {
    this.decref();
  }

  /**
   * Teardown hook, run when the last reference is dropped.
   */
  protected dealloc(): void {}
}
