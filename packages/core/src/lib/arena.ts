/**
 * Host-visible wrapper that owns one native arena.
 *
 * @packageDocumentation
 */

import {ArenaFreedError, NativeArena} from '@arenabridge/arena';
import {CONSTRUCTION_KEY, type ConstructionKey} from './constants.js';
import {ForbiddenConstructionError} from './errors.js';
import {HostObject} from './host-object.js';
import type {ModuleState} from './module-state.js';

/**
 * Owns one native arena. When the last reference is dropped the arena is
 * freed, along with every record allocated from it; there is no other way to
 * free it.
 *
 * Wrappers that point into the arena's memory keep it alive by holding a
 * reference to this object.
 */
export class Arena extends HostObject {
  readonly #native: NativeArena;

  /**
   * Create a new native arena and wrap it.
   */
  static new(state: ModuleState): Arena {
    state.checkUsable('create an arena');
    if (!state.isRegistered(Arena)) {
      throw new TypeError('Arena is not registered with this module state');
    }
    return new Arena(
      CONSTRUCTION_KEY,
      new NativeArena({addressSpace: state.options.addressSpace}),
    );
  }

  constructor(key: ConstructionKey, native: NativeArena) {
    super();
    if (key !== CONSTRUCTION_KEY) {
      throw new ForbiddenConstructionError('Arena');
    }
    this.#native = native;
  }

  get typeName(): string {
    return 'Arena';
  }

  /**
   * The owned native arena.
   */
  get native(): NativeArena {
    if (!this.alive) {
      throw new ArenaFreedError('access arena');
    }
    return this.#native;
  }

  /**
   * Fuse lifetimes with `other`. Memory of both is released once both
   * wrappers are deallocated.
   *
   * Returns false if `other` has already been deallocated.
   */
  fuse(other: Arena): boolean {
    if (!other.alive) {
      return false;
    }
    return this.native.fuse(other.native);
  }

  protected override dealloc(): void {
    this.#native.free();
  }
}
