/**
 * The object identity cache.
 *
 * @packageDocumentation
 */

import {IntTable} from '@arenabridge/arena';
import type {Address, NativeArena} from '@arenabridge/arena';
import type {HostObject} from './host-object.js';
import {InvariantViolation} from './errors.js';

interface Registration {
  key: Address;
  ref: WeakRef<HostObject>;
  typeName: string;
  onCollect: (() => void) | undefined;
}

export interface ObjectCacheOptions {
  /**
   * Initial slot count of the table.
   */
  capacity?: number;

  /**
   * Called after a registered object was garbage collected without having
   * been released.
   */
  onLeak?: (key: Address, typeName: string) => void;
}

function hex(key: Address): string {
  return `0x${key.toString(16)}`;
}

/**
 * Maps native record addresses to the host object that wraps each record.
 *
 * Holds **weak references**: adding an object does not reference it, and the
 * object must delete its entry before it is deallocated. Handing an object
 * back out through `get()` adds a reference for the caller.
 *
 * A duplicate `add()` or a `delete()` miss means the cache has lost track of
 * a live object. Both throw `InvariantViolation`, after which the cache is
 * broken and every further operation throws as well.
 */
export class ObjectCache {
  readonly #table: IntTable<WeakRef<HostObject>>;
  readonly #finalizer: FinalizationRegistry<Registration>;
  readonly #onLeak: ((key: Address, typeName: string) => void) | undefined;
  #failure: string | undefined;

  constructor(arena: NativeArena, options: ObjectCacheOptions = {}) {
    this.#table = new IntTable(arena, options.capacity);
    this.#onLeak = options.onLeak;
    this.#finalizer = new FinalizationRegistry((held) => {
      // A newer object may have taken over the key since.
      if (this.#table.lookup(held.key) === held.ref) {
        this.#table.remove(held.key);
      }
      held.onCollect?.();
      this.#onLeak?.(held.key, held.typeName);
    });
  }

  get size(): number {
    return this.#table.size;
  }

  get broken(): boolean {
    return this.#failure !== undefined;
  }

  /**
   * Register `obj` as the wrapper for `key`, without referencing it.
   *
   * `onCollect` runs if `obj` is garbage collected while still registered.
   */
  add(key: Address, obj: HostObject, onCollect?: () => void): void {
    this.#check();
    const existing = this.#table.lookup(key);
    if (existing !== undefined) {
      if (existing.deref() !== undefined) {
        this.#fail(`Duplicate object cache entry for ${hex(key)}`);
      }
      this.#table.remove(key);
    }
    const ref = new WeakRef(obj);
    this.#table.insert(key, ref);
    this.#finalizer.register(
      obj,
      {key, ref, typeName: obj.typeName, onCollect},
      ref,
    );
  }

  delete(key: Address): void {
    this.#check();
    const ref = this.#table.remove(key);
    if (ref === undefined) {
      this.#fail(`No object cache entry to delete for ${hex(key)}`);
    }
    this.#finalizer.unregister(ref);
  }

  /**
   * Look up the object for `key`. A hit is returned with one more reference,
   * owned by the caller.
   */
  get(key: Address): HostObject | undefined {
    this.#check();
    const ref = this.#table.lookup(key);
    if (ref === undefined) {
      return undefined;
    }
    const obj = ref.deref();
    if (obj === undefined) {
      this.#table.remove(key);
      return undefined;
    }
    obj.incref();
    return obj;
  }

  has(key: Address): boolean {
    this.#check();
    return this.#table.lookup(key)?.deref() !== undefined;
  }

  /**
   * Every registered object that has not been garbage collected.
   */
  *live(): IterableIterator<[Address, HostObject]> {
    this.#check();
    for (const [key, ref] of this.#table.entries()) {
      const obj = ref.deref();
      if (obj !== undefined) {
        yield [key, obj];
      }
    }
  }

  #check(): void {
    if (this.#failure !== undefined) {
      throw new InvariantViolation(`Object cache is broken: ${this.#failure}`);
    }
  }

  #fail(message: string): never {
    this.#failure = message;
    throw new InvariantViolation(message);
  }
}
