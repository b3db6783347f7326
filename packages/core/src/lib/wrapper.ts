/**
 * Base class for wrappers of native records, and the get-or-create protocol
 * that produces them.
 *
 * @packageDocumentation
 */

import type {Address} from '@arenabridge/arena';
import type {Arena} from './arena.js';
import {
  ATTACH,
  CONSTRUCTION_KEY,
  DETACH,
  type ConstructionKey,
} from './constants.js';
import {ForbiddenConstructionError, ModuleStateDisposedError} from './errors.js';
import {HostObject} from './host-object.js';
import type {ModuleState} from './module-state.js';
import type {WrapperInit} from './types.js';

/**
 * Constructor shape every wrapper type has.
 */
export type WrapperClass<W extends NativeWrapper = NativeWrapper> = new (
  key: ConstructionKey,
  init: WrapperInit,
) => W;

/**
 * A host object exposing one record that lives in arena memory.
 *
 * Instances are only produced by {@link getOrCreate}. While registered, a
 * wrapper holds a reference to its arena, so the record's memory stays valid
 * for as long as the wrapper is alive.
 *
 * ```ts
 * class FieldWrapper extends NativeWrapper {
 *   get number(): number {
 *     return this.bytes(1)[0];
 *   }
 * }
 * state.addClass('example.Field', FieldWrapper);
 * const field = getOrCreate(state, FieldWrapper, address, arena);
 * ```
 */
export abstract class NativeWrapper extends HostObject {
  readonly #state: ModuleState;
  readonly #address: Address;
  readonly #arena: Arena;
  #registered = false;
  #detached = false;

  constructor(key: ConstructionKey, init: WrapperInit) {
    super();
    if (key !== CONSTRUCTION_KEY) {
      throw new ForbiddenConstructionError(
        init.state.nameOf(new.target) ?? new.target.name,
      );
    }
    this.#state = init.state;
    this.#address = init.address;
    this.#arena = init.arena;
  }

  get typeName(): string {
    return this.#state.nameOf(this.constructor) ?? this.constructor.name;
  }

  get address(): Address {
    return this.#address;
  }

  get arena(): Arena {
    return this.#arena;
  }

  get state(): ModuleState {
    return this.#state;
  }

  /**
   * True once module teardown has invalidated this wrapper.
   */
  get detached(): boolean {
    return this.#detached;
  }

  /**
   * A view over the record's memory.
   */
  protected bytes(length: number, offset = 0): Uint8Array {
    if (this.#detached) {
      throw new ModuleStateDisposedError(`read ${this.typeName} memory`);
    }
    return this.#arena.native.bytes(this.#address + offset, length);
  }

  protected override dealloc(): void {
    if (!this.#registered || this.#detached) {
      return;
    }
    this.#registered = false;
    this.#state.cache.delete(this.#address);
    this.#arena.decref();
  }

  [ATTACH](): void {
    this.#arena.incref();
    this.#registered = true;
  }

  [DETACH](): void {
    if (!this.#registered || this.#detached) {
      return;
    }
    this.#detached = true;
    this.#arena.decref();
  }
}

function lookup<W extends NativeWrapper>(
  state: ModuleState,
  Ctor: WrapperClass<W>,
  address: Address,
): W | undefined {
  const cached = state.cache.get(address);
  if (cached === undefined) {
    return undefined;
  }
  if (!(cached instanceof Ctor)) {
    const typeName = cached.typeName;
    cached.decref();
    throw new TypeError(
      `Address 0x${address.toString(16)} is already wrapped as ${typeName}`,
    );
  }
  return cached;
}

/**
 * Get the wrapper for the record at `address`, creating and registering one
 * if there is none.
 *
 * Repeated calls for the same record return the same object for as long as
 * it is alive. Every call returns a new reference that the caller owns.
 *
 * @param arena - The arena that owns the record's memory
 */
export function getOrCreate<W extends NativeWrapper>(
  state: ModuleState,
  Ctor: WrapperClass<W>,
  address: Address,
  arena: Arena,
): W {
  state.checkUsable('create a wrapper');
  if (!state.isRegistered(Ctor)) {
    throw new TypeError(`${Ctor.name} is not registered with this module state`);
  }

  const cached = lookup(state, Ctor, address);
  if (cached !== undefined) {
    return cached;
  }
  if (!arena.native.owns(address)) {
    throw new RangeError(
      `Address 0x${address.toString(16)} is not owned by the given arena`,
    );
  }

  const wrapper = new Ctor(CONSTRUCTION_KEY, {state, address, arena});

  // Construction may have re-entered and registered this address already.
  const raced = lookup(state, Ctor, address);
  if (raced !== undefined) {
    wrapper.decref();
    return raced;
  }

  try {
    state.cache.add(address, wrapper, () => arena.decref());
  } catch (error) {
    wrapper.decref();
    throw error;
  }
  wrapper[ATTACH]();
  return wrapper;
}
