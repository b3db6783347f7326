/**
 * Per-module state: the identity cache, the arena backing it, and the
 * registry of wrapper types.
 *
 * @packageDocumentation
 */

import {NativeArena, defaultAddressSpace} from '@arenabridge/arena';
import type {Address} from '@arenabridge/arena';
import {Arena} from './arena.js';
import {ARENA_TYPE_NAME, DETACH, LOG_PREFIX} from './constants.js';
import {ModuleStateDisposedError} from './errors.js';
import type {HostObject} from './host-object.js';
import {ObjectCache} from './object-cache.js';
import type {Options, ResolvedOptions} from './types.js';
import {NativeWrapper} from './wrapper.js';

export type HostClass = abstract new (...args: never[]) => HostObject;

/**
 * `pkg.module.FooBar` -> `FooBar`
 */
function getClassName(fullName: string): string {
  const dot = fullName.lastIndexOf('.');
  if (dot <= 0 || dot === fullName.length - 1) {
    throw new TypeError(`Type name must be fully qualified: "${fullName}"`);
  }
  return fullName.slice(dot + 1);
}

/**
 * State shared by every wrapper of one module instance.
 *
 * There is no ambient global: create one at startup, pass it to every
 * operation, and dispose it at shutdown.
 *
 * Disposing force-invalidates wrappers that are still registered. Each is
 * detached, which releases its arena, and reading its memory afterwards
 * throws. Host references to it stay valid.
 */
export class ModuleState {
  readonly options: Readonly<ResolvedOptions>;
  readonly #cacheArena: NativeArena;
  readonly #cache: ObjectCache;
  #types = new Map<string, HostClass>();
  #names = new Map<unknown, string>();
  #disposed = false;

  static create(options: Options = {}): ModuleState {
    return new ModuleState(options);
  }

  private constructor(options: Options) {
    this.options = {
      debug: options.debug ?? false,
      logger: options.logger ?? console,
      addressSpace: options.addressSpace ?? defaultAddressSpace,
      cacheCapacity: options.cacheCapacity ?? 64,
    };
    this.#cacheArena = new NativeArena({
      addressSpace: this.options.addressSpace,
    });
    this.#cache = new ObjectCache(this.#cacheArena, {
      capacity: this.options.cacheCapacity,
      onLeak: (key, typeName) => this.#onLeak(key, typeName),
    });
    this.addClass(ARENA_TYPE_NAME, Arena);
  }

  get cache(): ObjectCache {
    this.checkUsable('use the object cache');
    return this.#cache;
  }

  get disposed(): boolean {
    return this.#disposed;
  }

  /**
   * Register a host type under its fully-qualified name and return its
   * short name.
   */
  addClass(fullName: string, ctor: HostClass): string {
    this.checkUsable('register a type');
    const name = getClassName(fullName);
    if (this.#types.has(name)) {
      throw new TypeError(`A type named ${name} is already registered`);
    }
    if (this.#names.has(ctor)) {
      throw new TypeError(
        `${ctor.name} is already registered as ${this.#names.get(ctor)}`,
      );
    }
    this.#types.set(name, ctor);
    this.#names.set(ctor, name);
    return name;
  }

  getClass(name: string): HostClass | undefined {
    return this.#types.get(name);
  }

  isRegistered(ctor: HostClass): boolean {
    return this.#names.has(ctor);
  }

  /**
   * Registered short name of a type.
   */
  nameOf(ctor: unknown): string | undefined {
    return this.#names.get(ctor);
  }

  checkUsable(operation: string): void {
    if (this.#disposed) {
      throw new ModuleStateDisposedError(operation);
    }
  }

  /**
   * Tear the state down: invalidate wrappers that are still registered and
   * free the cache arena. Calling it again does nothing.
   */
  dispose(): void {
    if (this.#disposed) {
      return;
    }
    const live = [...this.#cache.live()];
    if (live.length > 0) {
      this.#warn(
        `module state disposed with ${live.length} live wrapper(s); invalidating`,
      );
    }
    for (const [key, obj] of live) {
      this.#cache.delete(key);
      if (obj instanceof NativeWrapper) {
        obj[DETACH]();
      }
    }
    this.#disposed = true;
    this.#cacheArena.free();
  }

  [Symbol.dispose](): void {
    this.dispose();
  }

  #onLeak(key: Address, typeName: string): void {
    this.#warn(
      `${typeName} at 0x${key.toString(16)} was garbage collected without being released`,
    );
  }

  #warn(message: string): void {
    if (this.options.debug) {
      this.options.logger.warn(`${LOG_PREFIX}: ${message}`);
    }
  }
}
