/**
 * Integer-keyed hash table whose key slots live in arena memory.
 *
 * @packageDocumentation
 */

import type {Address} from './address-space.js';
import type {NativeArena} from './arena.js';

const EMPTY = 0;
const TOMBSTONE = -1;
const MAX_LOAD = 0.75;

function hashKey(key: number): number {
  let h = (key % 0x100000000) ^ Math.floor(key / 0x100000000);
  h = Math.imul(h ^ (h >>> 16), 0x45d9f3b);
  h = Math.imul(h ^ (h >>> 16), 0x45d9f3b);
  return (h ^ (h >>> 16)) >>> 0;
}

function checkKey(key: number): void {
  if (!Number.isSafeInteger(key) || key <= 0) {
    throw new RangeError(`Invalid table key: ${key}`);
  }
}

/**
 * Open-addressing table from positive integer keys (usually addresses) to
 * host values.
 *
 * Keys are stored in a `Float64Array` allocated from the arena; values stay
 * on the host heap in a parallel array. Growing allocates a fresh slot array
 * and abandons the old one to the arena.
 */
export class IntTable<V> {
  readonly #arena: NativeArena;
  #keys: Float64Array;
  #values: Array<V>;
  #size = 0;
  // Live entries plus tombstones.
  #used = 0;

  constructor(arena: NativeArena, initialCapacity = 8) {
    this.#arena = arena;
    let capacity = 8;
    while (capacity < initialCapacity) {
      capacity *= 2;
    }
    this.#keys = this.#allocKeys(capacity);
    this.#values = new Array<V>(capacity);
  }

  get size(): number {
    return this.#size;
  }

  get capacity(): number {
    return this.#keys.length;
  }

  /**
   * Insert `key`. Returns false, leaving the table unchanged, if the key is
   * already present.
   */
  insert(key: Address, value: V): boolean {
    checkKey(key);
    if (this.#find(key) !== -1) {
      return false;
    }
    if (this.#used + 1 > this.capacity * MAX_LOAD) {
      this.#rehash(
        this.#size + 1 > this.capacity / 2 ? this.capacity * 2 : this.capacity,
      );
    }
    const slot = this.#probeFree(key);
    if (this.#keys[slot] === EMPTY) {
      this.#used++;
    }
    this.#keys[slot] = key;
    this.#values[slot] = value;
    this.#size++;
    return true;
  }

  lookup(key: Address): V | undefined {
    checkKey(key);
    const slot = this.#find(key);
    return slot === -1 ? undefined : this.#values[slot];
  }

  has(key: Address): boolean {
    checkKey(key);
    return this.#find(key) !== -1;
  }

  remove(key: Address): V | undefined {
    checkKey(key);
    const slot = this.#find(key);
    if (slot === -1) {
      return undefined;
    }
    const value = this.#values[slot];
    this.#keys[slot] = TOMBSTONE;
    delete this.#values[slot];
    this.#size--;
    return value;
  }

  *entries(): IterableIterator<[Address, V]> {
    const keys = this.#keys;
    for (let i = 0; i < keys.length; i++) {
      const key = keys[i];
      if (key !== EMPTY && key !== TOMBSTONE) {
        yield [key, this.#values[i]];
      }
    }
  }

  #allocKeys(capacity: number): Float64Array {
    const address = this.#arena.malloc(capacity * 8, 8);
    const bytes = this.#arena.bytes(address, capacity * 8);
    return new Float64Array(bytes.buffer, bytes.byteOffset, capacity);
  }

  #find(key: number): number {
    const keys = this.#keys;
    const mask = keys.length - 1;
    for (let i = hashKey(key) & mask, n = 0; n < keys.length; n++) {
      const k = keys[i];
      if (k === key) {
        return i;
      }
      if (k === EMPTY) {
        return -1;
      }
      i = (i + 1) & mask;
    }
    return -1;
  }

  #probeFree(key: number): number {
    const keys = this.#keys;
    const mask = keys.length - 1;
    let i = hashKey(key) & mask;
    while (keys[i] !== EMPTY && keys[i] !== TOMBSTONE) {
      i = (i + 1) & mask;
    }
    return i;
  }

  #rehash(capacity: number): void {
    const oldKeys = this.#keys;
    const oldValues = this.#values;
    this.#keys = this.#allocKeys(capacity);
    this.#values = new Array<V>(capacity);
    this.#used = 0;
    for (let i = 0; i < oldKeys.length; i++) {
      const key = oldKeys[i];
      if (key !== EMPTY && key !== TOMBSTONE) {
        const slot = this.#probeFree(key);
        this.#keys[slot] = key;
        this.#values[slot] = oldValues[i];
        this.#used++;
      }
    }
  }
}
