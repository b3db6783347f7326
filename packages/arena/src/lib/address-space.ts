/**
 * Integer address space shared by native arenas.
 *
 * @packageDocumentation
 */

import {ArenaAllocationError} from './errors.js';

/**
 * An integer address into native memory. 0 is never a valid address.
 */
export type Address = number;

export const BLOCK_ALIGN = 16;

export interface AddressSpaceOptions {
  /**
   * Upper bound on outstanding reserved bytes.
   *
   * @default Infinity
   */
  limit?: number;
}

export function alignUp(value: number, align: number): number {
  return Math.ceil(value / align) * align;
}

/**
 * Hands out block base addresses.
 *
 * Released ranges are recycled LIFO per size, so an address that belonged to
 * a freed arena will show up again in the next arena of the same shape.
 */
export class AddressSpace {
  #next: Address = BLOCK_ALIGN;
  #reserved = 0;
  readonly #limit: number;
  #freeBySize = new Map<number, Array<Address>>();

  constructor(options: AddressSpaceOptions = {}) {
    this.#limit = options.limit ?? Infinity;
  }

  get reserved(): number {
    return this.#reserved;
  }

  get limit(): number {
    return this.#limit;
  }

  reserve(size: number): Address {
    if (!Number.isSafeInteger(size) || size <= 0) {
      throw new RangeError(`Invalid block size: ${size}`);
    }
    size = alignUp(size, BLOCK_ALIGN);
    if (this.#reserved + size > this.#limit) {
      throw new ArenaAllocationError(size, this.#limit - this.#reserved);
    }
    const recycled = this.#freeBySize.get(size)?.pop();
    const base = recycled ?? this.#next;
    if (recycled === undefined) {
      this.#next += size;
    }
    this.#reserved += size;
    return base;
  }

  release(base: Address, size: number): void {
    size = alignUp(size, BLOCK_ALIGN);
    let list = this.#freeBySize.get(size);
    if (list === undefined) {
      list = [];
      this.#freeBySize.set(size, list);
    }
    list.push(base);
    this.#reserved -= size;
  }
}

/**
 * Process-wide address space used when none is given.
 */
export const defaultAddressSpace = new AddressSpace();
