/**
 * Bump-allocating native arena with fused lifetimes.
 *
 * @packageDocumentation
 */

import {
  AddressSpace,
  BLOCK_ALIGN,
  alignUp,
  defaultAddressSpace,
  type Address,
} from './address-space.js';
import {ArenaAllocationError, ArenaFreedError} from './errors.js';

export interface ArenaOptions {
  /**
   * Address space to reserve blocks from.
   *
   * @default defaultAddressSpace
   */
  addressSpace?: AddressSpace;

  /**
   * Size of the first block. Later blocks double in size.
   *
   * @default 256
   */
  initialBlockSize?: number;

  /**
   * Largest block the doubling reaches. Requests larger than this get a
   * block of their own size.
   *
   * @default 32768
   */
  maxBlockSize?: number;
}

interface Block {
  readonly base: Address;
  readonly size: number;
  readonly buffer: ArrayBuffer;
  used: number;
}

/**
 * A region of native memory from which records are bump-allocated and which
 * is released as a unit.
 *
 * Arenas can be fused: members of a fusion group share one lifetime, and the
 * group's memory goes back to the address space when the last member is
 * freed.
 */
export class NativeArena {
  readonly addressSpace: AddressSpace;
  readonly #maxBlockSize: number;
  #nextBlockSize: number;
  #blocks: Array<Block> = [];
  #freed = false;

  // Union-find. Only the root's #members and #live are meaningful.
  #parent: NativeArena = this;
  #members: Array<NativeArena> = [this];
  #live = 1;

  constructor(options: ArenaOptions = {}) {
    this.addressSpace = options.addressSpace ?? defaultAddressSpace;
    this.#nextBlockSize = options.initialBlockSize ?? 256;
    this.#maxBlockSize = Math.max(
      options.maxBlockSize ?? 32768,
      this.#nextBlockSize,
    );
  }

  get freed(): boolean {
    return this.#freed;
  }

  /**
   * Bytes reserved by this member's own blocks.
   */
  get spaceAllocated(): number {
    let total = 0;
    for (const block of this.#blocks) {
      total += block.size;
    }
    return total;
  }

  /**
   * Number of arenas in this arena's fusion group.
   */
  get groupSize(): number {
    return this.#root().#members.length;
  }

  malloc(size: number, align = 8): Address {
    if (this.#freed) {
      throw new ArenaFreedError('allocate');
    }
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new RangeError(`Invalid allocation size: ${size}`);
    }
    if (
      !Number.isInteger(align) ||
      align <= 0 ||
      align > BLOCK_ALIGN ||
      (align & (align - 1)) !== 0
    ) {
      throw new RangeError(`Invalid alignment: ${align}`);
    }
    // Zero-sized allocations still get a distinct address.
    size = Math.max(size, 1);

    const current = this.#blocks[this.#blocks.length - 1];
    if (current !== undefined) {
      const offset = alignUp(current.used, align);
      if (offset + size <= current.size) {
        current.used = offset + size;
        return current.base + offset;
      }
    }

    const blockSize = alignUp(
      Math.max(this.#nextBlockSize, size),
      BLOCK_ALIGN,
    );
    const base = this.addressSpace.reserve(blockSize);
    let buffer: ArrayBuffer;
    try {
      buffer = new ArrayBuffer(blockSize);
    } catch {
      // The host refused the memory; hand the reservation back.
      this.addressSpace.release(base, blockSize);
      throw new ArenaAllocationError(blockSize);
    }
    this.#blocks.push({base, size: blockSize, buffer, used: size});
    this.#nextBlockSize = Math.min(this.#nextBlockSize * 2, this.#maxBlockSize);
    return base;
  }

  /**
   * A view over `length` bytes of arena memory starting at `address`.
   *
   * The range may lie in any member of the fusion group, but must not span
   * blocks.
   */
  bytes(address: Address, length: number): Uint8Array {
    if (this.#freed) {
      throw new ArenaFreedError('read memory');
    }
    const block = this.#findBlock(address, length);
    if (block === undefined) {
      throw new RangeError(
        `Range 0x${address.toString(16)}+${length} is not owned by this arena`,
      );
    }
    return new Uint8Array(block.buffer, address - block.base, length);
  }

  owns(address: Address): boolean {
    return !this.#freed && this.#findBlock(address, 1) !== undefined;
  }

  /**
   * Join `other`'s fusion group.
   *
   * Returns false if `other` is freed or lives in another address space.
   */
  fuse(other: NativeArena): boolean {
    if (this.#freed) {
      throw new ArenaFreedError('fuse');
    }
    if (other.#freed || other.addressSpace !== this.addressSpace) {
      return false;
    }
    let a = this.#root();
    let b = other.#root();
    if (a === b) {
      return true;
    }
    if (a.#members.length < b.#members.length) {
      [a, b] = [b, a];
    }
    b.#parent = a;
    a.#members.push(...b.#members);
    a.#live += b.#live;
    b.#members = [];
    b.#live = 0;
    return true;
  }

  isFused(other: NativeArena): boolean {
    return this.#root() === other.#root();
  }

  /**
   * Release this member. Memory is returned once every member of the fusion
   * group has been released.
   */
  free(): void {
    if (this.#freed) {
      throw new ArenaFreedError('free');
    }
    this.#freed = true;
    const root = this.#root();
    root.#live--;
    if (root.#live > 0) {
      return;
    }
    for (const member of root.#members) {
      for (const block of member.#blocks) {
        this.addressSpace.release(block.base, block.size);
      }
      member.#blocks = [];
    }
  }

  #root(): NativeArena {
    let node: NativeArena = this;
    while (node.#parent !== node) {
      node = node.#parent;
    }
    // Path compression
    let cursor: NativeArena = this;
    while (cursor.#parent !== node) {
      const next = cursor.#parent;
      cursor.#parent = node;
      cursor = next;
    }
    return node;
  }

  #findBlock(address: Address, length: number): Block | undefined {
    for (const member of this.#root().#members) {
      for (const block of member.#blocks) {
        if (
          address >= block.base &&
          address + length <= block.base + block.size
        ) {
          return block;
        }
      }
    }
    return undefined;
  }
}
