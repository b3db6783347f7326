/**
 * @arenabridge/arena
 *
 * Native memory layer: an integer address space, bump-allocating arenas with
 * fused lifetimes, and an integer-keyed table stored in arena memory.
 *
 * @fileoverview Public API exports.
 */

export {
  AddressSpace,
  defaultAddressSpace,
  alignUp,
  BLOCK_ALIGN,
} from './lib/address-space.js';
export {NativeArena} from './lib/arena.js';
export {IntTable} from './lib/int-table.js';
export {ArenaAllocationError, ArenaFreedError} from './lib/errors.js';

export type {Address, AddressSpaceOptions} from './lib/address-space.js';
export type {ArenaOptions} from './lib/arena.js';
