/**
 * arenabridge
 *
 * Identity-preserving host wrappers over arena-allocated native records.
 *
 * This package re-exports everything from @arenabridge/core and
 * @arenabridge/arena for convenience.
 */

// Re-export using the package names (resolved via package.json exports)
export * from '@arenabridge/core';
export {
  AddressSpace,
  defaultAddressSpace,
  NativeArena,
  IntTable,
} from '@arenabridge/arena';
export type {AddressSpaceOptions, ArenaOptions} from '@arenabridge/arena';
