/**
 * @arenabridge/core
 *
 * Keeps host objects and arena-allocated native records in step: one
 * wrapper per record, and no wrapper outliving the arena it points into.
 *
 * @fileoverview Public API exports.
 */

export const VERSION = '0.1.0';

// Core API
export {ModuleState} from './lib/module-state.js';
export {Arena} from './lib/arena.js';
export {NativeWrapper, getOrCreate} from './lib/wrapper.js';
export {HostObject} from './lib/host-object.js';
export {ObjectCache} from './lib/object-cache.js';

// Utilities
export {getStrData} from './lib/strings.js';
export {
  InvariantViolation,
  ForbiddenConstructionError,
  ModuleStateDisposedError,
  ArenaAllocationError,
  ArenaFreedError,
} from './lib/errors.js';

// Types
export type {ConstructionKey} from './lib/constants.js';
export type {WrapperClass} from './lib/wrapper.js';
export type {HostClass} from './lib/module-state.js';
export type {ObjectCacheOptions} from './lib/object-cache.js';
export type {Logger, Options, ResolvedOptions, WrapperInit} from './lib/types.js';
export type {Address} from '@arenabridge/arena';
