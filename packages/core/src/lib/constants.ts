/**
 * Runtime constants shared between the host object classes and the module
 * state. Separated into their own file to avoid circular dependencies
 * between wrapper.ts and module-state.ts.
 *
 * @fileoverview Internal keys and names.
 */

/**
 * Passed to wrapper constructors by the construction protocol. Constructors
 * reject any other value, so wrappers cannot be created with `new` from
 * outside.
 */
export const CONSTRUCTION_KEY: unique symbol = Symbol('arenabridge.construct');

export type ConstructionKey = typeof CONSTRUCTION_KEY;

/**
 * Method key used by the construction protocol to mark a wrapper as
 * registered after its cache entry has been added.
 */
export const ATTACH = Symbol('arenabridge.attach');

/**
 * Method key used by module teardown to invalidate a wrapper that is still
 * registered.
 */
export const DETACH = Symbol('arenabridge.detach');

/**
 * Fully-qualified name the Arena type is registered under.
 */
export const ARENA_TYPE_NAME = 'arenabridge.Arena';

export const LOG_PREFIX = 'arenabridge';
