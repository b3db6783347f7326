/**
 * Public types for the bridge layer.
 *
 * @fileoverview Options and construction types.
 */

import type {Address, AddressSpace} from '@arenabridge/arena';
import type {Arena} from './arena.js';
import type {ModuleState} from './module-state.js';

/**
 * Sink for diagnostics. `console` satisfies it.
 */
export interface Logger {
  warn(message: string): void;
}

/**
 * Options for configuring ModuleState.create().
 */
export interface Options {
  /**
   * Enable debug mode for lifecycle diagnostics.
   *
   * When `true`, teardown reports wrappers that were still alive, and
   * wrappers that were garbage collected without being released are
   * reported as they are collected.
   *
   * @default false
   */
  debug?: boolean;

  /**
   * Where debug diagnostics are written.
   *
   * @default console
   */
  logger?: Logger;

  /**
   * Address space backing the cache arena and every arena created with
   * `Arena.new()`.
   *
   * @default defaultAddressSpace
   */
  addressSpace?: AddressSpace;

  /**
   * Initial slot count of the identity table.
   *
   * @default 64
   */
  cacheCapacity?: number;
}

/**
 * Options with every default filled in.
 */
export type ResolvedOptions = Required<Options>;

/**
 * What the construction protocol hands a wrapper constructor.
 */
export interface WrapperInit {
  readonly state: ModuleState;
  readonly address: Address;
  readonly arena: Arena;
}
