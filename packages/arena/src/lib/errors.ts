/**
 * Errors raised by the native arena layer.
 *
 * @fileoverview Arena error types.
 */

/**
 * Thrown when an address space or arena cannot satisfy an allocation.
 *
 * Recoverable: nothing was allocated and the arena is unchanged.
 */
export class ArenaAllocationError extends Error {
  /**
   * @param available - Bytes left under the address space limit; omitted
   *     when the host itself refused the memory.
   */
  constructor(
    public readonly requested: number,
    public readonly available?: number,
  ) {
    super(
      available === undefined
        ? `Cannot allocate ${requested} bytes: host memory exhausted`
        : `Cannot allocate ${requested} bytes: only ${available} bytes available in address space`,
    );
    this.name = 'ArenaAllocationError';
  }
}

/**
 * Thrown when a freed arena is used, or freed a second time.
 */
export class ArenaFreedError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation}: arena has been freed`);
    this.name = 'ArenaFreedError';
  }
}
