/**
 * Tests for AddressSpace block reservation and recycling.
 */

import {suite, test} from 'node:test';
import * as assert from 'node:assert';
import {AddressSpace, ArenaAllocationError} from '../../index.js';

void suite('AddressSpace', () => {
  void test('reserves aligned, non-zero addresses', () => {
    const space = new AddressSpace();
    assert.strictEqual(space.reserve(100), 16);
    // 100 is rounded up to 112
    assert.strictEqual(space.reserve(10), 128);
    assert.strictEqual(space.reserved, 128);
  });

  void test('recycles released ranges of the same size, last first', () => {
    const space = new AddressSpace();
    const a = space.reserve(64);
    const b = space.reserve(64);
    space.release(a, 64);
    space.release(b, 64);
    assert.strictEqual(space.reserved, 0);
    assert.strictEqual(space.reserve(64), b);
    assert.strictEqual(space.reserve(64), a);
  });

  void test('does not hand a released range to a different size', () => {
    const space = new AddressSpace();
    const a = space.reserve(64);
    space.release(a, 64);
    assert.notStrictEqual(space.reserve(128), a);
  });

  void test('enforces the limit', () => {
    const space = new AddressSpace({limit: 256});
    space.reserve(200);
    assert.throws(
      () => space.reserve(64),
      (error: unknown) => {
        assert.ok(error instanceof ArenaAllocationError);
        assert.strictEqual(error.requested, 64);
        assert.strictEqual(error.available, 48);
        assert.strictEqual(
          error.message,
          'Cannot allocate 64 bytes: only 48 bytes available in address space',
        );
        return true;
      },
    );
    // A failed reservation leaves the space unchanged
    assert.strictEqual(space.reserved, 208);
  });

  void test('rejects invalid sizes', () => {
    const space = new AddressSpace();
    assert.throws(() => space.reserve(0), RangeError);
    assert.throws(() => space.reserve(1.5), RangeError);
  });
});
