/**
 * Tests for the object identity cache.
 */

import {suite, test} from 'node:test';
import * as assert from 'node:assert';
import {AddressSpace, NativeArena} from '@arenabridge/arena';
import {HostObject, InvariantViolation, ObjectCache} from '../../index.js';
import type {Address, ObjectCacheOptions} from '../../index.js';
import {collectTarget, collectUntil} from './test-utils.js';

class Thing extends HostObject {
  deallocs = 0;

  get typeName(): string {
    return 'Thing';
  }

  protected override dealloc(): void {
    this.deallocs++;
  }
}

function newCache(options: ObjectCacheOptions = {}): ObjectCache {
  return new ObjectCache(
    new NativeArena({addressSpace: new AddressSpace()}),
    options,
  );
}

/**
 * Register a Thing that nothing else references, and return a weak handle
 * to it.
 */
function leak(
  cache: ObjectCache,
  key: Address,
  onCollect?: () => void,
): WeakRef<Thing> {
  const thing = new Thing();
  cache.add(key, thing, onCollect);
  return new WeakRef(thing);
}

void suite('ObjectCache', () => {
  void test('add() does not reference the object', () => {
    const cache = newCache();
    const thing = new Thing();
    cache.add(16, thing);
    assert.strictEqual(thing.refCount, 1);
    assert.strictEqual(cache.has(16), true);
    assert.strictEqual(cache.size, 1);
  });

  void test('get() returns the same object with one more reference', () => {
    const cache = newCache();
    const thing = new Thing();
    cache.add(16, thing);
    const hit = cache.get(16);
    assert.strictEqual(hit, thing);
    assert.strictEqual(thing.refCount, 2);
    assert.strictEqual(cache.get(16), thing);
    assert.strictEqual(thing.refCount, 3);
  });

  void test('get() misses without side effects', () => {
    const cache = newCache();
    assert.strictEqual(cache.get(16), undefined);
    assert.strictEqual(cache.size, 0);
    assert.strictEqual(cache.broken, false);
  });

  void test('delete() removes the entry', () => {
    const cache = newCache();
    const thing = new Thing();
    cache.add(16, thing);
    cache.delete(16);
    assert.strictEqual(cache.get(16), undefined);
    assert.strictEqual(cache.has(16), false);
    assert.strictEqual(thing.refCount, 1);
  });

  void test('a key can be reused after delete()', () => {
    const cache = newCache();
    const first = new Thing();
    const second = new Thing();
    cache.add(16, first);
    cache.delete(16);
    cache.add(16, second);
    assert.strictEqual(cache.get(16), second);
  });

  void test('duplicate add() is an invariant violation', () => {
    const cache = newCache();
    cache.add(16, new Thing());
    assert.throws(() => cache.add(16, new Thing()), {
      name: 'InvariantViolation',
      message: 'Duplicate object cache entry for 0x10',
    });
  });

  void test('delete() of a missing key is an invariant violation', () => {
    const cache = newCache();
    assert.throws(() => cache.delete(32), {
      name: 'InvariantViolation',
      message: 'No object cache entry to delete for 0x20',
    });
  });

  void test('a violation breaks the cache for good', () => {
    const cache = newCache();
    const thing = new Thing();
    cache.add(16, thing);
    assert.throws(() => cache.delete(32), InvariantViolation);
    assert.strictEqual(cache.broken, true);
    assert.throws(() => cache.get(16), {
      name: 'InvariantViolation',
      message:
        'Object cache is broken: No object cache entry to delete for 0x20',
    });
    assert.throws(() => cache.add(48, new Thing()), InvariantViolation);
    assert.throws(() => cache.has(16), InvariantViolation);
    assert.strictEqual(thing.refCount, 1);
  });

  void test('invalid keys are not violations', () => {
    const cache = newCache();
    assert.throws(() => cache.add(0, new Thing()), RangeError);
    assert.strictEqual(cache.broken, false);
  });

  void test('live() lists registered objects', () => {
    const cache = newCache();
    const a = new Thing();
    const b = new Thing();
    cache.add(16, a);
    cache.add(32, b);
    const live = new Map(cache.live());
    assert.strictEqual(live.size, 2);
    assert.strictEqual(live.get(16), a);
    assert.strictEqual(live.get(32), b);
  });

  void test('grows with many entries', () => {
    const cache = newCache();
    const things: Array<Thing> = [];
    for (let i = 1; i <= 100; i++) {
      const thing = new Thing();
      things.push(thing);
      cache.add(i * 16, thing);
    }
    assert.strictEqual(cache.size, 100);
    assert.strictEqual(cache.get(50 * 16), things[49]);
  });
});

void suite('ObjectCache - garbage collection', () => {
  void test('a leaked object is purged and reported', async () => {
    const leaks: Array<string> = [];
    const cache = newCache({
      onLeak: (key, typeName) => leaks.push(`${typeName}@${key}`),
    });
    let collected = 0;
    leak(cache, 16, () => collected++);

    assert.ok(await collectUntil(() => collected > 0));
    assert.strictEqual(collected, 1);
    assert.strictEqual(cache.has(16), false);
    assert.strictEqual(cache.size, 0);
    assert.deepStrictEqual(leaks, ['Thing@16']);
  });

  void test('add() replaces an entry whose object was collected', async () => {
    const cache = newCache();
    let collected = 0;
    const ref = leak(cache, 16, () => collected++);
    assert.ok(await collectTarget(ref));

    // The finalizer has not run yet; the dead entry is still in the table
    assert.strictEqual(cache.size, 1);
    const replacement = new Thing();
    cache.add(16, replacement);
    assert.strictEqual(cache.broken, false);

    // The late finalizer leaves the newer entry alone
    assert.ok(await collectUntil(() => collected > 0));
    assert.strictEqual(cache.get(16), replacement);
    assert.strictEqual(cache.size, 1);
  });

  void test('get() purges an entry whose object was collected', async () => {
    const cache = newCache();
    let collected = 0;
    const ref = leak(cache, 16, () => collected++);
    assert.ok(await collectTarget(ref));

    assert.strictEqual(cache.size, 1);
    assert.strictEqual(cache.get(16), undefined);
    assert.strictEqual(cache.size, 0);

    assert.ok(await collectUntil(() => collected > 0));
    assert.strictEqual(collected, 1);
    assert.strictEqual(cache.size, 0);
    assert.strictEqual(cache.broken, false);
  });
});

void suite('HostObject', () => {
  void test('dealloc() runs once when the count reaches zero', () => {
    const thing = new Thing();
    thing.incref();
    thing.decref();
    assert.strictEqual(thing.deallocs, 0);
    thing.decref();
    assert.strictEqual(thing.deallocs, 1);
    assert.strictEqual(thing.alive, false);
  });

  void test('over-release is an invariant violation', () => {
    const thing = new Thing();
    thing.decref();
    assert.throws(() => thing.decref(), {
      name: 'InvariantViolation',
      message: 'Thing released more times than it was referenced',
    });
    assert.throws(() => thing.incref(), {
      name: 'InvariantViolation',
      message: 'Cannot reference deallocated Thing',
    });
    assert.strictEqual(thing.deallocs, 1);
  });

  void test('using releases a reference', () => {
    const thing = new Thing();
    thing.incref();
    {
      using scoped = thing;
      assert.strictEqual(scoped.refCount, 2);
    }
    assert.strictEqual(thing.refCount, 1);
  });
});
