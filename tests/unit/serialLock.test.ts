import { describe, expect, test } from 'vitest';

import { SerialLock } from '../../src/concurrency/serialLock.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('SerialLock', () => {
  test('runs holders of the same key one at a time', async () => {
    const lock = new SerialLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive('114181800001', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = lock.runExclusive('114181800001', async () => {
      events.push('second:start');
      return 2;
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);
    expect(lock.isLocked('114181800001')).toBe(true);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    expect(lock.isLocked('114181800001')).toBe(false);
  });

  test('does not block different keys', async () => {
    const lock = new SerialLock();
    const gate = deferred();
    const events: string[] = [];

    const first = lock.runExclusive('A', async () => {
      await gate.promise;
      events.push('A');
    });
    await lock.runExclusive('B', async () => {
      events.push('B');
    });

    expect(events).toEqual(['B']);
    gate.resolve();
    await first;
    expect(events).toEqual(['B', 'A']);
  });

  test('releases the lock when the holder throws', async () => {
    const lock = new SerialLock();

    await expect(
      lock.runExclusive('A', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(lock.isLocked('A')).toBe(false);
    await expect(lock.runExclusive('A', async () => 'next')).resolves.toBe('next');
  });
});
