import { describe, test, expect } from '@jest/globals';
import { KeyedMutex } from '../keyedMutex';

const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
};

describe('KeyedMutex', () => {
  test('runs work on one key in call order, one at a time', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('session-1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = mutex.runExclusive('session-1', async () => {
      events.push('second');
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);
    expect(mutex.isLocked('session-1')).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked('session-1')).toBe(false);
  });

  test('different keys do not wait on each other', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const blocked = mutex.runExclusive('session-1', () => gate.promise);
    const other = await mutex.runExclusive('session-2', async () => 'done');

    expect(other).toBe('done');
    gate.resolve();
    await blocked;
  });

  test('a failing task releases the key', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('session-1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(await mutex.runExclusive('session-1', async () => 42)).toBe(42);
    expect(mutex.isLocked('session-1')).toBe(false);
  });
});
