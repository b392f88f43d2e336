import { describe, expect, test } from 'vitest';
import { KeyedMutex } from '../src/KeyedMutex.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe('KeyedMutex', () => {
  test('runs sections with the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive('a', async () => {
        order.push('first:start');
        await tick();
        order.push('first:end');
      }),
      mutex.runExclusive('a', async () => {
        order.push('second:start');
        order.push('second:end');
      }),
    ]);

    expect(order).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  test('lets different keys overlap', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive('a', async () => {
        order.push('a:start');
        await tick();
        order.push('a:end');
      }),
      mutex.runExclusive('b', async () => {
        order.push('b:start');
        order.push('b:end');
      }),
    ]);

    expect(order.indexOf('b:end')).toBeLessThan(order.indexOf('a:end'));
  });

  test('releases the key when a section throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('a', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('a', () => 42)).resolves.toBe(42);
    expect(mutex.isLocked('a')).toBe(false);
  });
});
