import { describe, it, expect } from 'vitest';
import { createKeyedMutex } from './keyed-mutex';

const tick = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('createKeyedMutex', () => {
  it('should serialize work under the same key', async () => {
    const mutex = createKeyedMutex();
    const log: string[] = [];

    const task = (name: string) =>
      mutex.runExclusive('table-1', async () => {
        log.push(`${name}:start`);
        await tick(5);
        log.push(`${name}:end`);
      });

    await Promise.all([task('a'), task('b')]);

    expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should run different keys concurrently', async () => {
    const mutex = createKeyedMutex();
    const log: string[] = [];

    await Promise.all([
      mutex.runExclusive('t1', async () => {
        log.push('t1:start');
        await tick(10);
        log.push('t1:end');
      }),
      mutex.runExclusive('t2', async () => {
        log.push('t2:start');
        await tick(1);
        log.push('t2:end');
      }),
    ]);

    expect(log).toEqual(['t1:start', 't2:start', 't2:end', 't1:end']);
  });

  it('should release the key when the work throws', async () => {
    const mutex = createKeyedMutex();

    await expect(
      mutex.runExclusive('k', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(await mutex.runExclusive('k', () => 'next')).toBe('next');
    expect(mutex.size).toBe(0);
  });
});
