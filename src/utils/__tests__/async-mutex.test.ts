import { describe, it, expect } from '@jest/globals';
import { AsyncMutex } from '../async-mutex.js';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('AsyncMutex', () => {
  it('should run critical sections one at a time in call order', async () => {
    const mutex = new AsyncMutex();
    const log: string[] = [];

    await Promise.all([
      mutex.runExclusive(async () => {
        log.push('a:start');
        await delay(10);
        log.push('a:end');
      }),
      mutex.runExclusive(async () => {
        log.push('b:start');
        await delay(1);
        log.push('b:end');
      }),
      mutex.runExclusive(() => {
        log.push('c');
      }),
    ]);

    expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c']);
  });

  it('should release the lock when the section throws', async () => {
    const mutex = new AsyncMutex();

    await expect(mutex.runExclusive(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(mutex.isLocked()).toBe(false);
    await expect(mutex.runExclusive(() => 'ok')).resolves.toBe('ok');
  });

  it('should hand the lock straight to the next waiter', async () => {
    const mutex = new AsyncMutex();
    const release = await mutex.acquire();
    const waiting = mutex.acquire();

    expect(mutex.waitingCount).toBe(1);
    release();
    // Still locked: ownership moved to the waiter
    expect(mutex.isLocked()).toBe(true);

    const releaseSecond = await waiting;
    releaseSecond();
    expect(mutex.isLocked()).toBe(false);
  });

  it('should ignore a double release', async () => {
    const mutex = new AsyncMutex();
    const release = await mutex.acquire();
    release();
    release();
    expect(mutex.isLocked()).toBe(false);
  });
});
