import { describe, expect, it } from 'vitest';
import { KeyedLock } from './keyedLock.js';
import { sleep } from '../utils/async.js';

describe('KeyedLock', () => {
  it('runs work for the same key one at a time in arrival order', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('neg_1', async () => {
        events.push('a:start');
        await sleep(20);
        events.push('a:end');
      }),
      lock.run('neg_1', async () => {
        events.push('b:start');
        events.push('b:end');
      })
    ]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(lock.size).toBe(0);
  });

  it('does not serialize different keys', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('neg_1', async () => {
        events.push('a:start');
        await sleep(20);
        events.push('a:end');
      }),
      lock.run('neg_2', async () => {
        events.push('b:start');
        events.push('b:end');
      })
    ]);

    expect(events).toEqual(['a:start', 'b:start', 'b:end', 'a:end']);
  });

  it('releases the key when work throws', async () => {
    const lock = new KeyedLock();

    await expect(lock.run('neg_1', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(lock.isLocked('neg_1')).toBe(false);
    await expect(lock.run('neg_1', async () => 'next')).resolves.toBe('next');
  });
});
