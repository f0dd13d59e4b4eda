import { afterEach, describe, expect, it, vi } from 'vitest';
import { SessionBusyError } from '../exceptions';
import { SessionLock } from './session-lock';

describe('SessionLock', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should grant a free lock immediately', async () => {
    const lock = new SessionLock();
    await lock.acquire();
    expect(lock.isLocked).toBe(true);
    lock.release();
    expect(lock.isLocked).toBe(false);
  });

  it('should hand the lock to waiters in arrival order', async () => {
    const lock = new SessionLock();
    const order: string[] = [];
    await lock.acquire();

    const second = lock.acquire().then(() => order.push('second'));
    const third = lock.acquire().then(() => order.push('third'));
    expect(lock.waiting).toBe(2);

    lock.release();
    await second;
    lock.release();
    await third;
    expect(order).toEqual(['second', 'third']);
    expect(lock.isLocked).toBe(true);
  });

  it('should give up after the timeout', async () => {
    vi.useFakeTimers();
    const lock = new SessionLock();
    await lock.acquire();

    const waiting = lock.acquire(50);
    const rejected = expect(waiting).rejects.toThrow(SessionBusyError);
    vi.advanceTimersByTime(50);
    await rejected;
    await expect(waiting).rejects.toThrow('Device still busy after 50ms');
    expect(lock.waiting).toBe(0);
  });

  it('should serialise runExclusive calls', async () => {
    const lock = new SessionLock();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`${name} start`);
      await Promise.resolve();
      events.push(`${name} end`);
      return name;
    };

    const results = await Promise.all([lock.runExclusive(task('a')), lock.runExclusive(task('b'))]);
    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a start', 'a end', 'b start', 'b end']);
    expect(lock.isLocked).toBe(false);
  });

  it('should release the lock when the work throws', async () => {
    const lock = new SessionLock();
    await expect(
      lock.runExclusive(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(lock.isLocked).toBe(false);
  });
});
