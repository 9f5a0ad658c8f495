import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../../../src/infra/KeyedLock.js';
import { TimeoutError } from '../../../src/domain/errors.js';

function gate() {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = () => resolve();
  });
  return { promise, open };
}

const tick = (ms = 10) => new Promise((resolve) => setTimeout(resolve, ms));

describe('KeyedLock', () => {
  it('should run holders of the same key one after another', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const firstGate = gate();

    const first = lock.runExclusive('acct-1', 1000, async () => {
      events.push('first:start');
      await firstGate.promise;
      events.push('first:end');
    });
    const second = lock.runExclusive('acct-1', 1000, () => {
      events.push('second');
    });

    await tick();
    expect(events).toEqual(['first:start']);
    expect(lock.isLocked('acct-1')).toBe(true);

    firstGate.open();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.isLocked('acct-1')).toBe(false);
  });

  it('should not block holders of other keys', async () => {
    const lock = new KeyedLock();
    const held = gate();
    const first = lock.runExclusive('acct-1', 1000, () => held.promise);

    await expect(lock.runExclusive('acct-2', 1000, () => 'done')).resolves.toBe('done');

    held.open();
    await first;
  });

  it('should time out waiters and keep the lock usable', async () => {
    const lock = new KeyedLock();
    const held = gate();
    const first = lock.runExclusive('acct-1', 1000, () => held.promise);

    const waiting = lock.runExclusive('acct-1', 20, () => 'never');
    await expect(waiting).rejects.toBeInstanceOf(TimeoutError);
    await expect(lock.runExclusive('acct-1', 20, () => 'late')).rejects.toThrow(
      'Lock on acct-1 timed out after 20ms'
    );

    held.open();
    await first;
    expect(lock.isLocked('acct-1')).toBe(false);
    await expect(lock.runExclusive('acct-1', 20, () => 'free')).resolves.toBe('free');
  });

  it('should release the lock when the holder throws', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.runExclusive('acct-1', 1000, () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(lock.isLocked('acct-1')).toBe(false);
  });
});
