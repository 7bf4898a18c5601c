import { describe, expect, it } from 'vitest';
import { OwnerLockRegistry } from '../locks';

function gate() {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open: () => open() };
}

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('OwnerLockRegistry', () => {
  it('runs writers for one owner one at a time', async () => {
    const locks = new OwnerLockRegistry();
    const events: string[] = [];
    const first = gate();

    const a = locks.withWriteLock('jdoe', async () => {
      events.push('a start');
      await first.promise;
      events.push('a end');
    });
    const b = locks.withWriteLock('jdoe', () => {
      events.push('b');
    });

    await flush();
    expect(events).toEqual(['a start']);

    first.open();
    await Promise.all([a, b]);
    expect(events).toEqual(['a start', 'a end', 'b']);
  });

  it('lets readers share the lock', async () => {
    const locks = new OwnerLockRegistry();
    const events: string[] = [];
    const hold = gate();

    const readers = [1, 2].map((n) =>
      locks.withReadLock('jdoe', async () => {
        events.push(`r${n} start`);
        await hold.promise;
      })
    );

    await flush();
    expect(events).toEqual(['r1 start', 'r2 start']);
    hold.open();
    await Promise.all(readers);
  });

  it('queues new readers behind a waiting writer', async () => {
    const locks = new OwnerLockRegistry();
    const events: string[] = [];
    const hold = gate();

    const r1 = locks.withReadLock('jdoe', async () => {
      events.push('r1 start');
      await hold.promise;
      events.push('r1 end');
    });
    const w = locks.withWriteLock('jdoe', () => {
      events.push('w');
    });
    const r2 = locks.withReadLock('jdoe', () => {
      events.push('r2');
    });

    await flush();
    expect(events).toEqual(['r1 start']);
    expect(locks.getMetrics().queuedRequests).toBe(2);

    hold.open();
    await Promise.all([r1, w, r2]);
    expect(events).toEqual(['r1 start', 'r1 end', 'w', 'r2']);
  });

  it('releases the lock when the holder throws', async () => {
    const locks = new OwnerLockRegistry();

    await expect(
      locks.withWriteLock('jdoe', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(locks.withWriteLock('jdoe', () => 'next')).resolves.toBe('next');
    expect(locks.getMetrics().busySlots).toBe(0);
  });

  it('maps owners onto a fixed pool of slots', () => {
    const locks = new OwnerLockRegistry({ poolSize: 8 });

    const slots = ['a', 'b', 'c', 'jdoe', 'mary'].map((owner) => locks.slotFor(owner));

    expect(locks.poolSize).toBe(8);
    expect(slots.every((slot) => slot >= 0 && slot < 8)).toBe(true);
    expect(locks.slotFor('jdoe')).toBe(slots[3]);
  });

  it('serializes different owners that share a slot', async () => {
    const locks = new OwnerLockRegistry({ poolSize: 1 });
    const events: string[] = [];
    const hold = gate();

    const a = locks.withWriteLock('alice', async () => {
      events.push('alice');
      await hold.promise;
    });
    const b = locks.withWriteLock('bob', () => {
      events.push('bob');
    });

    await flush();
    expect(events).toEqual(['alice']);
    hold.open();
    await Promise.all([a, b]);
    expect(events).toEqual(['alice', 'bob']);
  });

  it('rejects an empty pool', () => {
    expect(() => new OwnerLockRegistry({ poolSize: 0 })).toThrow(RangeError);
  });
});
