import { TableLockService } from './table-lock.service';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('TableLockService', () => {
  let locks: TableLockService;

  beforeEach(() => {
    locks = new TableLockService();
  });

  it('should run tasks for the same table one at a time, in order', async () => {
    const events: string[] = [];
    const gate = deferred();

    const first = locks.runExclusive('users', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = locks.runExclusive('USERS', () => {
      events.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);
    expect(locks.isLocked('users')).toBe(true);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(locks.isLocked('users')).toBe(false);
  });

  it('should not block tasks for other tables', async () => {
    const gate = deferred();
    const events: string[] = [];

    const slow = locks.runExclusive('users', async () => {
      await gate.promise;
      events.push('users');
    });
    await locks.runExclusive('orders', () => {
      events.push('orders');
    });

    expect(events).toEqual(['orders']);
    gate.resolve();
    await slow;
    expect(events).toEqual(['orders', 'users']);
  });

  it('should release the lock when a task fails', async () => {
    await expect(
      locks.runExclusive('users', () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(locks.runExclusive('users', () => 'next')).resolves.toBe('next');
    expect(locks.isLocked('users')).toBe(false);
  });
});
