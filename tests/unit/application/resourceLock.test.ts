import { describe, expect, it } from 'vitest';

import { LockTimeoutError, OperationAbortedError } from '@makerspace/shared';

import { ResourceLockManager } from '../../../src/application/resourceLock';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('ResourceLockManager', () => {
  it('grants the lock in arrival order', async () => {
    const locks = new ResourceLockManager(1000);
    const order: string[] = [];
    const gate = deferred();

    const first = locks.runExclusive('laser-1', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = locks.runExclusive('laser-1', async () => {
      order.push('second');
    });
    const third = locks.runExclusive('laser-1', async () => {
      order.push('third');
    });

    expect(locks.waiting('laser-1')).toBe(2);
    gate.resolve();
    await Promise.all([first, second, third]);

    expect(order).toEqual(['first', 'second', 'third']);
    expect(locks.isLocked('laser-1')).toBe(false);
  });

  it('does not serialize different keys', async () => {
    const locks = new ResourceLockManager(1000);
    const gate = deferred();

    const held = locks.runExclusive('laser-1', () => gate.promise);
    const other = await locks.runExclusive('room', async () => 'done');

    expect(other).toBe('done');
    gate.resolve();
    await held;
  });

  it('times out a waiter and lets the next one through', async () => {
    const locks = new ResourceLockManager(1000);
    const release = await locks.acquire('laser-1');

    const timedOut = locks.acquire('laser-1', { timeoutMs: 10 });
    const patient = locks.acquire('laser-1', { timeoutMs: 1000 });

    await expect(timedOut).rejects.toBeInstanceOf(LockTimeoutError);
    expect(locks.waiting('laser-1')).toBe(1);

    release();
    const releasePatient = await patient;
    expect(locks.isLocked('laser-1')).toBe(true);
    releasePatient();
    expect(locks.isLocked('laser-1')).toBe(false);
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const locks = new ResourceLockManager(1000);
    const controller = new AbortController();
    controller.abort();

    await expect(locks.acquire('laser-1', { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationAbortedError
    );
    expect(locks.isLocked('laser-1')).toBe(false);
  });

  it('drops an aborted waiter from the queue', async () => {
    const locks = new ResourceLockManager(1000);
    const release = await locks.acquire('laser-1');
    const controller = new AbortController();

    const aborted = locks.acquire('laser-1', { signal: controller.signal });
    controller.abort();

    await expect(aborted).rejects.toBeInstanceOf(OperationAbortedError);
    expect(locks.waiting('laser-1')).toBe(0);
    release();
    expect(locks.isLocked('laser-1')).toBe(false);
  });

  it('releases the lock when the work throws', async () => {
    const locks = new ResourceLockManager(1000);

    await expect(
      locks.runExclusive('laser-1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(locks.isLocked('laser-1')).toBe(false);
  });

  it('ignores a second call to the same release function', async () => {
    const locks = new ResourceLockManager(1000);
    const release = await locks.acquire('laser-1');
    const next = locks.acquire('laser-1');

    release();
    const releaseNext = await next;
    release();

    expect(locks.isLocked('laser-1')).toBe(true);
    releaseNext();
  });
});
