/**
 * Tests for the counting semaphore
 */

import { CancelledError } from '../../errors/index.js';
import { Semaphore } from '../index.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Semaphore', () => {
  it('should reject a non-positive capacity', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });

  it('should never run more tasks than its capacity', async () => {
    const semaphore = new Semaphore(2);
    const gates = Array.from({ length: 5 }, () => deferred());
    let running = 0;
    let maxRunning = 0;

    const tasks = gates.map((gate) =>
      semaphore.run(async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await gate.promise;
        running--;
      })
    );

    await Promise.resolve();
    expect(semaphore.active).toBe(2);
    expect(semaphore.pending).toBe(3);

    gates.forEach((gate) => gate.resolve());
    await Promise.all(tasks);

    expect(maxRunning).toBe(2);
    expect(semaphore.peak).toBe(2);
    expect(semaphore.active).toBe(0);
  });

  it('should hand permits to waiters in FIFO order', async () => {
    const semaphore = new Semaphore(1);
    const order: number[] = [];
    const first = deferred();

    const holder = semaphore.run(() => first.promise);
    const waiters = [1, 2, 3].map((n) =>
      semaphore.run(async () => {
        order.push(n);
      })
    );

    first.resolve();
    await Promise.all([holder, ...waiters]);
    expect(order).toEqual([1, 2, 3]);
  });

  it('should release the permit when the task throws', async () => {
    const semaphore = new Semaphore(1);
    await expect(
      semaphore.run(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(semaphore.active).toBe(0);
    await expect(semaphore.run(async () => 'next')).resolves.toBe('next');
  });

  it('should reject immediately when the signal is already aborted', async () => {
    const semaphore = new Semaphore(1);
    const controller = new AbortController();
    controller.abort();

    await expect(semaphore.acquire(controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(semaphore.active).toBe(0);
  });

  it('should drop a waiter whose signal aborts', async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();
    const controller = new AbortController();

    const waiting = semaphore.acquire(controller.signal);
    expect(semaphore.pending).toBe(1);

    controller.abort();
    await expect(waiting).rejects.toBeInstanceOf(CancelledError);
    expect(semaphore.pending).toBe(0);

    semaphore.release();
    expect(semaphore.active).toBe(0);
  });
});
