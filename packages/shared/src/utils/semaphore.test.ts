import { describe, expect, test } from 'vitest';

import { Semaphore } from './semaphore';

describe('Semaphore', () => {
  test('rejects invalid capacity', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow(RangeError);
  });

  test('grants permits up to capacity then queues', async () => {
    const semaphore = new Semaphore(2);

    const first = await semaphore.acquire();
    await semaphore.acquire();
    let thirdGranted = false;
    const third = semaphore.acquire().then((release) => {
      thirdGranted = true;
      return release;
    });

    await Promise.resolve();
    expect(semaphore.inUse).toBe(2);
    expect(semaphore.pending).toBe(1);
    expect(thirdGranted).toBe(false);

    first();
    const releaseThird = await third;

    expect(thirdGranted).toBe(true);
    expect(semaphore.inUse).toBe(2);
    expect(semaphore.pending).toBe(0);
    releaseThird();
    expect(semaphore.inUse).toBe(1);
  });

  test('release is idempotent', async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();

    release();
    release();

    expect(semaphore.inUse).toBe(0);
  });

  test('serves waiters in arrival order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];
    const release = await semaphore.acquire();

    const a = semaphore.use(async () => {
      order.push('a');
    });
    const b = semaphore.use(async () => {
      order.push('b');
    });
    release();
    await Promise.all([a, b]);

    expect(order).toEqual(['a', 'b']);
  });

  test('use releases the permit when fn throws', async () => {
    const semaphore = new Semaphore(1);

    await expect(
      semaphore.use(async () => {
        throw new Error('render failed');
      }),
    ).rejects.toThrow('render failed');
    expect(semaphore.inUse).toBe(0);
  });

  test('aborting a waiter removes it from the queue', async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();
    const controller = new AbortController();

    const waiting = semaphore.acquire(controller.signal);
    controller.abort(new Error('shutdown'));

    await expect(waiting).rejects.toThrow('shutdown');
    expect(semaphore.pending).toBe(0);
    release();
    expect(semaphore.inUse).toBe(0);
  });

  test('rejects immediately when the signal is already aborted', async () => {
    const semaphore = new Semaphore(1);
    const controller = new AbortController();
    controller.abort(new Error('stopped'));

    await expect(semaphore.acquire(controller.signal)).rejects.toThrow(
      'stopped',
    );
    expect(semaphore.inUse).toBe(0);
  });
});
